import { buildServer, getListenPort } from "./server";
import { getConfig, validateBootConfig } from "./config";

async function main() {
  const config = getConfig();
  validateBootConfig(config);

  const server = await buildServer({ chat: { config } });
  const port = getListenPort();

  const shutdown = async (signal: NodeJS.Signals) => {
    server.log.info({ signal }, "shutting down");
    await server.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        server.log.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }

  await server.listen({ port, host: "0.0.0.0" });
  server.log.info({ port, deployment: config.azureOpenAiDeployment }, "chat relay started");
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
