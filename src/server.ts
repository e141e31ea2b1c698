import Fastify from "fastify";
import { getConfig } from "./config";
import { chatRoutes, type ChatRouteOptions } from "./routes/chat";
import { healthRoutes } from "./routes/health";
import { homeRoutes, type HomeRouteOptions } from "./routes/home";
import { withRequestMeta } from "./utils/http-envelope";

export interface BuildServerOptions {
  chat?: ChatRouteOptions;
  home?: HomeRouteOptions;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: true, routerOptions: { maxParamLength: 256 } });

  app.addHook("onSend", (request, reply, payload, done) => {
    reply.header("x-request-id", request.id);
    done(null, payload);
  });

  app.addHook("preSerialization", (request, _reply, payload, done) => {
    done(null, withRequestMeta(payload, request.id));
  });

  app.register(healthRoutes);
  app.register(homeRoutes, options.home ?? {});
  app.register(chatRoutes, options.chat ?? {});

  return app;
}

export function getListenPort(): number {
  return getConfig().port;
}
