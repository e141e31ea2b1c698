import fs from "node:fs";
import path from "node:path";
import fastifyStatic from "@fastify/static";
import type { FastifyInstance } from "fastify";

export interface HomeRouteOptions {
  root?: string;
}

// src/routes under tsx, dist/src/routes once built.
const DEFAULT_PUBLIC_ROOT = [
  path.join(__dirname, "../../public"),
  path.join(__dirname, "../../../public"),
].find((candidate) => fs.existsSync(path.join(candidate, "index.html")))
  ?? path.join(__dirname, "../../public");

export async function homeRoutes(app: FastifyInstance, options: HomeRouteOptions) {
  await app.register(fastifyStatic, {
    root: options.root ?? DEFAULT_PUBLIC_ROOT,
    serve: false,
  });

  app.get("/", async (_request, reply) => {
    return reply.sendFile("index.html");
  });
}
