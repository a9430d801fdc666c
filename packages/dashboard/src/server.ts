import Fastify, { type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import type { AlmanacConfig } from "@almanac/core";
import { registerCalendarRoutes } from "./routes/calendar.js";

export interface ServerOptions {
  config: AlmanacConfig;
  /** Disable for tests; defaults to pretty-printed pino output */
  logger?: boolean;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    almanacConfig: AlmanacConfig;
  }
}

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const { config, logger = true } = options;

  const fastify = Fastify({
    logger: logger
      ? {
          level: "info",
          transport: {
            target: "pino-pretty",
            options: {
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname",
            },
          },
        }
      : false,
  });

  // Register CORS (allow all origins, single-user app)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("almanacConfig", config);

  // Register calendar routes
  await registerCalendarRoutes(fastify);

  return fastify;
}
