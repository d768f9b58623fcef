// ---------------------------------------------------------------------------
// Fastify app factory — used by both production entry point and tests
// ---------------------------------------------------------------------------

import type { Server } from "node:https";
import cors from "@fastify/cors";
import Fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  LogController,
} from "fastify";
import {
  type FibonacciPool,
  createFibonacciPool,
} from "./compute/fibonacci-pool.js";
import { type AppEnv, loadEnv } from "./lib/env.js";
import { AppError } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import type { TlsMaterial } from "./lib/tls.js";
import computeRoutes from "./routes/compute.js";
import healthRoutes from "./routes/health.js";
import rootRoutes from "./routes/root.js";

declare module "fastify" {
  interface FastifyInstance {
    env: AppEnv;
    computePool: FibonacciPool;
  }
}

export type App = FastifyInstance<Server>;

export interface BuildAppOptions {
  /** Override default env (useful for tests) */
  env?: Partial<AppEnv>;
  /** Certificate and key for the HTTPS listener; omit for inject-only tests */
  tls?: TlsMaterial;
  logger?: FastifyBaseLogger;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<App> {
  const env: AppEnv = { ...loadEnv(), ...options.env };

  const app = Fastify({
    https: options.tls ?? null,
    loggerInstance: options.logger ?? createLogger(env),
    logController: new LogController({ disableRequestLogging: true }),
  });

  app.decorate("env", env);

  // CORS — any origin, method and header
  await app.register(cors, {
    origin: "*",
    methods: "*",
    allowedHeaders: "*",
    exposedHeaders: "*",
  });

  const computePool = createFibonacciPool(env.COMPUTE_POOL_SIZE);
  app.decorate("computePool", computePool);

  // Routes
  await app.register(rootRoutes);
  await app.register(healthRoutes);
  await app.register(computeRoutes);

  // Global error handler
  app.setErrorHandler(
    (error: Error & { statusCode?: number }, _request, reply) => {
      if (error instanceof AppError) {
        if (error.statusCode >= 500) app.log.error(error);
        return reply.status(error.statusCode).send({ error: error.message });
      }
      app.log.error(error);
      return reply
        .status(error.statusCode ?? 500)
        .send({ error: error.message || "Internal server error" });
    },
  );

  // Graceful shutdown: stop compute workers
  app.addHook("onClose", async () => {
    await computePool.close();
  });

  return app;
}
