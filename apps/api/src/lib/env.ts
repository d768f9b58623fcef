// ---------------------------------------------------------------------------
// Environment configuration for apps/api
// ---------------------------------------------------------------------------

import { availableParallelism } from "node:os";
import { z } from "zod";

const LogLevel = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const EnvSchema = z.object({
  /** PEM certificate served on the HTTPS listener */
  TLS_CERT_PATH: z.string().min(1).default("/certs/server.crt"),
  /** PEM private key matching TLS_CERT_PATH */
  TLS_KEY_PATH: z.string().min(1).default("/certs/server.key"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  LOG_LEVEL: LogLevel.default("info"),
  /** Worker threads reserved for CPU-bound endpoints */
  COMPUTE_POOL_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(() => availableParallelism()),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  return EnvSchema.parse(source);
}
