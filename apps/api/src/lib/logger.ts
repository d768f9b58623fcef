import { pino, type Logger } from "pino";
import type { AppEnv } from "./env.js";

export function createLogger(env: Pick<AppEnv, "LOG_LEVEL">): Logger {
  return pino({ name: "api", level: env.LOG_LEVEL });
}
