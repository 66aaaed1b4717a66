import pino, { type BaseLogger } from "pino";

/**
 * Logging surface used by the core. Both a pino logger and Fastify's
 * `app.log` satisfy it.
 */
export type Logger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? "info" });
}
