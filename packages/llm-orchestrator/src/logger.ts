import { pino } from "pino";
import type { BaseLogger } from "pino";

/**
 * Any pino-compatible logger. Fastify's `app.log` satisfies it, so the
 * gateway hands its request logger straight to the coordinator.
 */
export interface Logger extends BaseLogger {
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  name?: string;
  level?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "conduit",
    level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
  });
}
