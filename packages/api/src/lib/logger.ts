import { pino, type LoggerOptions } from "pino";
import type { AppConfig } from "./config.js";

interface LogMethod {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

/**
 * The slice of pino the services use. Both a pino instance and Fastify's
 * `app.log` satisfy it.
 */
export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  child(bindings: Record<string, unknown>): Logger;
}

export function loggerOptions(config: Pick<AppConfig, "logLevel" | "env">): LoggerOptions {
  return {
    level: config.logLevel,
    base: { service: "caseflow-api", env: config.env },
    redact: ["req.headers.authorization"],
  };
}

export function createLogger(config: Pick<AppConfig, "logLevel" | "env">): Logger {
  return pino(loggerOptions(config));
}
