import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: LoggingConfig): Logger {
  const options: pino.LoggerOptions = {
    level: config?.level ?? "info",
    name: "warden",
    redact: ["token", "admin.token", "authorization"],
  };

  // pino takes either a transport or a destination stream, not both
  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  if (isJson) {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss" },
    },
  });
}

export function componentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}

/** Warnings and errors only, on stderr, so command output stays clean. */
export function createCliLogger(): Logger {
  return pino({ level: "warn", name: "warden" }, pino.destination(2));
}
