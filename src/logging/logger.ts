import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const base: pino.LoggerOptions = { level, name: "cmdkit" };

  // pino refuses a transport and a destination stream together.
  if (config?.file) {
    return pino(base, pino.destination(config.file));
  }

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  if (isJson) {
    return pino(base);
  }

  return pino({
    ...base,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss" },
    },
  });
}
