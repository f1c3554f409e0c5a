import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

/** 1 = stdout, 2 = stderr. */
export type LogFd = 1 | 2;

export function createLogger(config?: Partial<LoggingConfig>, fd: LogFd = 1): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  if (config?.file) {
    return pino({ level }, pino.destination(config.file));
  }

  if (isJson) {
    return pino({ level }, pino.destination(fd));
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: fd },
    },
  });
}

/** Logger that discards everything; used where no logger is injected. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
