import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export type LoggerOptions = {
  level?: string;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "pr-integrator",
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
