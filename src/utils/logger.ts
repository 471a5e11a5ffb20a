import winston from "winston";
import { ConfigManager } from "../config";

/** winston's npm levels, most severe first */
export const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const lineFormat = winston.format.printf(({ level, message, timestamp }) => {
  return `${String(timestamp)} canonical-digest ${level}: ${String(message)}`;
});

let logger: winston.Logger | null = null;

function getLogger(): winston.Logger {
  if (logger) return logger;
  // the level is read once; resetLogger picks up a reloaded config
  logger = winston.createLogger({
    level: ConfigManager.isLoaded ? ConfigManager.cfg.logLevel : "info",
    format: winston.format.combine(winston.format.timestamp(), lineFormat),
    // stdout carries command output only
    transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
    exitOnError: false,
  });
  return logger;
}

function write(level: "warn" | "info" | "debug", message: string): void {
  getLogger().log(level, message);
}

export const log = {
  warn: (message: string) => write("warn", message),
  info: (message: string) => write("info", message),
  debug: (message: string) => write("debug", message),
};

/** Drop the cached logger so the next call picks up a new log level */
export function resetLogger(): void {
  logger = null;
}
