/**
 * Shared winston logger. Console lines go to stderr tagged with the caller's
 * `module` meta; setting LOG_DIR adds a JSON-lines file.
 */
import path from "node:path";
import winston from "winston";

export interface ConsoleInfo {
  level: string;
  message: unknown;
  timestamp?: unknown;
  module?: unknown;
  stack?: unknown;
}

/** `12:00:00 info: [sync] message`, followed by the stack for errors */
export function consoleLine({ level, message, timestamp, module: mod, stack }: ConsoleInfo): string {
  const tag = mod ? ` [${String(mod)}]` : "";
  const line = `${String(timestamp)} ${level}:${tag} ${String(message)}`;
  return stack ? `${line}\n${String(stack)}` : line;
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize(), winston.format.printf(consoleLine)),
    // stdout carries command output only
    stderrLevels: Object.keys(winston.config.npm.levels),
  }),
];

const logDir = process.env.LOG_DIR;
if (logDir) {
  transports.push(new winston.transports.File({
    filename: path.join(logDir, "coach.log"),
    format: winston.format.json(),
    maxsize: 5 * 1024 * 1024,
    maxFiles: 3,
  }));
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp({ format: "HH:mm:ss" }),
    winston.format.errors({ stack: true }),
  ),
  transports,
});

/** Raise or lower the level at run time (CLI `--verbose`). */
export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
