/**
 * Centralized pino logger factory for stratify.
 *
 * Every logger writes JSON lines to ~/.stratify/logs/<name>.log. With
 * `verbose`, entries are also pretty-printed to stderr so stdout stays free
 * for command output.
 *
 * Configuration:
 *   - LOG_LEVEL env var overrides the configured level
 *   - LOG_DIR env var overrides the log directory
 */

import { join } from "node:path";
import { pino, type Logger } from "pino";
import type { LogLevel } from "../core/types.js";
import { LOGS_DIR } from "../storage/paths.js";

export type { Logger };

export interface LoggerOptions {
  /** Level from config; LOG_LEVEL wins when set */
  level?: LogLevel;

  /** Also pretty-print to stderr */
  verbose?: boolean;

  /** Log directory (defaults to LOG_DIR or ~/.stratify/logs) */
  logDir?: string;
}

/**
 * Create a logger writing to `<logDir>/<name>.log`, plus stderr when verbose.
 * The file transport creates the directory on first write.
 *
 * @param name - Logger name (appears in log entries and names the file)
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const level = process.env.LOG_LEVEL || options.level || "info";
  const logDir = options.logDir || process.env.LOG_DIR || LOGS_DIR;

  return pino({
    name,
    level,
    transport: {
      targets: [
        ...(options.verbose
          ? [
              {
                target: "pino-pretty",
                options: {
                  colorize: true,
                  destination: 2,
                  translateTime: "HH:MM:ss",
                  ignore: "pid,hostname",
                },
                level,
              },
            ]
          : []),
        {
          target: "pino/file",
          options: { destination: join(logDir, `${name}.log`), mkdir: true },
          level,
        },
      ],
    },
  });
}

/**
 * Logger that discards everything; the default for library use and tests.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
