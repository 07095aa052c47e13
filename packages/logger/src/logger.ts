/**
 * pino loggers for the connector. Pretty output in development, JSON lines
 * otherwise; credential fields are always redacted.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redaction.js";

export type Logger = PinoLogger;

export type LogStream = "stdout" | "stderr";

export interface CreateLoggerOptions {
  /** Defaults to "debug" when NODE_ENV is "development", "info" otherwise. */
  level?: string;
  /** Bound as `name` on every line. */
  service?: string;
  silent?: boolean;
  /** Where lines go. A CLI that prints results on stdout logs to stderr. */
  stream?: LogStream;
  /** Defaults to NODE_ENV === "development". */
  pretty?: boolean;
}

const FILE_DESCRIPTORS: Record<LogStream, number> = { stdout: 1, stderr: 2 };

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  if (options.silent) {
    return pino({ level: "silent" });
  }

  const development = process.env["NODE_ENV"] === "development";
  const fd = FILE_DESCRIPTORS[options.stream ?? "stdout"];
  const loggerOptions: pino.LoggerOptions = {
    level: options.level ?? (development ? "debug" : "info"),
    name: options.service ?? "kbconnect",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.pretty ?? development) {
    return pino({
      ...loggerOptions,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname", destination: fd },
      },
    });
  }

  return pino(loggerOptions, pino.destination(fd));
}
