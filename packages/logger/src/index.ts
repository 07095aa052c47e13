/**
 * @kbconnect/logger
 *
 * Structured logging with credential redaction.
 */

export { createLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions, LogStream } from "./logger.js";
export { redactValue, isSensitiveKey, REDACT_PATHS } from "./redaction.js";
