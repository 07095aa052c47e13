export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "ACCESS_DENIED"
  | "RESOURCE_NOT_FOUND"
  | "REQUEST_VALIDATION_FAILED"
  | "THROTTLED"
  | "QUOTA_EXCEEDED"
  | "EXTERNAL_SERVICE_ERROR";

export interface AppErrorOptions {
  message: string;
  code: ErrorCode;
  /** Backend the failure came from, e.g. "bedrock-kb" or "qdrant". */
  service?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every failure the connector classifies. `code` drives the
 * user-facing message; `cause` keeps the original SDK error for logs.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly service: string | undefined;
  readonly details: Record<string, unknown> | undefined;

  constructor(options: AppErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.service = options.service;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
