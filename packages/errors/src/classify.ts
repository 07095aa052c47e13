import { AppError } from "./app-error.js";
import {
  AccessDeniedError,
  ExternalServiceError,
  QuotaExceededError,
  RequestValidationError,
  ResourceNotFoundError,
  ThrottlingError,
} from "./errors.js";
import type { ErrorExtras } from "./errors.js";

type BackendErrorClass = new (message?: string, options?: ErrorExtras) => AppError;

/**
 * SDK exception names, in the order they are matched against an error's
 * name and, failing that, its message.
 */
const EXCEPTION_CLASSES: ReadonlyArray<[string, BackendErrorClass]> = [
  ["AccessDeniedException", AccessDeniedError],
  ["ResourceNotFoundException", ResourceNotFoundError],
  ["ValidationException", RequestValidationError],
  ["ThrottlingException", ThrottlingError],
  ["ServiceQuotaExceededException", QuotaExceededError],
];

const STATUS_CLASSES: ReadonlyMap<number, BackendErrorClass> = new Map([
  [400, RequestValidationError],
  [401, AccessDeniedError],
  [403, AccessDeniedError],
  [404, ResourceNotFoundError],
  [422, RequestValidationError],
  [429, ThrottlingError],
]);

/**
 * HTTP status carried by an SDK error. Cohere errors expose `statusCode`,
 * Qdrant errors `status`, AWS errors `$metadata.httpStatusCode`.
 */
function readStatus(error: object): number | undefined {
  for (const field of ["statusCode", "status"]) {
    const value: unknown = Reflect.get(error, field);
    if (typeof value === "number") return value;
  }

  const metadata: unknown = Reflect.get(error, "$metadata");
  if (typeof metadata === "object" && metadata !== null) {
    const status: unknown = Reflect.get(metadata, "httpStatusCode");
    if (typeof status === "number") return status;
  }

  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Map an error thrown by a retrieval or generation backend onto the connector's
 * error taxonomy. Errors that are already {@link AppError}s pass through.
 */
export function classifyBackendError(error: unknown, service: string): AppError {
  if (AppError.isAppError(error)) return error;

  const message = messageOf(error);
  const name = error instanceof Error ? error.name : "";

  const byName =
    EXCEPTION_CLASSES.find(([exception]) => name === exception) ??
    EXCEPTION_CLASSES.find(([exception]) => message.includes(exception));
  if (byName) {
    const [, ErrorClass] = byName;
    return new ErrorClass(message, { service, cause: error });
  }

  const status = typeof error === "object" && error !== null ? readStatus(error) : undefined;
  const byStatus = status === undefined ? undefined : STATUS_CLASSES.get(status);
  if (byStatus) {
    return new byStatus(message, { service, cause: error, details: { status } });
  }

  return new ExternalServiceError(message, { service, cause: error });
}
