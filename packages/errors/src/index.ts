export { AppError } from "./app-error.js";
export type { AppErrorOptions, ErrorCode } from "./app-error.js";

export {
  ConfigurationError,
  AccessDeniedError,
  ResourceNotFoundError,
  RequestValidationError,
  ThrottlingError,
  QuotaExceededError,
  ExternalServiceError,
} from "./errors.js";
export type { ErrorExtras } from "./errors.js";

export { classifyBackendError } from "./classify.js";
export { toUserMessage } from "./user-message.js";
export type { BackendStage, UserMessageContext } from "./user-message.js";
