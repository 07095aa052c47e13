import { AppError } from "./app-error.js";

export interface ErrorExtras {
  service?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ConfigurationError extends AppError {
  constructor(message = "Connector is not configured", options?: ErrorExtras) {
    super({
      message,
      code: "CONFIGURATION_ERROR",
      ...options,
    });
  }
}

export class AccessDeniedError extends AppError {
  constructor(message = "Access denied", options?: ErrorExtras) {
    super({
      message,
      code: "ACCESS_DENIED",
      ...options,
    });
  }
}

export class ResourceNotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({
      message,
      code: "RESOURCE_NOT_FOUND",
      ...options,
    });
  }
}

export class RequestValidationError extends AppError {
  constructor(message = "Invalid request", options?: ErrorExtras) {
    super({
      message,
      code: "REQUEST_VALIDATION_FAILED",
      ...options,
    });
  }
}

export class ThrottlingError extends AppError {
  constructor(message = "Request throttled", options?: ErrorExtras) {
    super({
      message,
      code: "THROTTLED",
      ...options,
    });
  }
}

export class QuotaExceededError extends AppError {
  constructor(message = "Service quota exceeded", options?: ErrorExtras) {
    super({
      message,
      code: "QUOTA_EXCEEDED",
      ...options,
    });
  }
}

export class ExternalServiceError extends AppError {
  constructor(message = "External service error", options?: ErrorExtras) {
    super({
      message,
      code: "EXTERNAL_SERVICE_ERROR",
      ...options,
    });
  }
}
