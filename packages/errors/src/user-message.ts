import type { AppError } from "./app-error.js";

export type BackendStage = "retrieval" | "generation";

export interface UserMessageContext {
  /** Knowledge base id for retrieval, model id for generation. */
  resourceId?: string;
}

/**
 * Render a classified backend error as the string returned to the user in
 * place of an answer.
 */
export function toUserMessage(
  error: AppError,
  stage: BackendStage,
  context: UserMessageContext = {},
): string {
  const resource = context.resourceId ?? "unknown";

  if (stage === "retrieval") {
    switch (error.code) {
      case "ACCESS_DENIED":
        return "Error: Access denied to the knowledge base. Please check your credentials and permissions.";
      case "RESOURCE_NOT_FOUND":
        return `Error: Knowledge base '${resource}' not found. Please check your knowledge base ID.`;
      case "REQUEST_VALIDATION_FAILED":
        return "Error: Invalid request to the knowledge base. Please check your parameters.";
      case "THROTTLED":
        return "Error: The knowledge base request was throttled. Please try again later.";
      case "QUOTA_EXCEEDED":
        return "Error: Knowledge base service quota exceeded. Please try again later or request a quota increase.";
      default:
        return `Knowledge base error: ${error.message}`;
    }
  }

  switch (error.code) {
    case "ACCESS_DENIED":
      return "Error: Access denied to the language model. Please check your credentials and permissions.";
    case "RESOURCE_NOT_FOUND":
      return `Error: Model '${resource}' not found. Please check your model ID.`;
    case "REQUEST_VALIDATION_FAILED":
      return `Error: Invalid request to the language model. Please check your model ID and parameters. Details: ${error.message}`;
    case "THROTTLED":
      return "Error: The language model request was throttled. Please try again later.";
    case "QUOTA_EXCEEDED":
      return "Error: Language model service quota exceeded. Please try again later or request a quota increase.";
    default:
      return `Language model error: ${error.message}`;
  }
}
