import type { ConnectorConfig } from "@kbconnect/types";

export const MISSING_AWS_CREDENTIALS_MESSAGE =
  "AWS credentials are not configured. Please set AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY.";

/**
 * Returns the first configuration problem that would make a backend call
 * fail, or undefined when the selected backends have what they need.
 */
export function findConfigurationError(config: ConnectorConfig): string | undefined {
  const usesBedrock =
    config.retrievalBackend === "bedrock" || config.generationBackend === "bedrock";

  if (usesBedrock && (!config.aws.accessKeyId || !config.aws.secretAccessKey)) {
    return MISSING_AWS_CREDENTIALS_MESSAGE;
  }

  if (config.retrievalBackend === "bedrock" && !config.bedrock.knowledgeBaseId) {
    return "Knowledge base ID is not configured. Please set KNOWLEDGE_BASE_ID.";
  }

  if (config.retrievalBackend === "qdrant") {
    if (!config.qdrant.url) {
      return "Qdrant is not configured. Please set QDRANT_URL.";
    }
    if (!config.qdrant.collection) {
      return "Qdrant collection is not configured. Please set QDRANT_COLLECTION.";
    }
    if (!config.cohere.apiKey) {
      return "Cohere API key is not configured. Please set COHERE_API_KEY.";
    }
  }

  if (config.generationBackend === "cohere" && !config.cohere.apiKey) {
    return "Cohere API key is not configured. Please set COHERE_API_KEY.";
  }

  return undefined;
}
