import type { ConnectorConfig } from "@kbconnect/types";
import { buildAwsClientOptions } from "@kbconnect/config";
import { createQueryEmbedder } from "@kbconnect/embeddings";
import { ConfigurationError } from "@kbconnect/errors";
import type { IRetrievalBackend } from "./retrieval-backend.interface.js";
import { BedrockKnowledgeBaseBackend } from "./bedrock-kb-backend.js";
import { QdrantBackend } from "./qdrant-backend.js";

export function createRetrievalBackend(config: ConnectorConfig): IRetrievalBackend {
  switch (config.retrievalBackend) {
    case "bedrock":
      if (!config.bedrock.knowledgeBaseId) {
        throw new ConfigurationError("KNOWLEDGE_BASE_ID is required for the Bedrock retrieval backend");
      }
      return new BedrockKnowledgeBaseBackend({
        knowledgeBaseId: config.bedrock.knowledgeBaseId,
        clientOptions: buildAwsClientOptions(config.aws, config.bedrock.agentRuntimeEndpointUrl),
      });
    case "qdrant": {
      const { url, apiKey, collection } = config.qdrant;
      if (!url || !collection) {
        throw new ConfigurationError("QDRANT_URL and QDRANT_COLLECTION are required for Qdrant");
      }
      if (!config.cohere.apiKey) {
        throw new ConfigurationError("COHERE_API_KEY is required for Qdrant query embeddings");
      }
      return new QdrantBackend({
        url,
        apiKey,
        collection,
        embeddings: createQueryEmbedder(config.cohere),
      });
    }
    default:
      throw new ConfigurationError(`Unknown retrieval backend: ${String(config.retrievalBackend)}`);
  }
}
