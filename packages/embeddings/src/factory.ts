import type { CohereConfig } from "@kbconnect/types";
import { ConfigurationError } from "@kbconnect/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";

/** Query embedder for vector retrieval; only Cohere is wired. */
export function createQueryEmbedder(cohere: CohereConfig): IEmbeddingProvider {
  if (!cohere.apiKey) {
    throw new ConfigurationError("COHERE_API_KEY is required for query embeddings");
  }
  return new CohereEmbeddingProvider({ apiKey: cohere.apiKey, model: cohere.embedModel });
}
