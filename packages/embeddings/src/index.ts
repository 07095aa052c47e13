export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type {
  CohereProviderConfig,
  CohereEmbedClient,
  CohereEmbedRequest,
  CohereEmbedResult,
} from "./cohere-provider.js";
export { createQueryEmbedder } from "./factory.js";
