export type { IRetrievalBackend, RetrieveParams } from "./retrieval-backend.interface.js";
export {
  BedrockKnowledgeBaseBackend,
  toRetrievalFilter,
  toPassage,
} from "./bedrock-kb-backend.js";
export type {
  BedrockKnowledgeBaseConfig,
  KnowledgeBaseResult,
  RetrieveSender,
} from "./bedrock-kb-backend.js";
export { QdrantBackend } from "./qdrant-backend.js";
export type {
  QdrantBackendConfig,
  QdrantPoint,
  QdrantSearchClient,
  QdrantSearchRequest,
} from "./qdrant-backend.js";
export { toQdrantFilter } from "./qdrant-filter.js";
export { keywordRank, reciprocalRankFusion, tokenize } from "./rank-fusion.js";
export type { FusedResult } from "./rank-fusion.js";
export { createRetrievalBackend } from "./factory.js";
