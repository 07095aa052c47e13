import type { MetadataFieldDefinition } from "./filter.js";

export type RetrievalBackendType = "bedrock" | "qdrant";

export type GenerationBackendType = "bedrock" | "cohere";

export interface ConnectorConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  retrievalBackend: RetrievalBackendType;
  generationBackend: GenerationBackendType;
  aws: AwsConfig;
  bedrock: BedrockConfig;
  qdrant: QdrantConfig;
  cohere: CohereConfig;
  generation: GenerationConfig;
  retrieval: RetrievalConfig;
  history: HistoryConfig;
  features: FeatureFlags;
  status: StatusConfig;
  metadataDefinitions: MetadataFieldDefinition[];
}

export interface AwsConfig {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
}

export interface BedrockConfig {
  knowledgeBaseId?: string;
  modelId: string;
  filterModelId: string;
  runtimeEndpointUrl?: string;
  agentRuntimeEndpointUrl?: string;
}

export interface QdrantConfig {
  url?: string;
  apiKey?: string;
  collection?: string;
}

export interface CohereConfig {
  apiKey?: string;
  embedModel: string;
  chatModel: string;
}

export interface GenerationConfig {
  maxTokens: number;
  temperature: number;
  topP: number;
}

export interface RetrievalConfig {
  numberOfResults: number;
}

export interface HistoryConfig {
  enabled: boolean;
  maxMessages: number;
}

export interface FeatureFlags {
  metadataFiltering: boolean;
  entityResolution: boolean;
  citations: boolean;
}

export interface StatusConfig {
  enabled: boolean;
  emitIntervalMs: number;
}
