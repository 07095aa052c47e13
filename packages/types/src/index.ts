export {
  COMPARISON_OPERATORS,
  SYNTHESIS_OPERATORS,
  ALWAYS_INCLUDE_METADATA,
} from "./filter.js";
export type {
  ComparisonOperator,
  LogicalOperator,
  FilterOperator,
  FilterScalar,
  FilterValue,
  FilterCondition,
  ConditionFilter,
  AndAllFilter,
  OrAllFilter,
  MetadataFilter,
  MetadataFieldType,
  MetadataFieldDefinition,
} from "./filter.js";
export { visitFilter, conditionFilter } from "./filter-visitor.js";
export type { FilterVisitor } from "./filter-visitor.js";
export type {
  SearchMode,
  RetrievedPassage,
  CitationSpan,
  ConversationRole,
  ConversationTurn,
} from "./passage.js";
export type { DateTimeRange, NameReference } from "./resolution.js";
export type { StatusLevel, StatusEvent, StatusSink } from "./status.js";
export type {
  RetrievalBackendType,
  GenerationBackendType,
  ConnectorConfig,
  AwsConfig,
  BedrockConfig,
  QdrantConfig,
  CohereConfig,
  GenerationConfig,
  RetrievalConfig,
  HistoryConfig,
  FeatureFlags,
  StatusConfig,
} from "./config.js";
