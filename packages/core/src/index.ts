export {
  QueryOrchestrator,
  createQueryOrchestrator,
  NO_RESULTS_MESSAGE,
  NO_MESSAGES_MESSAGE,
} from "./query-orchestrator.js";
export type { QueryOrchestratorDeps } from "./query-orchestrator.js";

export {
  DateTimeRangeResolver,
  parseDateTime,
  parseDateTimeRange,
  formatIsoSeconds,
} from "./datetime-range-resolver.js";
export type {
  DateTimeRangeResolverDeps,
  ParsedDateTime,
  ParsedDateTimeRange,
} from "./datetime-range-resolver.js";

export { EntityNameResolver, parseNameElements } from "./entity-name-resolver.js";
export type { EntityNameResolverDeps } from "./entity-name-resolver.js";

export { FilterSynthesizer, annotateQuery } from "./filter-synthesizer.js";
export type { FilterSynthesizerDeps } from "./filter-synthesizer.js";

export { parseMetadataFilter, findUndeclaredKeys } from "./filter-validator.js";
export { extractFilterKeys } from "./filter-keys.js";

export { assemblePrompt, buildContextBlock, selectMetadata } from "./context-assembler.js";
export type { AssemblePromptInput, AssembledPrompt } from "./context-assembler.js";

export { CitationAttributor, applyCitations, formatCitationList } from "./citation-attributor.js";
export type { CitationAttributorDeps, PlacedCitations } from "./citation-attributor.js";

export { formatConversationHistory, splitTranscript } from "./conversation-history.js";
export type { HistoryOptions, SplitTranscript } from "./conversation-history.js";

export { StatusReporter } from "./status-reporter.js";
export { parseModelJson, stripCodeFence } from "./model-json.js";
