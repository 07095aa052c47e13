import type {
  ConnectorConfig,
  ConversationTurn,
  MetadataFilter,
  RetrievedPassage,
  StatusSink,
} from "@kbconnect/types";
import type { ILanguageModel } from "@kbconnect/llm";
import { createLanguageModel } from "@kbconnect/llm";
import type { IRetrievalBackend } from "@kbconnect/retrieval";
import { createRetrievalBackend } from "@kbconnect/retrieval";
import { classifyBackendError, toUserMessage } from "@kbconnect/errors";
import { findConfigurationError } from "@kbconnect/config";
import type { Logger } from "@kbconnect/logger";
import { assemblePrompt } from "./context-assembler.js";
import { CitationAttributor } from "./citation-attributor.js";
import { formatConversationHistory, splitTranscript } from "./conversation-history.js";
import { DateTimeRangeResolver } from "./datetime-range-resolver.js";
import { EntityNameResolver } from "./entity-name-resolver.js";
import { extractFilterKeys } from "./filter-keys.js";
import { FilterSynthesizer } from "./filter-synthesizer.js";
import { StatusReporter } from "./status-reporter.js";

export const NO_RESULTS_MESSAGE = "I couldn't find any relevant information in the knowledge base.";
export const NO_MESSAGES_MESSAGE = "No messages found in the request body";

export interface QueryOrchestratorDeps {
  config: ConnectorConfig;
  answerModel: ILanguageModel;
  backend: IRetrievalBackend;
  synthesizer: FilterSynthesizer;
  attributor: CitationAttributor;
  logger: Logger;
  now?: () => number;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one question through filter synthesis, retrieval, prompt assembly,
 * generation and citation attribution, strictly in that order.
 */
export class QueryOrchestrator {
  private readonly config: ConnectorConfig;
  private readonly answerModel: ILanguageModel;
  private readonly backend: IRetrievalBackend;
  private readonly synthesizer: FilterSynthesizer;
  private readonly attributor: CitationAttributor;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: QueryOrchestratorDeps) {
    this.config = deps.config;
    this.answerModel = deps.answerModel;
    this.backend = deps.backend;
    this.synthesizer = deps.synthesizer;
    this.attributor = deps.attributor;
    this.logger = deps.logger.child({ component: "query-orchestrator" });
    this.now = deps.now ?? Date.now;
  }

  /**
   * Answer a chat transcript: the last message is the question. Resolves to
   * the answer or to a user-facing error string.
   */
  async respond(messages: ConversationTurn[], statusSink?: StatusSink): Promise<string> {
    const status = new StatusReporter(statusSink, this.config.status, this.logger, this.now);
    await status.emit("info", "Querying knowledge base...");

    const transcript = splitTranscript(messages);
    if (!transcript) {
      await status.emit("error", NO_MESSAGES_MESSAGE, true);
      return NO_MESSAGES_MESSAGE;
    }

    const configurationError = findConfigurationError(this.config);
    if (configurationError) {
      this.logger.error({ reason: configurationError }, "connector is not configured");
      await status.emit("error", configurationError, true);
      return configurationError;
    }

    if (this.config.history.enabled) {
      await status.emit("info", "Processing conversation history...");
    }
    await status.emit("info", "Retrieving information from knowledge base...");

    const answer = await this.handle(transcript.question, transcript.history);
    await status.emit("info", "Complete", true);
    return answer;
  }

  /** Never rejects: backend failures become user-facing strings. */
  async handle(query: string, history: ConversationTurn[]): Promise<string> {
    try {
      const filter = await this.synthesizer.synthesize(query, this.config.metadataDefinitions);
      this.logger.info({ filter }, "metadata filter resolved");

      const retrieved = await this.retrieve(query, filter);
      if (typeof retrieved === "string") {
        return retrieved;
      }
      this.logger.info({ count: retrieved.length }, "passages retrieved");

      const { prompt, hasContent } = assemblePrompt({
        passages: retrieved,
        filterKeys: extractFilterKeys(filter),
        query,
        history: formatConversationHistory(history, this.config.history),
      });
      if (!hasContent) {
        return NO_RESULTS_MESSAGE;
      }
      this.logger.debug({ prompt }, "answer prompt");

      let answer: string;
      try {
        answer = await this.answerModel.complete(prompt, {
          maxTokens: this.config.generation.maxTokens,
          temperature: this.config.generation.temperature,
          topP: this.config.generation.topP,
        });
      } catch (error) {
        const classified = classifyBackendError(error, this.answerModel.name);
        this.logger.error({ err: classified }, "answer generation failed");
        return toUserMessage(classified, "generation", { resourceId: this.answerModel.modelId });
      }

      return await this.attributor.attribute(answer, retrieved);
    } catch (error) {
      this.logger.error({ err: error }, "query failed");
      return `Error querying knowledge base: ${messageOf(error)}`;
    }
  }

  private async retrieve(
    query: string,
    filter: MetadataFilter | undefined,
  ): Promise<RetrievedPassage[] | string> {
    try {
      return await this.backend.retrieve({
        query,
        ...(filter ? { filter } : {}),
        numberOfResults: this.config.retrieval.numberOfResults,
        searchMode: "HYBRID",
      });
    } catch (error) {
      const classified = classifyBackendError(error, this.backend.name);
      this.logger.error({ err: classified }, "retrieval failed");
      return toUserMessage(classified, "retrieval", { resourceId: this.backend.resourceId });
    }
  }
}

/**
 * Wire an orchestrator from configuration. The answer model generates the
 * reply; the filter model serves the resolvers, synthesis and citations.
 */
export function createQueryOrchestrator(config: ConnectorConfig, logger: Logger): QueryOrchestrator {
  const filterModel = createLanguageModel(config, "filter");
  const dateResolver = new DateTimeRangeResolver({ model: filterModel, logger });
  const nameResolver = config.features.entityResolution
    ? new EntityNameResolver({ model: filterModel, logger })
    : undefined;

  return new QueryOrchestrator({
    config,
    answerModel: createLanguageModel(config, "answer"),
    backend: createRetrievalBackend(config),
    synthesizer: new FilterSynthesizer({
      model: filterModel,
      dateResolver,
      ...(nameResolver ? { nameResolver } : {}),
      logger,
      enabled: config.features.metadataFiltering,
    }),
    attributor: new CitationAttributor({
      model: filterModel,
      logger,
      enabled: config.features.citations,
    }),
    logger,
  });
}
