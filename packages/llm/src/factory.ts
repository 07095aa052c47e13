import type { ConnectorConfig } from "@kbconnect/types";
import { buildAwsClientOptions } from "@kbconnect/config";
import { ConfigurationError } from "@kbconnect/errors";
import type { ILanguageModel } from "./language-model.interface.js";
import { BedrockLanguageModel } from "./bedrock-model.js";
import { CohereLanguageModel } from "./cohere-model.js";

export type LanguageModelRole = "answer" | "filter";

/**
 * Build the model used for a given role. Answers use MODEL_ID; filter, date,
 * name and citation extraction use FILTER_MODEL_ID. On Cohere both roles share
 * the configured chat model.
 */
export function createLanguageModel(
  config: ConnectorConfig,
  role: LanguageModelRole = "answer",
): ILanguageModel {
  switch (config.generationBackend) {
    case "bedrock":
      return new BedrockLanguageModel({
        modelId: role === "answer" ? config.bedrock.modelId : config.bedrock.filterModelId,
        clientOptions: buildAwsClientOptions(config.aws, config.bedrock.runtimeEndpointUrl),
      });
    case "cohere":
      if (!config.cohere.apiKey) {
        throw new ConfigurationError("Cohere API key is required when generation backend is 'cohere'");
      }
      return new CohereLanguageModel({ apiKey: config.cohere.apiKey, model: config.cohere.chatModel });
    default:
      throw new ConfigurationError(`Unknown generation backend: ${String(config.generationBackend)}`);
  }
}
