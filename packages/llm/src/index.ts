export type { ILanguageModel, CompletionOptions } from "./language-model.interface.js";
export {
  BedrockLanguageModel,
  assertClaude3Model,
  buildClaudeRequestBody,
} from "./bedrock-model.js";
export type { BedrockModelConfig, InvokeModelSender } from "./bedrock-model.js";
export { CohereLanguageModel } from "./cohere-model.js";
export type {
  CohereModelConfig,
  CohereChatClient,
  CohereChatRequest,
  CohereChatResult,
} from "./cohere-model.js";
export { createLanguageModel } from "./factory.js";
export type { LanguageModelRole } from "./factory.js";
