import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { LazyClient } from "@kbconnect/config";
import type { AwsClientOptions } from "@kbconnect/config";
import { ExternalServiceError, RequestValidationError } from "@kbconnect/errors";
import type { CompletionOptions, ILanguageModel } from "./language-model.interface.js";

const CLAUDE_3_FAMILY = "anthropic.claude-3";
const ANTHROPIC_VERSION = "bedrock-2023-05-31";

/** The slice of the Bedrock runtime client this adapter calls. */
export interface InvokeModelSender {
  send(command: InvokeModelCommand): Promise<{ body?: Uint8Array }>;
}

export interface BedrockModelConfig {
  modelId: string;
  clientOptions: AwsClientOptions;
  client?: InvokeModelSender;
}

export function assertClaude3Model(modelId: string): void {
  if (!modelId.toLowerCase().includes(CLAUDE_3_FAMILY)) {
    throw new RequestValidationError(
      `Unsupported model ID: ${modelId}. Only Claude 3 models are supported.`,
      { service: "bedrock-runtime" },
    );
  }
}

export function buildClaudeRequestBody(prompt: string, options: CompletionOptions) {
  return {
    anthropic_version: ANTHROPIC_VERSION,
    max_tokens: options.maxTokens,
    temperature: options.temperature,
    ...(options.topP === undefined ? {} : { top_p: options.topP }),
    messages: [{ role: "user", content: prompt }],
  };
}

function readClaudeText(payload: unknown): string {
  const content: unknown =
    typeof payload === "object" && payload !== null ? Reflect.get(payload, "content") : undefined;
  const first: unknown = Array.isArray(content) ? content[0] : undefined;
  const text: unknown =
    typeof first === "object" && first !== null ? Reflect.get(first, "text") : undefined;
  if (typeof text !== "string") {
    throw new ExternalServiceError("Model response did not contain text content", {
      service: "bedrock-runtime",
    });
  }
  return text;
}

/**
 * Claude 3 models served by Bedrock's InvokeModel API, using the Anthropic
 * messages request format.
 */
export class BedrockLanguageModel implements ILanguageModel {
  readonly name = "bedrock";
  readonly modelId: string;
  private client: LazyClient<InvokeModelSender>;

  constructor(config: BedrockModelConfig) {
    this.modelId = config.modelId;
    const injected = config.client;
    this.client = new LazyClient<InvokeModelSender>(
      () => injected ?? new BedrockRuntimeClient(config.clientOptions),
    );
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    assertClaude3Model(this.modelId);

    const response = await this.client.get().send(
      new InvokeModelCommand({
        modelId: this.modelId,
        contentType: "application/json",
        accept: "application/json",
        body: JSON.stringify(buildClaudeRequestBody(prompt, options)),
      }),
    );

    if (!response.body) {
      throw new ExternalServiceError("Model response had no body", { service: "bedrock-runtime" });
    }
    const payload: unknown = JSON.parse(new TextDecoder().decode(response.body));
    return readClaudeText(payload);
  }
}
