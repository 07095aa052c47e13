import { CohereClient } from "cohere-ai";
import { LazyClient } from "@kbconnect/config";
import type { CompletionOptions, ILanguageModel } from "./language-model.interface.js";

const DEFAULT_MODEL = "command-r-plus";

export interface CohereChatRequest {
  model: string;
  messages: { role: "user"; content: string }[];
  maxTokens: number;
  temperature: number;
  p?: number;
}

export interface CohereChatResult {
  message: { content?: { type: string; text?: string }[] };
}

/** The slice of Cohere's v2 client this adapter calls. */
export interface CohereChatClient {
  chat(request: CohereChatRequest): Promise<CohereChatResult>;
}

export interface CohereModelConfig {
  apiKey: string;
  model?: string;
  client?: CohereChatClient;
}

export class CohereLanguageModel implements ILanguageModel {
  readonly name = "cohere";
  readonly modelId: string;
  private client: LazyClient<CohereChatClient>;

  constructor(config: CohereModelConfig) {
    this.modelId = config.model ?? DEFAULT_MODEL;
    const injected = config.client;
    this.client = new LazyClient<CohereChatClient>(
      () => injected ?? new CohereClient({ token: config.apiKey }).v2,
    );
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await this.client.get().chat({
      model: this.modelId,
      messages: [{ role: "user", content: prompt }],
      maxTokens: options.maxTokens,
      temperature: options.temperature,
      ...(options.topP === undefined ? {} : { p: options.topP }),
    });

    return (response.message.content ?? [])
      .map((item) => (item.type === "text" && item.text !== undefined ? item.text : ""))
      .join("");
  }
}
