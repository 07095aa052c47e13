export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
  topP?: number;
}

export interface ILanguageModel {
  readonly name: string;
  readonly modelId: string;

  /** Single-turn completion: one user prompt in, the model's text out. */
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}
