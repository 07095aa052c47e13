import type { CompletionOptions, ILanguageModel } from "@kbconnect/llm";
import type { IRetrievalBackend, RetrieveParams } from "@kbconnect/retrieval";
import type { RetrievedPassage } from "@kbconnect/types";

export type ScriptedReply = string | Error | ((prompt: string) => string);

export interface RecordedCompletion {
  prompt: string;
  options: CompletionOptions;
}

/**
 * In-process language model that answers from a script, one reply per call.
 * Calls past the end of the script reject.
 */
export class ScriptedLanguageModel implements ILanguageModel {
  readonly name = "scripted";
  readonly calls: RecordedCompletion[] = [];

  constructor(
    private readonly replies: ScriptedReply[],
    readonly modelId = "scripted-model",
  ) {}

  complete(prompt: string, options: CompletionOptions): Promise<string> {
    const reply = this.replies[this.calls.length];
    this.calls.push({ prompt, options });
    if (reply === undefined) {
      return Promise.reject(new Error(`No scripted reply for call ${String(this.calls.length)}`));
    }
    if (reply instanceof Error) {
      return Promise.reject(reply);
    }
    return Promise.resolve(typeof reply === "function" ? reply(prompt) : reply);
  }
}

/** In-process retrieval backend returning fixed passages, or failing with a fixed error. */
export class StaticRetrievalBackend implements IRetrievalBackend {
  readonly name = "static";
  readonly calls: RetrieveParams[] = [];

  constructor(
    private readonly result: RetrievedPassage[] | Error,
    readonly resourceId = "KB-TEST",
  ) {}

  retrieve(params: RetrieveParams): Promise<RetrievedPassage[]> {
    this.calls.push(params);
    return this.result instanceof Error ? Promise.reject(this.result) : Promise.resolve(this.result);
  }
}
