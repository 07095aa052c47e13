import { z } from "zod";
import type { NameReference } from "@kbconnect/types";
import type { ILanguageModel } from "@kbconnect/llm";
import type { Logger } from "@kbconnect/logger";
import { parseModelJson } from "./model-json.js";
import { buildNameExtractionPrompt } from "./prompts.js";

const HONORIFIC =
  /^(?:dr|doctor|prof|professor|mr|mrs|ms|miss|sir|dame|rev|reverend|capt|captain)(?:\.\s*|\s+|$)/i;

/**
 * Split a person's name into independently matchable tokens. Leading titles
 * are removed; the remaining tokens keep their case and order.
 *
 * @example parseNameElements("Prof. Mary Jane Watson") // ["Mary", "Jane", "Watson"]
 */
export function parseNameElements(name: string): string[] {
  let remaining = name.trim();
  let title = HONORIFIC.exec(remaining);
  while (title !== null) {
    remaining = remaining.slice(title[0].length).trimStart();
    title = HONORIFIC.exec(remaining);
  }
  return remaining.split(/\s+/).filter((element) => element.length > 0);
}

const extractedNameSchema = z.object({
  original: z.string(),
  context: z.string().optional(),
});

export interface EntityNameResolverDeps {
  model: ILanguageModel;
  logger: Logger;
}

export class EntityNameResolver {
  private readonly model: ILanguageModel;
  private readonly logger: Logger;

  constructor(deps: EntityNameResolverDeps) {
    this.model = deps.model;
    this.logger = deps.logger.child({ component: "entity-name-resolver" });
  }

  /** Names the model finds in the query, split into elements. Never rejects. */
  async extractNames(query: string): Promise<NameReference[]> {
    let raw: unknown;
    try {
      const text = await this.model.complete(buildNameExtractionPrompt(query), {
        maxTokens: 512,
        temperature: 0.1,
      });
      this.logger.debug({ output: text }, "name extraction output");
      raw = parseModelJson(text);
    } catch (error) {
      this.logger.warn({ err: error }, "name extraction failed");
      return [];
    }

    if (!Array.isArray(raw)) return [];

    const names: NameReference[] = [];
    for (const item of raw) {
      const parsed = extractedNameSchema.safeParse(item);
      if (!parsed.success) continue;
      const elements = parseNameElements(parsed.data.original);
      if (elements.length === 0) continue;
      const reference: NameReference = { original: parsed.data.original, elements };
      if (parsed.data.context) reference.context = parsed.data.context;
      names.push(reference);
    }
    return names;
  }
}
