import { z } from "zod";
import type { CitationSpan, RetrievedPassage } from "@kbconnect/types";
import type { ILanguageModel } from "@kbconnect/llm";
import type { Logger } from "@kbconnect/logger";
import { parseModelJson } from "./model-json.js";
import { buildCitationPrompt } from "./prompts.js";

const PREVIEW_LENGTH = 50;

const citationResponseSchema = z.object({
  citations: z.array(
    z.object({
      answer_text: z.string(),
      chunk_ids: z.array(z.number().int()),
    }),
  ),
});

export interface PlacedCitations {
  text: string;
  /** Chunk ids that received at least one marker, ascending. */
  referenced: number[];
}

/**
 * Insert `[id]` markers after the first occurrence of each cited span in the
 * original answer, so overlapping spans are all placed. Markers for spans
 * ending at the same offset are joined in span order. Spans missing from the
 * answer and ids outside 1..passageCount are skipped.
 */
export function applyCitations(
  answer: string,
  spans: CitationSpan[],
  passageCount: number,
): PlacedCitations {
  const insertions = new Map<number, string>();
  const referenced = new Set<number>();

  for (const span of spans) {
    const ids = [...new Set(span.chunkIds)].filter((id) => id >= 1 && id <= passageCount);
    if (!span.answerText || ids.length === 0) continue;

    const at = answer.indexOf(span.answerText);
    if (at === -1) continue;

    const end = at + span.answerText.length;
    const markers = ids.map((id) => `[${String(id)}]`).join("");
    insertions.set(end, (insertions.get(end) ?? "") + markers);
    for (const id of ids) referenced.add(id);
  }

  let text = answer;
  for (const [end, markers] of [...insertions].sort(([a], [b]) => b - a)) {
    text = `${text.slice(0, end)}${markers}${text.slice(end)}`;
  }

  return { text, referenced: [...referenced].sort((a, b) => a - b) };
}

function sourceOf(passage: RetrievedPassage): string {
  if (passage.sourceUri) return passage.sourceUri;
  const fromMetadata = passage.metadata["source_uri"];
  return typeof fromMetadata === "string" && fromMetadata ? fromMetadata : "Unknown";
}

/** First PREVIEW_LENGTH code points; surrogate pairs are never split. */
function previewOf(text: string): string {
  const chars = [...text];
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join("")}...` : text;
}

export function formatCitationList(ids: number[], passages: RetrievedPassage[]): string {
  const lines: string[] = [];
  for (const id of ids) {
    const passage = passages[id - 1];
    if (!passage) continue;
    const uri = sourceOf(passage);
    lines.push(`${String(id)}. "${previewOf(passage.text)}" - [${uri}](${uri})`);
  }
  return `\n\n---\n**Citations:**\n${lines.join("\n")}`;
}

export interface CitationAttributorDeps {
  model: ILanguageModel;
  logger: Logger;
  enabled: boolean;
}

export class CitationAttributor {
  private readonly model: ILanguageModel;
  private readonly logger: Logger;
  private readonly enabled: boolean;

  constructor(deps: CitationAttributorDeps) {
    this.model = deps.model;
    this.logger = deps.logger.child({ component: "citation-attributor" });
    this.enabled = deps.enabled;
  }

  /**
   * Annotate the answer with inline chunk markers and a source list.
   * Resolves to the answer unchanged when nothing can be attributed.
   */
  async attribute(answer: string, passages: RetrievedPassage[]): Promise<string> {
    if (!this.enabled || passages.length === 0) {
      return answer;
    }

    try {
      const text = await this.model.complete(buildCitationPrompt(answer, passages), {
        maxTokens: 2048,
        temperature: 0.1,
      });
      this.logger.debug({ output: text }, "citation attribution output");

      const response = citationResponseSchema.parse(parseModelJson(text));
      const spans: CitationSpan[] = response.citations.map((citation) => ({
        answerText: citation.answer_text,
        chunkIds: citation.chunk_ids,
      }));

      const placed = applyCitations(answer, spans, passages.length);
      if (placed.referenced.length === 0) {
        return answer;
      }
      return placed.text + formatCitationList(placed.referenced, passages);
    } catch (error) {
      this.logger.warn({ err: error }, "citation attribution failed; returning the plain answer");
      return answer;
    }
  }
}
