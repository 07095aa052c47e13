import { ALWAYS_INCLUDE_METADATA } from "@kbconnect/types";
import type { RetrievedPassage } from "@kbconnect/types";

export interface AssemblePromptInput {
  passages: RetrievedPassage[];
  /** Metadata fields the active filter referenced. */
  filterKeys: ReadonlySet<string>;
  query: string;
  /** Pre-rendered conversation history block, or "". */
  history: string;
}

export interface AssembledPrompt {
  prompt: string;
  hasContent: boolean;
}

const METADATA_INSTRUCTION =
  "The following information was retrieved from a knowledge base. Each document may include " +
  "metadata such as its source and creation date; consider this metadata when judging how " +
  "relevant and current the context is for the question.";

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value) ?? String(value);
}

/**
 * Metadata entries worth showing for one passage: the always-included fields
 * plus those the filter used, in the passage's own key order.
 */
export function selectMetadata(
  metadata: Record<string, unknown>,
  filterKeys: ReadonlySet<string>,
): [string, unknown][] {
  const always = new Set<string>(ALWAYS_INCLUDE_METADATA);
  return Object.entries(metadata).filter(([field]) => always.has(field) || filterKeys.has(field));
}

function buildDocumentBlock(passage: RetrievedPassage, index: number, filterKeys: ReadonlySet<string>): string {
  const lines = [`Document ${String(index)}`];

  const metadata = selectMetadata(passage.metadata, filterKeys);
  if (metadata.length > 0) {
    lines.push("Metadata:");
    for (const [field, value] of metadata) {
      lines.push(`  - ${field}: ${formatValue(value)}`);
    }
  }
  if (passage.sourceUri) {
    lines.push(`Source: ${passage.sourceUri}`);
  }
  lines.push(passage.text);
  return lines.join("\n");
}

/**
 * Render passages with text as numbered document blocks. Numbers follow
 * retrieval position, so a skipped empty passage leaves a gap.
 */
export function buildContextBlock(
  passages: RetrievedPassage[],
  filterKeys: ReadonlySet<string>,
): string {
  return passages
    .map((passage, i) =>
      passage.text.trim() ? buildDocumentBlock(passage, i + 1, filterKeys) : undefined,
    )
    .filter((block): block is string => block !== undefined)
    .join("\n\n");
}

export function assemblePrompt(input: AssemblePromptInput): AssembledPrompt {
  const context = buildContextBlock(input.passages, input.filterKeys);
  if (!context) {
    return { prompt: "", hasContent: false };
  }

  const prompt =
    `${input.history}${METADATA_INSTRUCTION}\n\n${context}\n\n` +
    `Based on this information, please answer the following question:\n${input.query}\n\n` +
    "If the information doesn't contain a clear answer, please say so.";

  return { prompt, hasContent: true };
}
