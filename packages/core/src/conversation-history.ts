import type { ConversationTurn } from "@kbconnect/types";

export interface HistoryOptions {
  enabled: boolean;
  maxMessages: number;
}

/**
 * Render earlier turns as a "Previous conversation" block, keeping only the
 * most recent `maxMessages`. Empty string when disabled or nothing remains.
 */
export function formatConversationHistory(
  turns: ConversationTurn[],
  options: HistoryOptions,
): string {
  if (!options.enabled || options.maxMessages <= 0 || turns.length === 0) {
    return "";
  }

  const recent = turns.slice(-options.maxMessages);
  let block = "Previous conversation:\n\n";
  for (const turn of recent) {
    block += `${turn.role === "user" ? "User" : "Assistant"}: ${turn.content}\n\n`;
  }
  return `${block}\n`;
}

export interface SplitTranscript {
  question: string;
  history: ConversationTurn[];
}

/** The last message is the question; everything before it is history. */
export function splitTranscript(messages: ConversationTurn[]): SplitTranscript | undefined {
  const last = messages.at(-1);
  if (last === undefined) return undefined;
  return { question: last.content, history: messages.slice(0, -1) };
}
