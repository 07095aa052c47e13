export type SearchMode = "HYBRID" | "SEMANTIC";

export interface RetrievedPassage {
  text: string;
  metadata: Record<string, unknown>;
  sourceUri?: string;
  score?: number;
}

export interface CitationSpan {
  answerText: string;
  /** 1-based positions into the retrieved passage list. */
  chunkIds: number[];
}

export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}
