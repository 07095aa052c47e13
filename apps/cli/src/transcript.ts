import { z } from "zod";
import type { ConversationTurn } from "@kbconnect/types";

const transcriptSchema = z.array(
  z.object({
    role: z.enum(["user", "assistant"]),
    content: z.string(),
  }),
);

/** Parse a chat transcript file's contents. Throws a ZodError or SyntaxError. */
export function parseTranscript(json: string): ConversationTurn[] {
  return transcriptSchema.parse(JSON.parse(json));
}
