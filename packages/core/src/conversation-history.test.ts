import { describe, it, expect } from "vitest";
import type { ConversationTurn } from "@kbconnect/types";
import { formatConversationHistory, splitTranscript } from "./conversation-history.js";

const turns: ConversationTurn[] = [
  { role: "user", content: "What is our leave policy?" },
  { role: "assistant", content: "25 days per year." },
  { role: "user", content: "And for part-time staff?" },
  { role: "assistant", content: "Pro-rated." },
];

describe("formatConversationHistory", () => {
  it("renders every turn within the limit", () => {
    expect(formatConversationHistory(turns.slice(0, 2), { enabled: true, maxMessages: 10 })).toBe(
      "Previous conversation:\n\nUser: What is our leave policy?\n\nAssistant: 25 days per year.\n\n\n",
    );
  });

  it("keeps only the most recent turns", () => {
    expect(formatConversationHistory(turns, { enabled: true, maxMessages: 2 })).toBe(
      "Previous conversation:\n\nUser: And for part-time staff?\n\nAssistant: Pro-rated.\n\n\n",
    );
  });

  it.each([
    ["disabled", { enabled: false, maxMessages: 10 }, turns],
    ["a zero limit", { enabled: true, maxMessages: 0 }, turns],
    ["no turns", { enabled: true, maxMessages: 10 }, []],
  ])("is empty when %s", (_label, options, input) => {
    expect(formatConversationHistory(input, options)).toBe("");
  });
});

describe("splitTranscript", () => {
  it("takes the last message as the question", () => {
    expect(splitTranscript(turns)).toEqual({
      question: "Pro-rated.",
      history: turns.slice(0, 3),
    });
  });

  it("returns undefined for an empty transcript", () => {
    expect(splitTranscript([])).toBeUndefined();
  });
});
