import { describe, it, expect } from "vitest";
import { createLogger } from "@kbconnect/logger";
import type { RetrievedPassage } from "@kbconnect/types";
import { CitationAttributor, applyCitations, formatCitationList } from "./citation-attributor.js";
import { ScriptedLanguageModel } from "./testing.js";
import type { ScriptedReply } from "./testing.js";

const logger = createLogger({ silent: true });

const ANSWER = "Machine learning is a subset of AI. Deep learning uses neural networks.";

const PASSAGES: RetrievedPassage[] = [
  {
    text: "Machine learning is a subset of artificial intelligence that focuses on algorithms.",
    sourceUri: "s3://bucket/ml-guide.pdf",
    metadata: {},
  },
  {
    text: "Deep learning uses multi-layered neural networks.",
    metadata: { source_uri: "s3://bucket/dl-intro.pdf" },
  },
];

function attributorWith(replies: ScriptedReply[], enabled = true) {
  const model = new ScriptedLanguageModel(replies);
  return { model, attributor: new CitationAttributor({ model, logger, enabled }) };
}

describe("applyCitations", () => {
  it("inserts concatenated markers after the first occurrence", () => {
    expect(
      applyCitations("AI helps. AI helps again.", [{ answerText: "AI helps", chunkIds: [2, 1] }], 2),
    ).toEqual({ text: "AI helps[2][1]. AI helps again.", referenced: [1, 2] });
  });

  it("skips spans not found and ids out of range", () => {
    expect(
      applyCitations(
        "Plain answer.",
        [
          { answerText: "not present", chunkIds: [1] },
          { answerText: "Plain", chunkIds: [0, 3] },
        ],
        2,
      ),
    ).toEqual({ text: "Plain answer.", referenced: [] });
  });

  it("places markers for overlapping spans", () => {
    expect(
      applyCitations(
        "Paris is the capital of France.",
        [
          { answerText: "Paris is the capital", chunkIds: [1] },
          { answerText: "capital of France", chunkIds: [2] },
        ],
        2,
      ),
    ).toEqual({ text: "Paris is the capital[1] of France[2].", referenced: [1, 2] });
  });

  it("joins markers of spans ending at the same offset in span order", () => {
    expect(
      applyCitations(
        "Rivers flow to the sea.",
        [
          { answerText: "flow to the sea", chunkIds: [2] },
          { answerText: "sea", chunkIds: [1] },
        ],
        2,
      ),
    ).toEqual({ text: "Rivers flow to the sea[2][1].", referenced: [1, 2] });
  });
});

describe("formatCitationList", () => {
  it("truncates long previews and falls back to Unknown", () => {
    const list = formatCitationList([1], [{ text: "A".repeat(100), metadata: {} }]);

    expect(list).toBe(`\n\n---\n**Citations:**\n1. "${"A".repeat(50)}..." - [Unknown](Unknown)`);
  });

  it("never splits a character outside the basic plane", () => {
    const list = formatCitationList([1], [
      { text: `${"a".repeat(49)}\u{1F600}${"b".repeat(10)}`, metadata: { source_uri: "s3://x" } },
    ]);

    expect(list).toBe(
      `\n\n---\n**Citations:**\n1. "${"a".repeat(49)}\u{1F600}..." - [s3://x](s3://x)`,
    );
  });
});

describe("CitationAttributor", () => {
  it("adds markers and a citation list", async () => {
    const { model, attributor } = attributorWith([
      JSON.stringify({
        citations: [
          { answer_text: "Machine learning is a subset of AI", chunk_ids: [1] },
          { answer_text: "Deep learning uses neural networks", chunk_ids: [2] },
        ],
      }),
    ]);

    const result = await attributor.attribute(ANSWER, PASSAGES);

    expect(result).toBe(
      "Machine learning is a subset of AI[1]. Deep learning uses neural networks[2]." +
        "\n\n---\n**Citations:**\n" +
        '1. "Machine learning is a subset of artificial intelli..." - [s3://bucket/ml-guide.pdf](s3://bucket/ml-guide.pdf)\n' +
        '2. "Deep learning uses multi-layered neural networks." - [s3://bucket/dl-intro.pdf](s3://bucket/dl-intro.pdf)',
    );
    expect(model.calls[0]!.options).toEqual({ maxTokens: 2048, temperature: 0.1 });
    expect(model.calls[0]!.prompt).toContain("[Chunk 2]\nDeep learning uses multi-layered neural networks.");
  });

  it("accepts fenced JSON", async () => {
    const { attributor } = attributorWith([
      '```json\n{"citations": [{"answer_text": "Deep learning", "chunk_ids": [2]}]}\n```',
    ]);

    const result = await attributor.attribute(ANSWER, PASSAGES);

    expect(result.startsWith("Machine learning is a subset of AI. Deep learning[2] uses")).toBe(true);
  });

  it("returns the answer unchanged when disabled", async () => {
    const { model, attributor } = attributorWith([], false);

    expect(await attributor.attribute(ANSWER, PASSAGES)).toBe(ANSWER);
    expect(model.calls).toHaveLength(0);
  });

  it("returns the answer unchanged without passages", async () => {
    const { model, attributor } = attributorWith([]);

    expect(await attributor.attribute(ANSWER, [])).toBe(ANSWER);
    expect(model.calls).toHaveLength(0);
  });

  it("returns the answer unchanged when no span can be placed", async () => {
    const { attributor } = attributorWith(['{"citations": [{"answer_text": "elsewhere", "chunk_ids": [1]}]}']);

    expect(await attributor.attribute(ANSWER, PASSAGES)).toBe(ANSWER);
  });

  it("returns the answer unchanged on malformed output or model failure", async () => {
    const malformed = attributorWith(["not json"]);
    const wrongShape = attributorWith(['{"citations": "none"}']);
    const failing = attributorWith([new Error("model down")]);

    expect(await malformed.attributor.attribute(ANSWER, PASSAGES)).toBe(ANSWER);
    expect(await wrongShape.attributor.attribute(ANSWER, PASSAGES)).toBe(ANSWER);
    expect(await failing.attributor.attribute(ANSWER, PASSAGES)).toBe(ANSWER);
  });
});
