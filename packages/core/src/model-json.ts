const FENCE = "```";
// "json" directly followed by the payload, or any tag ending its own line.
const LANGUAGE_TAG = /^(?:json\b|[A-Za-z][\w+-]*(?=\r?\n))/i;

/**
 * Return the body of the first fenced code block when the text starts with a
 * fence, dropping a leading language tag. Other text is only trimmed.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith(FENCE)) {
    return trimmed;
  }
  const body = trimmed.slice(FENCE.length).split(FENCE)[0] ?? "";
  return body.replace(LANGUAGE_TAG, "").trim();
}

/** Parse JSON a language model returned, possibly inside a code fence. Throws on invalid JSON. */
export function parseModelJson(text: string): unknown {
  return JSON.parse(stripCodeFence(text));
}

export function isEmptyObject(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 0
  );
}
