import type { DateTimeRange, MetadataFieldDefinition, NameReference, RetrievedPassage } from "@kbconnect/types";
import { SYNTHESIS_OPERATORS } from "@kbconnect/types";

export function buildDateTimeExtractionPrompt(query: string, today: string): string {
  return `Extract every date or time reference from the user query below and resolve each one to an inclusive time range.

Today's date is ${today}. Resolve relative expressions ("last month", "yesterday") against it.

User query: ${query}

Choose the range from the granularity of the expression:
- A year only ("2024"): from January 1 00:00:00 to December 31 23:59:59 of that year.
- A month ("August 2025"): from the first day 00:00:00 to the last day 23:59:59 of that month.
- A day ("September 4, 2025"): from 00:00:00 to 23:59:59 of that day.
- An hour, minute or second: that unit's window, e.g. "6:39 AM on September 4, 2025" is from 2025-09-04T06:39:00Z to 2025-09-04T06:39:59Z.

Return ONLY a JSON array with no additional text. Each element has "original" (the expression exactly as it appears in the query) and "parsed" (the string "from <ISO 8601> to <ISO 8601>" in UTC). Return [] when the query has no date or time reference.

Example:
[
  {"original": "August 2025", "parsed": "from 2025-08-01T00:00:00Z to 2025-08-31T23:59:59Z"}
]

Extracted date-time ranges (JSON only):`;
}

export function buildNameExtractionPrompt(query: string): string {
  return `Identify every person named in the user query below.

User query: ${query}

For each person return "original" (the name exactly as written, including any title) and "context" (the role the person plays in the query, such as "author" or "mentioned"). Return ONLY a JSON array with no additional text, or [] if no person is named.

Example:
[
  {"original": "Dr. John Smith", "context": "author"}
]

Extracted names (JSON only):`;
}

export interface FilterPromptInput {
  fieldDefinitions: MetadataFieldDefinition[];
  annotatedQuery: string;
  ranges: DateTimeRange[];
  names: NameReference[];
}

function describeRanges(ranges: DateTimeRange[]): string {
  if (ranges.length === 0) return "";
  const lines = ranges.map(
    (range) =>
      `- '${range.original}' -> from ${range.startIso} to ${range.endIso} (Unix: ${String(range.startUnix)} to ${String(range.endUnix)})`,
  );
  return `\n\nExtracted date-time ranges:\n${lines.join("\n")}`;
}

function describeNames(names: NameReference[]): string {
  if (names.length === 0) return "";
  const lines = names.map((name) => {
    const role = name.context ? ` (${name.context})` : "";
    return `- '${name.original}'${role} -> name elements: ${JSON.stringify(name.elements)}`;
  });
  return `\n\nExtracted person names:\n${lines.join("\n")}`;
}

export function buildFilterPrompt(input: FilterPromptInput): string {
  const operators = SYNTHESIS_OPERATORS.map((op) => `"${op}"`).join(", ");

  return `Given the following metadata field definitions and user query, generate a metadata filter in JSON format that narrows the knowledge base results.

Metadata field definitions:
${JSON.stringify(input.fieldDefinitions, null, 2)}

User query: ${input.annotatedQuery}${describeRanges(input.ranges)}${describeNames(input.names)}

Instructions:
1. When both a Unix epoch field (NUMBER, e.g. *_unix, *_timestamp) and an ISO field (STRING) describe the same date, filter on the Unix epoch field.
2. Bound every extracted date-time range with a pair of conditions: "greaterThanOrEquals" on the start and "lessThanOrEquals" on the end, using the Unix values above.
3. For person names, emit one condition per name element on the name field (for example {"in": {"key": "author_name", "value": "John"}}) and combine them with "andAll". Leave out titles such as Dr. or Prof.
4. Only add conditions for fields that are clearly relevant to the query.
5. Use only these comparison operators: ${operators}, and the logical operators "andAll" and "orAll".
6. If no filtering applies, return an empty object {}.

Return ONLY valid JSON with no additional text or explanation. Example:
{
  "andAll": [
    {"greaterThanOrEquals": {"key": "created_at_unix", "value": 1754006400}},
    {"lessThanOrEquals": {"key": "created_at_unix", "value": 1756684799}}
  ]
}

Generated filter (JSON only):`;
}

export function buildCitationPrompt(answer: string, passages: RetrievedPassage[]): string {
  const chunks = passages
    .map((passage, i) => `[Chunk ${String(i + 1)}]\n${passage.text}`)
    .join("\n\n");

  return `You are given an answer and the numbered source chunks it was written from. Identify which parts of the answer are supported by which chunks.

Answer:
${answer}

Source chunks:
${chunks}

Return ONLY valid JSON with no additional text, in this shape:
{
  "citations": [
    {"answer_text": "<exact substring copied from the answer>", "chunk_ids": [1]}
  ]
}

Rules:
- "answer_text" must be copied verbatim from the answer.
- "chunk_ids" lists the 1-based numbers of every chunk supporting that text.
- Leave out statements no chunk supports. Return {"citations": []} if nothing is supported.

Citations (JSON only):`;
}
