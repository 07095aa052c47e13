import { describe, it, expect } from "vitest";
import { createLogger } from "@kbconnect/logger";
import {
  DateTimeRangeResolver,
  parseDateTime,
  parseDateTimeRange,
} from "./datetime-range-resolver.js";
import { ScriptedLanguageModel } from "./testing.js";

const logger = createLogger({ silent: true });
const fixedNow = () => new Date(Date.UTC(2025, 8, 15, 12, 0, 0));

describe("parseDateTime", () => {
  it.each([
    ["2025-08-01T00:00:00Z", "2025-08-01T00:00:00Z", 1754006400],
    ["2025-08-31T23:59:59.999999Z", "2025-08-31T23:59:59Z", 1756684799],
    ["2025-08-31 23:59:59", "2025-08-31T23:59:59Z", 1756684799],
    ["2025-08-01", "2025-08-01T00:00:00Z", 1754006400],
    ["01/08/2025", "2025-08-01T00:00:00Z", 1754006400],
    ["08/31/2025", "2025-08-31T00:00:00Z", 1756598400],
    ["August 1, 2025", "2025-08-01T00:00:00Z", 1754006400],
    ["Aug 1, 2025", "2025-08-01T00:00:00Z", 1754006400],
    ["2025-08-01T02:00:00+02:00", "2025-08-01T00:00:00Z", 1754006400],
    ["2025-07-31T19:00:00-0500", "2025-08-01T00:00:00Z", 1754006400],
  ])("parses %s", (input, iso, unix) => {
    expect(parseDateTime(input)).toEqual({ iso, unix });
  });

  it("reads DD/MM before MM/DD when both are valid", () => {
    expect(parseDateTime("02/03/2025")?.iso).toBe("2025-03-02T00:00:00Z");
  });

  it.each(["", "yesterday", "2025-02-30", "2025-13-01", "31/31/2025", "Augst 1, 2025", "2025-08-01T25:00:00Z"])(
    "rejects %j",
    (input) => {
      expect(parseDateTime(input)).toBeUndefined();
    },
  );

  it("handles years before 1970 with negative epoch seconds", () => {
    expect(parseDateTime("1969-12-31T23:59:59Z")).toEqual({
      iso: "1969-12-31T23:59:59Z",
      unix: -1,
    });
  });
});

describe("parseDateTimeRange", () => {
  it("parses both sides of a month range", () => {
    expect(parseDateTimeRange("from 2025-08-01T00:00:00Z to 2025-08-31T23:59:59Z")).toEqual({
      startIso: "2025-08-01T00:00:00Z",
      startUnix: 1754006400,
      endIso: "2025-08-31T23:59:59Z",
      endUnix: 1756684799,
    });
  });

  it("matches the keywords case-insensitively", () => {
    expect(parseDateTimeRange("FROM 2024-01-01 TO 2024-12-31 23:59:59")?.endIso).toBe(
      "2024-12-31T23:59:59Z",
    );
  });

  it.each(["", "2025-08-01T00:00:00Z", "from start to end", "from 2025-08-01 until 2025-08-02"])(
    "returns undefined for %j",
    (input) => {
      expect(parseDateTimeRange(input)).toBeUndefined();
    },
  );

  it("drops a range whose end precedes its start", () => {
    expect(parseDateTimeRange("from 2025-09-01 to 2025-08-01")).toBeUndefined();
  });

  it("keeps end >= start for every valid range", () => {
    const samples = [
      "from 2025-01-01 to 2025-01-01",
      "from 2020-02-29 to 2020-03-01 00:00:00",
      "from March 3, 2021 to Mar 4, 2021",
    ];
    for (const sample of samples) {
      const range = parseDateTimeRange(sample);
      expect(range).toBeDefined();
      expect(range!.endUnix).toBeGreaterThanOrEqual(range!.startUnix);
      expect(range!.startIso).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
      expect(range!.endIso).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
    }
  });
});

describe("DateTimeRangeResolver", () => {
  it("resolves the model's ranges with a low temperature call", async () => {
    const model = new ScriptedLanguageModel([
      '```json\n[{"original": "August 2025", "parsed": "from 2025-08-01T00:00:00Z to 2025-08-31T23:59:59Z"}]\n```',
    ]);
    const resolver = new DateTimeRangeResolver({ model, logger, now: fixedNow });

    const ranges = await resolver.resolve("posts in August 2025");

    expect(ranges).toEqual([
      {
        original: "August 2025",
        startIso: "2025-08-01T00:00:00Z",
        startUnix: 1754006400,
        endIso: "2025-08-31T23:59:59Z",
        endUnix: 1756684799,
      },
    ]);
    expect(model.calls[0]!.options).toEqual({ maxTokens: 512, temperature: 0.1 });
    expect(model.calls[0]!.prompt).toContain("User query: posts in August 2025");
    expect(model.calls[0]!.prompt).toContain("Today's date is 2025-09-15.");
  });

  it("drops malformed items and keeps the rest", async () => {
    const model = new ScriptedLanguageModel([
      JSON.stringify([
        { original: "2024", parsed: "from 2024-01-01T00:00:00Z to 2024-12-31T23:59:59Z" },
        { original: "soon", parsed: "whenever" },
        { original: "backwards", parsed: "from 2024-02-01 to 2024-01-01" },
        { parsed: "from 2024-01-01 to 2024-01-02" },
      ]),
    ]);
    const resolver = new DateTimeRangeResolver({ model, logger, now: fixedNow });

    const ranges = await resolver.resolve("reports from 2024");

    expect(ranges.map((range) => range.original)).toEqual(["2024"]);
  });

  it.each([
    ["invalid JSON", "not json"],
    ["a non-array", '{"original": "2024"}'],
  ])("returns [] for %s", async (_label, reply) => {
    const resolver = new DateTimeRangeResolver({
      model: new ScriptedLanguageModel([reply]),
      logger,
      now: fixedNow,
    });

    expect(await resolver.resolve("anything")).toEqual([]);
  });

  it("returns [] when the model call fails", async () => {
    const resolver = new DateTimeRangeResolver({
      model: new ScriptedLanguageModel([new Error("throttled")]),
      logger,
    });

    expect(await resolver.resolve("last week")).toEqual([]);
  });
});
