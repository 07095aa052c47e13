import { z } from "zod";
import type { DateTimeRange } from "@kbconnect/types";
import type { ILanguageModel } from "@kbconnect/llm";
import type { Logger } from "@kbconnect/logger";
import { parseModelJson } from "./model-json.js";
import { buildDateTimeExtractionPrompt } from "./prompts.js";

export interface ParsedDateTime {
  iso: string;
  unix: number;
}

export type ParsedDateTimeRange = Omit<DateTimeRange, "original">;

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
  offsetMinutes?: number;
}

interface DateFormat {
  pattern: RegExp;
  read(match: RegExpExecArray): DateParts | undefined;
}

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const num = (value: string | undefined): number => Number(value ?? "0");

function monthFromName(name: string | undefined, abbreviated: boolean): number | undefined {
  const lower = (name ?? "").toLowerCase();
  const index = MONTH_NAMES.findIndex((month) =>
    abbreviated ? month.slice(0, 3) === lower : month === lower,
  );
  return index === -1 ? undefined : index + 1;
}

const TIME = String.raw`(\d{1,2}):(\d{1,2}):(\d{1,2})`;
const DATE = String.raw`(\d{4})-(\d{1,2})-(\d{1,2})`;

const timeParts = (m: RegExpExecArray, from: number) => ({
  hour: num(m[from]),
  minute: num(m[from + 1]),
  second: num(m[from + 2]),
});

/** Tried in order; the first pattern that matches and yields a real date wins. */
const FORMATS: DateFormat[] = [
  {
    pattern: new RegExp(`^${DATE}T${TIME}Z$`),
    read: (m) => ({ year: num(m[1]), month: num(m[2]), day: num(m[3]), ...timeParts(m, 4) }),
  },
  {
    pattern: new RegExp(`^${DATE}T${TIME}\\.(\\d{1,6})Z$`),
    read: (m) => ({
      year: num(m[1]),
      month: num(m[2]),
      day: num(m[3]),
      ...timeParts(m, 4),
      millisecond: num((m[7] ?? "0").padEnd(3, "0").slice(0, 3)),
    }),
  },
  {
    pattern: new RegExp(`^${DATE} ${TIME}$`),
    read: (m) => ({ year: num(m[1]), month: num(m[2]), day: num(m[3]), ...timeParts(m, 4) }),
  },
  {
    pattern: new RegExp(`^${DATE}$`),
    read: (m) => ({ year: num(m[1]), month: num(m[2]), day: num(m[3]) }),
  },
  {
    // DD/MM/YYYY
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    read: (m) => ({ year: num(m[3]), month: num(m[2]), day: num(m[1]) }),
  },
  {
    // MM/DD/YYYY
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    read: (m) => ({ year: num(m[3]), month: num(m[1]), day: num(m[2]) }),
  },
  {
    pattern: /^([A-Za-z]+)\s+(\d{1,2}),\s+(\d{4})$/,
    read: (m) => {
      const month = monthFromName(m[1], false);
      return month === undefined ? undefined : { year: num(m[3]), month, day: num(m[2]) };
    },
  },
  {
    pattern: /^([A-Za-z]{3})\s+(\d{1,2}),\s+(\d{4})$/,
    read: (m) => {
      const month = monthFromName(m[1], true);
      return month === undefined ? undefined : { year: num(m[3]), month, day: num(m[2]) };
    },
  },
  {
    pattern: new RegExp(`^${DATE}T${TIME}([+-])(\\d{2}):?(\\d{2})$`),
    read: (m) => {
      const hours = num(m[8]);
      const minutes = num(m[9]);
      if (hours > 23 || minutes > 59) return undefined;
      const sign = m[7] === "-" ? -1 : 1;
      return {
        year: num(m[1]),
        month: num(m[2]),
        day: num(m[3]),
        ...timeParts(m, 4),
        offsetMinutes: sign * (hours * 60 + minutes),
      };
    },
  },
];

function toEpochMillis(parts: DateParts): number | undefined {
  const { year, month, day, hour = 0, minute = 0, second = 0, millisecond = 0 } = parts;
  if (year < 1 || hour > 23 || minute > 59 || second > 59) return undefined;

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date.getTime() - (parts.offsetMinutes ?? 0) * 60_000;
}

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

export function formatIsoSeconds(epochMillis: number): string {
  const d = new Date(epochMillis);
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}` +
    `T${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}Z`
  );
}

/**
 * Parse one timestamp in any supported format. Text without a zone is read as
 * UTC; an explicit offset is converted, so `iso` is always the UTC instant.
 */
export function parseDateTime(text: string): ParsedDateTime | undefined {
  const input = text.trim();
  for (const format of FORMATS) {
    const match = format.pattern.exec(input);
    if (!match) continue;
    const parts = format.read(match);
    const millis = parts === undefined ? undefined : toEpochMillis(parts);
    if (millis === undefined) continue;
    return { iso: formatIsoSeconds(millis), unix: Math.trunc(millis / 1000) };
  }
  return undefined;
}

const RANGE_PATTERN = /from (.+) to (.+)/i;

/**
 * Parse "from <A> to <B>". Returns undefined unless both sides parse and the
 * end is not before the start.
 */
export function parseDateTimeRange(text: string): ParsedDateTimeRange | undefined {
  const match = RANGE_PATTERN.exec(text);
  if (!match) return undefined;

  const start = parseDateTime(match[1] ?? "");
  const end = parseDateTime(match[2] ?? "");
  if (!start || !end || end.unix < start.unix) return undefined;

  return { startIso: start.iso, startUnix: start.unix, endIso: end.iso, endUnix: end.unix };
}

const extractedRangeSchema = z.object({
  original: z.string(),
  parsed: z.string(),
});

export interface DateTimeRangeResolverDeps {
  model: ILanguageModel;
  logger: Logger;
  now?: () => Date;
}

export class DateTimeRangeResolver {
  private readonly model: ILanguageModel;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: DateTimeRangeResolverDeps) {
    this.model = deps.model;
    this.logger = deps.logger.child({ component: "datetime-range-resolver" });
    this.now = deps.now ?? (() => new Date());
  }

  /** Never rejects; items the model got wrong are dropped. */
  async resolve(query: string): Promise<DateTimeRange[]> {
    let raw: unknown;
    try {
      const today = formatIsoSeconds(this.now().getTime()).slice(0, 10);
      const prompt = buildDateTimeExtractionPrompt(query, today);
      const text = await this.model.complete(prompt, { maxTokens: 512, temperature: 0.1 });
      this.logger.debug({ output: text }, "date-time extraction output");
      raw = parseModelJson(text);
    } catch (error) {
      this.logger.warn({ err: error }, "date-time extraction failed");
      return [];
    }

    if (!Array.isArray(raw)) {
      this.logger.warn("date-time extraction did not return an array");
      return [];
    }

    const ranges: DateTimeRange[] = [];
    for (const item of raw) {
      const parsed = extractedRangeSchema.safeParse(item);
      if (!parsed.success) continue;
      const range = parseDateTimeRange(parsed.data.parsed);
      if (!range) {
        this.logger.debug({ parsed: parsed.data.parsed }, "unparseable date-time range dropped");
        continue;
      }
      ranges.push({ original: parsed.data.original, ...range });
    }
    return ranges;
  }
}
