import { SYNTHESIS_OPERATORS } from "@kbconnect/types";
import type {
  DateTimeRange,
  MetadataFieldDefinition,
  MetadataFilter,
  NameReference,
} from "@kbconnect/types";
import type { ILanguageModel } from "@kbconnect/llm";
import type { Logger } from "@kbconnect/logger";
import type { DateTimeRangeResolver } from "./datetime-range-resolver.js";
import type { EntityNameResolver } from "./entity-name-resolver.js";
import { extractFilterKeys } from "./filter-keys.js";
import { findUndeclaredKeys, parseMetadataFilter } from "./filter-validator.js";
import { isEmptyObject, parseModelJson } from "./model-json.js";
import { buildFilterPrompt } from "./prompts.js";

export interface FilterSynthesizerDeps {
  model: ILanguageModel;
  dateResolver: DateTimeRangeResolver;
  /** Omit to skip person-name extraction. */
  nameResolver?: EntityNameResolver;
  logger: Logger;
  enabled: boolean;
}

/**
 * Insert "(from <start> to <end>)" after the first occurrence of each
 * resolved expression. Later occurrences are left alone.
 */
export function annotateQuery(query: string, ranges: DateTimeRange[]): string {
  let annotated = query;
  for (const range of ranges) {
    if (!range.original) continue;
    const at = annotated.indexOf(range.original);
    if (at === -1) continue;
    const end = at + range.original.length;
    annotated = `${annotated.slice(0, end)} (from ${range.startIso} to ${range.endIso})${annotated.slice(end)}`;
  }
  return annotated;
}

export class FilterSynthesizer {
  private readonly model: ILanguageModel;
  private readonly dateResolver: DateTimeRangeResolver;
  private readonly nameResolver: EntityNameResolver | undefined;
  private readonly logger: Logger;
  private readonly enabled: boolean;

  constructor(deps: FilterSynthesizerDeps) {
    this.model = deps.model;
    this.dateResolver = deps.dateResolver;
    this.nameResolver = deps.nameResolver;
    this.logger = deps.logger.child({ component: "filter-synthesizer" });
    this.enabled = deps.enabled;
  }

  /**
   * Derive a metadata filter from the query. Resolves to undefined when
   * filtering is off, the schema is empty, or anything goes wrong.
   */
  async synthesize(
    query: string,
    fieldDefinitions: MetadataFieldDefinition[],
  ): Promise<MetadataFilter | undefined> {
    if (!this.enabled || fieldDefinitions.length === 0) {
      return undefined;
    }

    try {
      const ranges = await this.dateResolver.resolve(query);
      const names: NameReference[] = this.nameResolver
        ? await this.nameResolver.extractNames(query)
        : [];

      const prompt = buildFilterPrompt({
        fieldDefinitions,
        annotatedQuery: annotateQuery(query, ranges),
        ranges,
        names,
      });
      this.logger.debug({ prompt }, "filter generation prompt");

      const text = await this.model.complete(prompt, { maxTokens: 1024, temperature: 0.1 });
      this.logger.debug({ output: text }, "filter generation output");

      const raw = parseModelJson(text);
      if (raw === null || isEmptyObject(raw)) {
        return undefined;
      }

      const filter = parseMetadataFilter(raw, SYNTHESIS_OPERATORS);
      const undeclared = findUndeclaredKeys(extractFilterKeys(filter), fieldDefinitions);
      if (undeclared.length > 0) {
        this.logger.warn({ keys: undeclared }, "filter references undeclared metadata fields");
      }
      return filter;
    } catch (error) {
      this.logger.warn({ err: error }, "filter synthesis failed; continuing without a filter");
      return undefined;
    }
  }
}
