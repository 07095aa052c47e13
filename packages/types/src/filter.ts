/**
 * Metadata filter expressions understood by the retrieval backends.
 *
 * The shape mirrors the knowledge-base filter language: a leaf condition is an
 * object with exactly one operator key holding `{ key, value }`, and branches
 * combine sub-expressions with `andAll` / `orAll`.
 */

export const COMPARISON_OPERATORS = [
  "equals",
  "notEquals",
  "in",
  "notIn",
  "greaterThan",
  "greaterThanOrEquals",
  "lessThan",
  "lessThanOrEquals",
  "stringContains",
  "startsWith",
  "listContains",
] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

// Operators the filter-generation model is allowed to emit.
export const SYNTHESIS_OPERATORS = [
  "equals",
  "notEquals",
  "in",
  "notIn",
  "greaterThan",
  "greaterThanOrEquals",
  "lessThan",
  "lessThanOrEquals",
  "stringContains",
] as const satisfies readonly ComparisonOperator[];

const LOGICAL_OPERATORS = ["andAll", "orAll"] as const;

export type LogicalOperator = (typeof LOGICAL_OPERATORS)[number];

export type FilterOperator = ComparisonOperator | LogicalOperator;

export type FilterScalar = string | number | boolean;

export type FilterValue = FilterScalar | FilterScalar[];

export interface FilterCondition {
  key: string;
  value: FilterValue;
}

type NoOperators = { [Op in FilterOperator]?: never };

export type ConditionFilter = {
  [Op in ComparisonOperator]: Omit<NoOperators, Op> & { [K in Op]: FilterCondition };
}[ComparisonOperator];

export interface AndAllFilter extends Omit<NoOperators, "andAll"> {
  andAll: MetadataFilter[];
}

export interface OrAllFilter extends Omit<NoOperators, "orAll"> {
  orAll: MetadataFilter[];
}

export type MetadataFilter = ConditionFilter | AndAllFilter | OrAllFilter;

export type MetadataFieldType = "STRING" | "NUMBER";

export interface MetadataFieldDefinition {
  key: string;
  type: MetadataFieldType;
  description: string;
}

// Metadata fields shown to the answer model whether or not a filter used them.
export const ALWAYS_INCLUDE_METADATA = ["source_uri", "created_at_iso"] as const;
