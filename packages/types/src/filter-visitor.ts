import { COMPARISON_OPERATORS } from "./filter.js";
import type {
  ComparisonOperator,
  ConditionFilter,
  FilterCondition,
  MetadataFilter,
} from "./filter.js";

export interface FilterVisitor<R> {
  condition(operator: ComparisonOperator, condition: FilterCondition): R;
  andAll(children: MetadataFilter[]): R;
  orAll(children: MetadataFilter[]): R;
}

/**
 * Dispatch on the single operator a filter node carries. Throws when the node
 * has none, which only happens for values that bypassed the filter schema.
 */
export function visitFilter<R>(filter: MetadataFilter, visitor: FilterVisitor<R>): R {
  if (filter.andAll !== undefined) {
    return visitor.andAll(filter.andAll);
  }
  if (filter.orAll !== undefined) {
    return visitor.orAll(filter.orAll);
  }
  for (const operator of COMPARISON_OPERATORS) {
    const condition = filter[operator];
    if (condition !== undefined) {
      return visitor.condition(operator, condition);
    }
  }
  throw new Error("Metadata filter node has no recognised operator");
}

/** Build the leaf node for one operator. */
export function conditionFilter(
  operator: ComparisonOperator,
  condition: FilterCondition,
): ConditionFilter {
  switch (operator) {
    case "equals":
      return { equals: condition };
    case "notEquals":
      return { notEquals: condition };
    case "in":
      return { in: condition };
    case "notIn":
      return { notIn: condition };
    case "greaterThan":
      return { greaterThan: condition };
    case "greaterThanOrEquals":
      return { greaterThanOrEquals: condition };
    case "lessThan":
      return { lessThan: condition };
    case "lessThanOrEquals":
      return { lessThanOrEquals: condition };
    case "stringContains":
      return { stringContains: condition };
    case "startsWith":
      return { startsWith: condition };
    case "listContains":
      return { listContains: condition };
  }
}
