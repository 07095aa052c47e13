import type { Schemas } from "@qdrant/js-client-rest";
import { RequestValidationError } from "@kbconnect/errors";
import { visitFilter } from "@kbconnect/types";
import type {
  ComparisonOperator,
  FilterCondition,
  FilterScalar,
  MetadataFilter,
} from "@kbconnect/types";

type QdrantFilter = Schemas["Filter"];
type QdrantCondition = Schemas["Condition"];
type RangeBound = "gt" | "gte" | "lt" | "lte";

const RANGE_BOUNDS: Partial<Record<ComparisonOperator, RangeBound>> = {
  greaterThan: "gt",
  greaterThanOrEquals: "gte",
  lessThan: "lt",
  lessThanOrEquals: "lte",
};

function reject(operator: ComparisonOperator, key: string, reason: string): never {
  throw new RequestValidationError(
    `Cannot translate '${operator}' on '${key}' to a Qdrant filter: ${reason}`,
    { service: "qdrant" },
  );
}

function scalarOf(operator: ComparisonOperator, condition: FilterCondition): FilterScalar {
  if (Array.isArray(condition.value)) {
    return reject(operator, condition.key, "expected a single value");
  }
  return condition.value;
}

function listOf(operator: ComparisonOperator, condition: FilterCondition): string[] | number[] {
  const values = Array.isArray(condition.value) ? condition.value : [condition.value];
  const strings = values.filter((v): v is string => typeof v === "string");
  if (strings.length === values.length) {
    return strings;
  }
  const numbers = values.filter((v): v is number => typeof v === "number");
  if (numbers.length === values.length) {
    return numbers;
  }
  return reject(operator, condition.key, "list values must be all strings or all numbers");
}

function textOf(operator: ComparisonOperator, condition: FilterCondition): string {
  const value = scalarOf(operator, condition);
  if (typeof value !== "string") {
    return reject(operator, condition.key, "expected a string value");
  }
  return value;
}

function conditionFor(operator: ComparisonOperator, condition: FilterCondition): QdrantCondition {
  const { key } = condition;

  const bound = RANGE_BOUNDS[operator];
  if (bound !== undefined) {
    const value = scalarOf(operator, condition);
    if (typeof value !== "number") {
      return reject(operator, key, "range comparisons need a number");
    }
    const range: Schemas["Range"] = {};
    range[bound] = value;
    return { key, range };
  }

  switch (operator) {
    case "equals":
    case "listContains":
      return { key, match: { value: scalarOf(operator, condition) } };
    case "notEquals":
      return { must_not: [{ key, match: { value: scalarOf(operator, condition) } }] };
    case "in":
      // A scalar string on `in` means "the field value occurs in this text".
      if (typeof condition.value === "string") {
        return { key, match: { text: condition.value } };
      }
      return { key, match: { any: listOf(operator, condition) } };
    case "notIn":
      return { key, match: { except: listOf(operator, condition) } };
    case "stringContains":
      return { key, match: { text: textOf(operator, condition) } };
    default:
      return reject(operator, key, "operator is not supported by Qdrant");
  }
}

function toCondition(filter: MetadataFilter): QdrantCondition {
  return visitFilter<QdrantCondition>(filter, {
    condition: conditionFor,
    andAll: (children) => ({ must: children.map(toCondition) }),
    orAll: (children) => ({ should: children.map(toCondition) }),
  });
}

/**
 * Translate a metadata filter into a Qdrant payload filter. Operators Qdrant
 * has no equivalent for raise RequestValidationError.
 */
export function toQdrantFilter(filter: MetadataFilter): QdrantFilter {
  if (filter.andAll !== undefined) {
    return { must: filter.andAll.map(toCondition) };
  }
  return { must: [toCondition(filter)] };
}
