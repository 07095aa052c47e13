import { z } from "zod";
import { COMPARISON_OPERATORS, conditionFilter } from "@kbconnect/types";
import type {
  ComparisonOperator,
  MetadataFieldDefinition,
  MetadataFilter,
} from "@kbconnect/types";

type Path = (string | number)[];

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const conditionSchema = z
  .object({
    key: z.string().min(1),
    value: z.union([scalarSchema, z.array(scalarSchema)]),
  })
  .strict();

const nodeSchema = z
  .record(z.unknown())
  .refine((node) => Object.keys(node).length === 1, {
    message: "A filter node must carry exactly one operator",
  });

const branchSchema = z.array(z.unknown()).min(1);

function unsupportedOperator(operator: string, path: Path): z.ZodError {
  return new z.ZodError([
    { code: z.ZodIssueCode.custom, path, message: `Unsupported filter operator '${operator}'` },
  ]);
}

function parseNode(
  raw: unknown,
  operators: readonly ComparisonOperator[],
  path: Path,
): MetadataFilter {
  const node = nodeSchema.parse(raw, { path });
  const [entry] = Object.entries(node);
  if (entry === undefined) {
    throw unsupportedOperator("", path);
  }
  const [operator, body] = entry;

  if (operator === "andAll" || operator === "orAll") {
    const children = branchSchema
      .parse(body, { path: [...path, operator] })
      .map((child, i) => parseNode(child, operators, [...path, operator, i]));
    // A branch of one is the same filter as its only child.
    if (children.length === 1 && children[0] !== undefined) {
      return children[0];
    }
    return operator === "andAll" ? { andAll: children } : { orAll: children };
  }

  const comparison = operators.find((candidate) => candidate === operator);
  if (comparison === undefined) {
    throw unsupportedOperator(operator, path);
  }
  return conditionFilter(comparison, conditionSchema.parse(body, { path: [...path, operator] }));
}

/**
 * Validate an untrusted value as a metadata filter, allowing only the given
 * comparison operators. Throws a ZodError describing the first problem.
 */
export function parseMetadataFilter(
  raw: unknown,
  operators: readonly ComparisonOperator[] = COMPARISON_OPERATORS,
): MetadataFilter {
  return parseNode(raw, operators, []);
}

/** Keys the filter references that the field definitions do not declare. */
export function findUndeclaredKeys(
  keys: Iterable<string>,
  fieldDefinitions: MetadataFieldDefinition[],
): string[] {
  const declared = new Set(fieldDefinitions.map((field) => field.key));
  return [...keys].filter((key) => !declared.has(key));
}
