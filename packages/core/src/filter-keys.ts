import { visitFilter } from "@kbconnect/types";
import type { FilterVisitor, MetadataFilter } from "@kbconnect/types";

const keyCollector: FilterVisitor<string[]> = {
  condition: (_operator, condition) => [condition.key],
  andAll: (children) => children.flatMap((child) => visitFilter(child, keyCollector)),
  orAll: (children) => children.flatMap((child) => visitFilter(child, keyCollector)),
};

/** Every metadata field name a filter references, each once. */
export function extractFilterKeys(filter: MetadataFilter | undefined): Set<string> {
  return new Set(filter === undefined ? [] : visitFilter(filter, keyCollector));
}
