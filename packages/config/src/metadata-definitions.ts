import { z } from "zod";
import type { MetadataFieldDefinition } from "@kbconnect/types";

export const metadataFieldDefinitionSchema = z
  .object({
    key: z.string().min(1),
    type: z.enum(["STRING", "NUMBER"]),
    description: z.string().default(""),
  })
  .strict();

const metadataDefinitionsSchema = z.array(metadataFieldDefinitionSchema);

/**
 * Parse the JSON document describing which metadata fields the knowledge base
 * carries. Throws a ZodError when the JSON is malformed or a field is invalid.
 */
export function parseMetadataDefinitions(json: string): MetadataFieldDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new z.ZodError([
      {
        code: z.ZodIssueCode.custom,
        path: [],
        message: `METADATA_DEFINITIONS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      },
    ]);
  }
  return metadataDefinitionsSchema.parse(raw);
}
