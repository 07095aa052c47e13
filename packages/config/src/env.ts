import { z } from "zod";
import type { ConnectorConfig } from "@kbconnect/types";
import { parseMetadataDefinitions } from "./metadata-definitions.js";

const booleanFlag = (defaultValue: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(defaultValue)
    .transform((value) => value === "true" || value === "1");

const unitInterval = (defaultValue: string) =>
  z.string().default(defaultValue).transform(Number).pipe(z.number().min(0).max(1));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value));

/**
 * Zod schema for every environment variable the connector reads. Validates,
 * transforms and applies defaults so the result is a strongly-typed
 * {@link ConnectorConfig}.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // ---------- Backends ----------
  RETRIEVAL_BACKEND: z.enum(["bedrock", "qdrant"]).default("bedrock"),
  GENERATION_BACKEND: z.enum(["bedrock", "cohere"]).default("bedrock"),

  // ---------- AWS ----------
  AWS_REGION: z.string().min(1).default("eu-central-1"),
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  AWS_SESSION_TOKEN: optionalString,

  // ---------- Bedrock ----------
  KNOWLEDGE_BASE_ID: optionalString,
  MODEL_ID: z.string().min(1).default("anthropic.claude-3-5-sonnet-20240620-v1:0"),
  FILTER_MODEL_ID: z.string().min(1).default("anthropic.claude-3-haiku-20240307-v1:0"),
  BEDROCK_RUNTIME_ENDPOINT_URL: optionalString.pipe(z.string().url().optional()),
  BEDROCK_AGENT_RUNTIME_ENDPOINT_URL: optionalString.pipe(z.string().url().optional()),

  // ---------- Qdrant ----------
  QDRANT_URL: optionalString.pipe(z.string().url().optional()),
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION: optionalString,

  // ---------- Cohere ----------
  COHERE_API_KEY: optionalString,
  COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
  COHERE_CHAT_MODEL: z.string().default("command-r-plus"),

  // ---------- Generation ----------
  MAX_TOKENS: z.string().default("4096").transform(Number).pipe(z.number().int().positive()),
  TEMPERATURE: unitInterval("0.7"),
  TOP_P: unitInterval("0.9"),

  // ---------- Retrieval ----------
  NUMBER_OF_RESULTS: z
    .string()
    .default("5")
    .transform(Number)
    .pipe(z.number().int().min(1).max(100)),

  // ---------- Conversation history ----------
  USE_CONVERSATION_HISTORY: booleanFlag("true"),
  MAX_HISTORY_MESSAGES: z
    .string()
    .default("10")
    .transform(Number)
    .pipe(z.number().int().nonnegative()),

  // ---------- Features ----------
  ENABLE_METADATA_FILTERING: booleanFlag("false"),
  ENABLE_ENTITY_RESOLUTION: booleanFlag("true"),
  ENABLE_CITATIONS: booleanFlag("true"),

  // ---------- Status ----------
  ENABLE_STATUS_INDICATOR: booleanFlag("true"),
  STATUS_EMIT_INTERVAL_MS: z
    .string()
    .default("2000")
    .transform(Number)
    .pipe(z.number().int().nonnegative()),

  // ---------- Metadata schema ----------
  METADATA_DEFINITIONS: z.string().default("[]"),
});

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link ConnectorConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): ConnectorConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    retrievalBackend: parsed.RETRIEVAL_BACKEND,
    generationBackend: parsed.GENERATION_BACKEND,

    aws: {
      region: parsed.AWS_REGION,
      accessKeyId: parsed.AWS_ACCESS_KEY_ID,
      secretAccessKey: parsed.AWS_SECRET_ACCESS_KEY,
      sessionToken: parsed.AWS_SESSION_TOKEN,
    },

    bedrock: {
      knowledgeBaseId: parsed.KNOWLEDGE_BASE_ID,
      modelId: parsed.MODEL_ID,
      filterModelId: parsed.FILTER_MODEL_ID,
      runtimeEndpointUrl: parsed.BEDROCK_RUNTIME_ENDPOINT_URL,
      agentRuntimeEndpointUrl: parsed.BEDROCK_AGENT_RUNTIME_ENDPOINT_URL,
    },

    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY,
      embedModel: parsed.COHERE_EMBED_MODEL,
      chatModel: parsed.COHERE_CHAT_MODEL,
    },

    generation: {
      maxTokens: parsed.MAX_TOKENS,
      temperature: parsed.TEMPERATURE,
      topP: parsed.TOP_P,
    },

    retrieval: {
      numberOfResults: parsed.NUMBER_OF_RESULTS,
    },

    history: {
      enabled: parsed.USE_CONVERSATION_HISTORY,
      maxMessages: parsed.MAX_HISTORY_MESSAGES,
    },

    features: {
      metadataFiltering: parsed.ENABLE_METADATA_FILTERING,
      entityResolution: parsed.ENABLE_ENTITY_RESOLUTION,
      citations: parsed.ENABLE_CITATIONS,
    },

    status: {
      enabled: parsed.ENABLE_STATUS_INDICATOR,
      emitIntervalMs: parsed.STATUS_EMIT_INTERVAL_MS,
    },

    metadataDefinitions: parseMetadataDefinitions(parsed.METADATA_DEFINITIONS),
  };
}
