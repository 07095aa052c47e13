export { envSchema, parseEnv } from "./env.js";
export { metadataFieldDefinitionSchema, parseMetadataDefinitions } from "./metadata-definitions.js";
export { findConfigurationError, MISSING_AWS_CREDENTIALS_MESSAGE } from "./configuration-check.js";
export { LazyClient } from "./lazy-client.js";
export { buildAwsClientOptions } from "./aws-client-options.js";
export type { AwsClientOptions } from "./aws-client-options.js";
