/**
 * Credential redaction for log output.
 *
 * Connector configuration carries cloud credentials and API keys, and request
 * objects logged by the SDK adapters may carry auth headers.
 */

const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "accesskeyid",
  "secretaccesskey",
  "sessiontoken",
  "apikey",
  "api_key",
  "token",
  "authorization",
  "password",
  "secret",
]);

/**
 * Matches AWS access key ids (AKIA…/ASIA…) embedded in free text.
 */
const ACCESS_KEY_ID_REGEX = /\b(?:AKIA|ASIA)[A-Z0-9]{16}\b/g;

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair: the whole value for sensitive keys, embedded
 * access key ids for any other string.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(ACCESS_KEY_ID_REGEX, REDACTED);
  }

  return value;
}

const REDACTED_FIELDS = [
  "accessKeyId",
  "secretAccessKey",
  "sessionToken",
  "apiKey",
  "api_key",
  "token",
  "authorization",
];

/**
 * Paths for pino's `redact` option: each field at the top level, one level
 * down (e.g. `aws.secretAccessKey`) and two levels down (e.g. `config.aws.sessionToken`).
 */
export const REDACT_PATHS: string[] = [
  ...REDACTED_FIELDS,
  ...REDACTED_FIELDS.map((field) => `*.${field}`),
  ...REDACTED_FIELDS.map((field) => `*.*.${field}`),
];
