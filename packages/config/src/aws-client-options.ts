import type { AwsConfig } from "@kbconnect/types";

export interface AwsClientOptions {
  region: string;
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
}

/**
 * Options shared by every AWS SDK client. Static credentials are used only
 * when both halves of the key pair are present; otherwise the SDK falls back
 * to its default provider chain.
 */
export function buildAwsClientOptions(aws: AwsConfig, endpoint?: string): AwsClientOptions {
  const options: AwsClientOptions = { region: aws.region };
  if (endpoint) {
    options.endpoint = endpoint;
  }
  if (aws.accessKeyId && aws.secretAccessKey) {
    options.credentials = {
      accessKeyId: aws.accessKeyId,
      secretAccessKey: aws.secretAccessKey,
      ...(aws.sessionToken ? { sessionToken: aws.sessionToken } : {}),
    };
  }
  return options;
}
