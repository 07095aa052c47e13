import { ZodError } from "zod";
import { findConfigurationError, parseEnv } from "@kbconnect/config";
import { createQueryOrchestrator } from "@kbconnect/core";
import { createLogger, redactValue } from "@kbconnect/logger";
import type { Logger } from "@kbconnect/logger";
import type { ConnectorConfig, ConversationTurn, StatusSink } from "@kbconnect/types";
import { parseArgs, USAGE } from "./args.js";
import type { CliOptions } from "./args.js";
import { parseTranscript } from "./transcript.js";

export interface Responder {
  respond(messages: ConversationTurn[], statusSink?: StatusSink): Promise<string>;
}

export interface CliContext {
  argv: string[];
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
  /** Defaults to the configured query orchestrator. */
  build?: (config: ConnectorConfig, logger: Logger) => Responder;
  /** Defaults to a logger at the configured level. */
  logger?: Logger;
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function safeText(text: string): string {
  const redacted = redactValue("message", text);
  return typeof redacted === "string" ? redacted : text;
}

function summarize(config: ConnectorConfig): Record<string, unknown> {
  return {
    retrievalBackend: config.retrievalBackend,
    generationBackend: config.generationBackend,
    region: config.aws.region,
    knowledgeBaseId: config.bedrock.knowledgeBaseId,
    qdrantCollection: config.qdrant.collection,
    numberOfResults: config.retrieval.numberOfResults,
    features: config.features,
    metadataFields: config.metadataDefinitions.map((field) => field.key),
  };
}

/** Run the command line once. Resolves to the process exit code. */
export async function runCli(context: CliContext): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(context.argv);
  } catch (error) {
    context.stderr(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return 2;
  }
  if (options.help) {
    context.stdout(USAGE);
    return 0;
  }

  let config: ConnectorConfig;
  try {
    config = parseEnv(context.env);
  } catch (error) {
    if (error instanceof ZodError) {
      context.stderr(`Configuration error: ${describeZodError(error)}`);
      return 1;
    }
    throw error;
  }

  const logger =
    context.logger ??
    createLogger({ level: config.logLevel, service: "kbconnect-cli", stream: "stderr" });
  logger.debug({ config: summarize(config) }, "configuration loaded");

  const configurationError = findConfigurationError(config);
  if (configurationError) {
    context.stderr(configurationError);
    return 1;
  }

  let messages: ConversationTurn[];
  if (options.transcriptPath !== undefined) {
    try {
      messages = parseTranscript(await context.readFile(options.transcriptPath));
    } catch (error) {
      const reason = error instanceof ZodError ? describeZodError(error) : String(error);
      context.stderr(`Could not read transcript ${options.transcriptPath}: ${reason}`);
      return 1;
    }
  } else {
    messages = [{ role: "user", content: options.question ?? "" }];
  }

  const build = context.build ?? createQueryOrchestrator;
  const orchestrator = build(config, logger);
  const answer = await orchestrator.respond(messages, (event) => {
    context.stderr(`[${event.level}] ${safeText(event.message)}`);
  });

  context.stdout(answer);
  return 0;
}
