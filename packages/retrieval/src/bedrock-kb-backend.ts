import { BedrockAgentRuntimeClient, RetrieveCommand } from "@aws-sdk/client-bedrock-agent-runtime";
import type { FilterAttribute, RetrievalFilter } from "@aws-sdk/client-bedrock-agent-runtime";
import { LazyClient } from "@kbconnect/config";
import type { AwsClientOptions } from "@kbconnect/config";
import { visitFilter } from "@kbconnect/types";
import type { ComparisonOperator, MetadataFilter, RetrievedPassage } from "@kbconnect/types";
import type { IRetrievalBackend, RetrieveParams } from "./retrieval-backend.interface.js";

export interface KnowledgeBaseResult {
  content?: { text?: string };
  location?: { s3Location?: { uri?: string } };
  metadata?: Record<string, unknown>;
  score?: number;
}

/** The slice of the Bedrock agent runtime client this backend calls. */
export interface RetrieveSender {
  send(command: RetrieveCommand): Promise<{ retrievalResults?: KnowledgeBaseResult[] }>;
}

export interface BedrockKnowledgeBaseConfig {
  knowledgeBaseId: string;
  clientOptions: AwsClientOptions;
  client?: RetrieveSender;
}

function comparison(operator: ComparisonOperator, attribute: FilterAttribute): RetrievalFilter {
  switch (operator) {
    case "equals":
      return { equals: attribute };
    case "notEquals":
      return { notEquals: attribute };
    case "in":
      return { in: attribute };
    case "notIn":
      return { notIn: attribute };
    case "greaterThan":
      return { greaterThan: attribute };
    case "greaterThanOrEquals":
      return { greaterThanOrEquals: attribute };
    case "lessThan":
      return { lessThan: attribute };
    case "lessThanOrEquals":
      return { lessThanOrEquals: attribute };
    case "stringContains":
      return { stringContains: attribute };
    case "startsWith":
      return { startsWith: attribute };
    case "listContains":
      return { listContains: attribute };
  }
}

/** The knowledge-base filter language matches ours operator for operator. */
export function toRetrievalFilter(filter: MetadataFilter): RetrievalFilter {
  return visitFilter<RetrievalFilter>(filter, {
    condition: (operator, condition) =>
      comparison(operator, { key: condition.key, value: condition.value }),
    andAll: (children) => ({ andAll: children.map(toRetrievalFilter) }),
    orAll: (children) => ({ orAll: children.map(toRetrievalFilter) }),
  });
}

export function toPassage(result: KnowledgeBaseResult): RetrievedPassage {
  const passage: RetrievedPassage = {
    text: result.content?.text ?? "",
    metadata: result.metadata ?? {},
  };
  const uri = result.location?.s3Location?.uri;
  if (uri) {
    passage.sourceUri = uri;
  }
  if (result.score !== undefined) {
    passage.score = result.score;
  }
  return passage;
}

export class BedrockKnowledgeBaseBackend implements IRetrievalBackend {
  readonly name = "bedrock";
  readonly resourceId: string;
  private client: LazyClient<RetrieveSender>;

  constructor(config: BedrockKnowledgeBaseConfig) {
    this.resourceId = config.knowledgeBaseId;
    const injected = config.client;
    this.client = new LazyClient<RetrieveSender>(
      () => injected ?? new BedrockAgentRuntimeClient(config.clientOptions),
    );
  }

  async retrieve(params: RetrieveParams): Promise<RetrievedPassage[]> {
    const response = await this.client.get().send(
      new RetrieveCommand({
        knowledgeBaseId: this.resourceId,
        retrievalQuery: { text: params.query },
        retrievalConfiguration: {
          vectorSearchConfiguration: {
            numberOfResults: params.numberOfResults,
            overrideSearchType: params.searchMode,
            ...(params.filter ? { filter: toRetrievalFilter(params.filter) } : {}),
          },
        },
      }),
    );

    return (response.retrievalResults ?? []).map(toPassage);
  }
}
