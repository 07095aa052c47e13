import { CohereClient } from "cohere-ai";
import { LazyClient } from "@kbconnect/config";
import { ExternalServiceError } from "@kbconnect/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";

export interface CohereEmbedRequest {
  texts: string[];
  model: string;
  inputType: "search_query";
  embeddingTypes: "float"[];
}

export interface CohereEmbedResult {
  embeddings: { float?: number[][] };
}

/** The slice of Cohere's v2 client this provider calls. */
export interface CohereEmbedClient {
  embed(request: CohereEmbedRequest): Promise<CohereEmbedResult>;
}

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  client?: CohereEmbedClient;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  private client: LazyClient<CohereEmbedClient>;

  constructor(config: CohereProviderConfig) {
    this.model = config.model ?? DEFAULT_MODEL;
    const injected = config.client;
    this.client = new LazyClient<CohereEmbedClient>(
      () => injected ?? new CohereClient({ token: config.apiKey }).v2,
    );
  }

  async embedQuery(text: string): Promise<number[]> {
    const response = await this.client.get().embed({
      texts: [text],
      model: this.model,
      inputType: "search_query",
      embeddingTypes: ["float"],
    });

    const vector = response.embeddings.float?.[0];
    if (!vector) {
      throw new ExternalServiceError("Cohere returned no float embedding for the query", {
        service: "cohere",
      });
    }
    return vector;
  }
}
