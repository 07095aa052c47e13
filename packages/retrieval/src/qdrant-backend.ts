import { QdrantClient } from "@qdrant/js-client-rest";
import type { Schemas } from "@qdrant/js-client-rest";
import { LazyClient } from "@kbconnect/config";
import type { IEmbeddingProvider } from "@kbconnect/embeddings";
import type { RetrievedPassage } from "@kbconnect/types";
import type { IRetrievalBackend, RetrieveParams } from "./retrieval-backend.interface.js";
import { toQdrantFilter } from "./qdrant-filter.js";
import { keywordRank, reciprocalRankFusion } from "./rank-fusion.js";

const DEFAULT_TEXT_FIELD = "text";
const HYBRID_OVERFETCH = 4;

export interface QdrantSearchRequest {
  vector: number[];
  limit: number;
  filter?: Schemas["Filter"];
  with_payload: boolean;
}

export interface QdrantPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

/** The slice of QdrantClient this backend calls. */
export interface QdrantSearchClient {
  search(collectionName: string, request: QdrantSearchRequest): Promise<QdrantPoint[]>;
}

export interface QdrantBackendConfig {
  url: string;
  apiKey?: string;
  collection: string;
  embeddings: IEmbeddingProvider;
  /** Payload field holding the passage text. */
  textField?: string;
  client?: QdrantSearchClient;
}

export class QdrantBackend implements IRetrievalBackend {
  readonly name = "qdrant";
  readonly resourceId: string;
  private client: LazyClient<QdrantSearchClient>;
  private embeddings: IEmbeddingProvider;
  private textField: string;

  constructor(config: QdrantBackendConfig) {
    this.resourceId = config.collection;
    this.embeddings = config.embeddings;
    this.textField = config.textField ?? DEFAULT_TEXT_FIELD;
    const injected = config.client;
    this.client = new LazyClient<QdrantSearchClient>(
      () => injected ?? new QdrantClient({ url: config.url, apiKey: config.apiKey }),
    );
  }

  async retrieve(params: RetrieveParams): Promise<RetrievedPassage[]> {
    // Translate first so an unsupported filter fails before any remote call.
    const filter = params.filter ? toQdrantFilter(params.filter) : undefined;
    const vector = await this.embeddings.embedQuery(params.query);
    const hybrid = params.searchMode === "HYBRID";

    const points = await this.client.get().search(this.resourceId, {
      vector,
      limit: hybrid ? params.numberOfResults * HYBRID_OVERFETCH : params.numberOfResults,
      ...(filter ? { filter } : {}),
      with_payload: true,
    });

    const passages = points.map((point) => ({ id: String(point.id), passage: this.toPassage(point) }));

    if (!hybrid) {
      return passages.slice(0, params.numberOfResults).map((entry) => entry.passage);
    }

    const lexical = keywordRank(params.query, passages, (entry) => entry.passage.text);
    return reciprocalRankFusion([passages, lexical], (entry) => entry.id)
      .slice(0, params.numberOfResults)
      .map(({ item, score }) => ({ ...item.passage, score }));
  }

  private toPassage(point: QdrantPoint): RetrievedPassage {
    const metadata: Record<string, unknown> = {};
    let text = "";
    for (const [field, value] of Object.entries(point.payload ?? {})) {
      if (field === this.textField) {
        text = typeof value === "string" ? value : "";
      } else {
        metadata[field] = value;
      }
    }

    const passage: RetrievedPassage = { text, metadata, score: point.score };
    const sourceUri = metadata["source_uri"];
    if (typeof sourceUri === "string" && sourceUri) {
      passage.sourceUri = sourceUri;
    }
    return passage;
  }
}
