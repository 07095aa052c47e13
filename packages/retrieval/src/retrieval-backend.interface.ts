import type { MetadataFilter, RetrievedPassage, SearchMode } from "@kbconnect/types";

export interface RetrieveParams {
  query: string;
  filter?: MetadataFilter;
  numberOfResults: number;
  searchMode: SearchMode;
}

export interface IRetrievalBackend {
  readonly name: string;
  /** Identifier reported in user-facing errors (knowledge base id or collection). */
  readonly resourceId: string;

  retrieve(params: RetrieveParams): Promise<RetrievedPassage[]>;
}
