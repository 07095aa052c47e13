export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;

  /** Embed a search query for nearest-neighbour lookup. */
  embedQuery(text: string): Promise<number[]>;
}
