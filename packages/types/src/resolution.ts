export interface DateTimeRange {
  /** The date/time phrase exactly as it appears in the query. */
  original: string;
  startIso: string;
  startUnix: number;
  endIso: string;
  endUnix: number;
}

export interface NameReference {
  original: string;
  elements: string[];
  /** Role the person plays in the query, e.g. "author". */
  context?: string;
}
