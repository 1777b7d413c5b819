import type { ProviderName } from "../config.js";

export interface CandidateItem {
  readonly title: string;
  readonly imageUrl: string;
  readonly postUrl: string;
  readonly score: string;
}

export interface SourceQuery {
  source: string;
  limit: number;
}

export interface Extraction {
  item: CandidateItem;
  nsfw: boolean;
}

/**
 * One upstream provider. `fetchEntries` throws on any failure the reader
 * should retry; `extract` returns null for entries without a usable image
 * and throws for malformed ones.
 */
export interface ItemExtractor<TEntry> {
  readonly name: ProviderName;
  fetchEntries(source: string, limit: number): Promise<TEntry[]>;
  extract(entry: TEntry): Extraction | null;
}

export interface SourceReader {
  fetch(source: string, limit: number): Promise<CandidateItem[]>;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  fetchFn: FetchFn;
  timeoutMs: number;
}
