import type { SearchHit } from '../../shared/types';

/** One raw entry as the search API returns it; any field may be missing. */
export type SearchApiItem = Record<string, unknown>;

/** A page of results. No `items` means the provider has nothing more. */
export interface SearchApiPage {
  items?: SearchApiItem[];
}

export interface SearchApi {
  list: (query: string, startIndex: number, count: number, signal?: AbortSignal) => Promise<SearchApiPage>;
}

export interface SearchProvider {
  fetchResults: (query: string, numResults: number, signal?: AbortSignal) => Promise<SearchHit[]>;
}
