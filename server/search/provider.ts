import type { SearchHit } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { sleep } from '../utils/async';
import type { SearchApi, SearchApiItem, SearchProvider } from './types';

export const SEARCH_PAGE_SIZE = 10;
export const MAX_START_INDEX = 100;

export interface PaginatedSearchProviderDeps {
  api: SearchApi;
  logger: Logger;
  pageDelayMs?: number;
}

const stringField = (item: SearchApiItem, key: string): string => {
  const value = item[key];
  return typeof value === 'string' ? value : '';
};

const toSearchHit = (item: SearchApiItem): SearchHit => ({
  title: stringField(item, 'title'),
  link: stringField(item, 'link'),
  snippet: stringField(item, 'snippet'),
});

/**
 * Walks the search API page by page until `numResults` hits are collected,
 * the API runs dry, or the start offset passes {@link MAX_START_INDEX}.
 * Errors end the walk early; whatever was collected is still returned.
 */
export const createPaginatedSearchProvider = ({ api, logger, pageDelayMs = 0 }: PaginatedSearchProviderDeps): SearchProvider => ({
  fetchResults: async (query, numResults, signal) => {
    const hits: SearchHit[] = [];
    if (numResults < 1) {
      return hits;
    }

    let startIndex = 1;
    let pages = 0;
    try {
      while (hits.length < numResults) {
        const count = Math.min(SEARCH_PAGE_SIZE, numResults - hits.length);
        const page = await api.list(query, startIndex, count, signal);
        pages += 1;

        const items = page.items ?? [];
        if (!items.length) {
          logger.info('Search returned no more items', { query, startIndex });
          break;
        }

        for (const item of items) {
          if (hits.length >= numResults) break;
          hits.push(toSearchHit(item));
        }
        if (hits.length >= numResults) break;

        startIndex += count;
        if (startIndex > MAX_START_INDEX) break;
        await sleep(pageDelayMs, signal);
      }
    } catch (error) {
      logger.warn('Search request failed', {
        query,
        startIndex,
        collected: hits.length,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    logger.info('Search finished', { query, requested: numResults, returned: hits.length, pages });
    return hits;
  },
});
