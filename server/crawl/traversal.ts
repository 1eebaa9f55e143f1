import type { EnrichedResult, PageRecord, SearchHit } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { normalizePageResult } from './normalizer';
import type { PageFetcher } from './pageFetcher';

export const SNIPPET_LENGTH = 200;

export type PageLoader = (url: string, options?: { signal?: AbortSignal }) => Promise<PageRecord>;

/** Fetch-then-normalize: the only way the crawl sees a page. */
export const createPageLoader =
  (fetcher: PageFetcher): PageLoader =>
  async (url, options) => {
    const raw = await fetcher.fetch(url, options);
    return normalizePageResult(raw, url);
  };

export const buildSnippet = (content: string): string => `${content.slice(0, SNIPPET_LENGTH)}...`;

export const toEnrichedResult = (
  record: PageRecord,
  fields: { title: string; link: string; snippet: string; content: string; depth: number },
): EnrichedResult => ({
  ...fields,
  publishedDate: record.publishedDate,
  author: record.author,
  tags: Array.from(record.tags),
  images: [...record.images],
});

export interface TraversalObserver {
  onVisit?: (url: string, depth: number) => void;
  onEnqueue?: (url: string, depth: number) => void;
  onResult?: (result: EnrichedResult, count: number) => void;
  onSkip?: (url: string, reason: 'visited' | 'empty') => void;
}

export interface TraverseOptions {
  signal?: AbortSignal;
  observer?: TraversalObserver;
}

export interface CrawlTraversalDeps {
  loadPage: PageLoader;
  logger: Logger;
}

interface QueueEntry {
  url: string;
  depth: number;
}

/**
 * Breadth-first crawl starting from search hits.
 *
 * Pages are fetched one at a time in strict FIFO order, so results come back
 * grouped by discovery level. Each URL is fetched at most once per call; all
 * bookkeeping lives in the call and is dropped when it returns.
 */
export class CrawlTraversal {
  constructor(private readonly deps: CrawlTraversalDeps) {}

  async traverse(
    seedHits: readonly SearchHit[],
    maxPages: number,
    maxDepth: number,
    options: TraverseOptions = {},
  ): Promise<EnrichedResult[]> {
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new RangeError(`maxPages must be a positive integer, got ${maxPages}`);
    }
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
    }

    const { loadPage, logger } = this.deps;
    const { observer, signal } = options;

    const queue: QueueEntry[] = [];
    let head = 0;
    const depthByUrl = new Map<string, number>();
    const visited = new Set<string>();
    const results: EnrichedResult[] = [];

    for (const hit of seedHits) {
      if (!hit.link) continue;
      queue.push({ url: hit.link, depth: 0 });
      depthByUrl.set(hit.link, 0);
    }

    logger.info('Crawl started', { seeds: queue.length, maxPages, maxDepth });

    while (head < queue.length && results.length < maxPages) {
      if (signal?.aborted) {
        throw new Error('Aborted');
      }

      const { url, depth } = queue[head];
      head += 1;

      if (visited.has(url)) {
        observer?.onSkip?.(url, 'visited');
        continue;
      }
      visited.add(url);
      observer?.onVisit?.(url, depth);
      logger.debug('Crawling page', { url, depth });

      const record = await loadPage(url, { signal });

      if (record.content) {
        const result = toEnrichedResult(record, {
          title: record.title,
          link: url,
          snippet: buildSnippet(record.content),
          content: record.content,
          depth,
        });
        results.push(result);
        observer?.onResult?.(result, results.length);
      } else {
        observer?.onSkip?.(url, 'empty');
      }

      if (depth < maxDepth) {
        for (const link of record.links) {
          if (visited.has(link) || depthByUrl.has(link)) continue;
          queue.push({ url: link, depth: depth + 1 });
          depthByUrl.set(link, depth + 1);
          observer?.onEnqueue?.(link, depth + 1);
        }
      }
    }

    logger.info('Crawl finished', { results: results.length, visited: visited.size, pending: queue.length - head });
    return results;
  }
}
