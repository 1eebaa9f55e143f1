import type { EnrichedResult, SearchHit } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { toEnrichedResult, type PageLoader } from './traversal';

export interface StandardCrawlArgs {
  hits: readonly SearchHit[];
  loadPage: PageLoader;
  logger: Logger;
  signal?: AbortSignal;
  onResult?: (result: EnrichedResult, index: number, total: number) => void;
}

/**
 * Fetches every hit once, without following links. A page that yields no
 * content keeps the search snippet instead.
 */
export const crawlHits = async ({ hits, loadPage, logger, signal, onResult }: StandardCrawlArgs): Promise<EnrichedResult[]> => {
  const results: EnrichedResult[] = [];
  for (let i = 0; i < hits.length; i += 1) {
    if (signal?.aborted) {
      throw new Error('Aborted');
    }
    const hit = hits[i];
    if (!hit.link) continue;

    const record = await loadPage(hit.link, { signal });
    const content = record.content || hit.snippet;
    if (!content) {
      logger.warn('No content for search hit', { url: hit.link });
      continue;
    }
    const result = toEnrichedResult(record, {
      title: hit.title || record.title,
      link: hit.link,
      snippet: hit.snippet,
      content,
      depth: 0,
    });
    results.push(result);
    onResult?.(result, i + 1, hits.length);
  }
  return results;
};
