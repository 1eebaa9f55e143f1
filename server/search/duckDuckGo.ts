import { load } from 'cheerio';
import type { SearchHit } from '../../shared/types';
import type { Logger } from '../obs/logger';

const DUCKDUCKGO_HTML_ENDPOINT = 'https://html.duckduckgo.com/html/';

export interface DuckDuckGoDiscoveryDeps {
  logger: Logger;
  userAgent: string;
  endpoint?: string;
}

// Result anchors point at a redirector (`//duckduckgo.com/l/?uddg=<target>`).
export const unwrapResultLink = (href: string): string | null => {
  const absolute = href.startsWith('//') ? `https:${href}` : href;
  let parsed: URL;
  try {
    parsed = new URL(absolute, 'https://duckduckgo.com');
  } catch {
    return null;
  }
  if (parsed.hostname.endsWith('duckduckgo.com') && parsed.pathname === '/l/') {
    const target = parsed.searchParams.get('uddg');
    return target && /^https?:\/\//i.test(target) ? target : null;
  }
  return /^https?:$/.test(parsed.protocol) ? parsed.toString() : null;
};

export const parseDuckDuckGoResults = (html: string, limit: number): SearchHit[] => {
  const $ = load(html);
  const byLink = new Map<string, SearchHit>();
  $('a.result__a').each((_, anchor) => {
    const href = $(anchor).attr('href');
    const title = $(anchor).text().replace(/\s+/g, ' ').trim();
    if (!href || !title) return;
    const link = unwrapResultLink(href);
    if (!link || byLink.has(link)) return;
    const snippet = $(anchor).closest('.result').find('.result__snippet').first().text().replace(/\s+/g, ' ').trim();
    byLink.set(link, { title, link, snippet });
  });
  return Array.from(byLink.values()).slice(0, Math.max(0, limit));
};

/**
 * Scrapes DuckDuckGo's HTML results page. Used only when the primary search
 * API comes back empty; any failure yields an empty list.
 */
export const createDuckDuckGoDiscovery = ({ logger, userAgent, endpoint = DUCKDUCKGO_HTML_ENDPOINT }: DuckDuckGoDiscoveryDeps) => ({
  discover: async (query: string, numResults: number, signal?: AbortSignal): Promise<SearchHit[]> => {
    try {
      const params = new URLSearchParams({ q: query });
      const response = await fetch(`${endpoint}?${params.toString()}`, {
        method: 'GET',
        headers: { 'User-Agent': userAgent, Accept: 'text/html' },
        signal,
      });
      if (!response.ok) {
        logger.warn('Fallback search failed', { status: response.status });
        return [];
      }
      const hits = parseDuckDuckGoResults(await response.text(), numResults);
      logger.info('Fallback search finished', { query, returned: hits.length });
      return hits;
    } catch (error) {
      logger.warn('Fallback search error', { query, error: error instanceof Error ? error.message : String(error) });
      return [];
    }
  },
});

export type AlternateDiscovery = ReturnType<typeof createDuckDuckGoDiscovery>;
