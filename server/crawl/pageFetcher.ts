import { load, type CheerioAPI } from 'cheerio';
import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';

/** Shape produced by {@link createHttpPageFetcher}; read through the normalizer. */
export interface RawPageResult {
  title: string;
  content: string;
  links: string[];
  images: string[];
  date: string;
  author: string;
  tags: string[];
}

export interface PageFetchOptions {
  signal?: AbortSignal;
}

export interface PageFetcher {
  /** Resolves to `null` when nothing usable could be fetched. Never rejects. */
  fetch: (url: string, options?: PageFetchOptions) => Promise<unknown>;
}

export interface HttpPageFetcherDeps {
  config: AppConfig['crawl'];
  logger: Logger;
}

const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

const PRIVATE_IP_RANGES = [
  /^127\./,
  /^10\./,
  /^192\.168\./,
  /^172\.(1[6-9]|2[0-9]|3[0-1])\./,
  /^169\.254\./,
];

const PRIVATE_IPV6_PREFIXES = ['[fc', '[fd', '[fe80', '[::1]'];

const isIpv4 = (value: string): boolean => /^(\d{1,3}\.){3}\d{1,3}$/.test(value);

const assertUrlAllowed = (rawUrl: string) => {
  const parsed = new URL(rawUrl);
  if (!TRUSTED_PROTOCOLS.has(parsed.protocol)) {
    throw new Error(`Unsupported protocol: ${parsed.protocol}`);
  }
  const host = parsed.hostname.toLowerCase();
  if (host === 'localhost' || host.endsWith('.local')) {
    throw new Error(`Blocked hostname: ${host}`);
  }
  if (isIpv4(host) && PRIVATE_IP_RANGES.some((pattern) => pattern.test(host))) {
    throw new Error(`Blocked IP address: ${host}`);
  }
  if (PRIVATE_IPV6_PREFIXES.some((prefix) => host.startsWith(prefix))) {
    throw new Error(`Blocked IP address: ${host}`);
  }
};

interface TimedFetchOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
}

// `consume` runs inside the timeout window, so a slow body read is cut off too.
const fetchWithTimeout = async <T>(
  url: string,
  options: TimedFetchOptions,
  consume: (response: Response) => Promise<T>,
): Promise<T> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  let abortListener: (() => void) | null = null;

  if (options.signal) {
    if (options.signal.aborted) {
      clearTimeout(timer);
      throw new Error('Aborted');
    }
    abortListener = () => controller.abort();
    options.signal.addEventListener('abort', abortListener, { once: true });
  }

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      redirect: 'follow',
      signal: controller.signal,
    });
    return await consume(response);
  } finally {
    clearTimeout(timer);
    if (abortListener && options.signal) {
      options.signal.removeEventListener('abort', abortListener);
    }
  }
};

const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

const CONTENT_SELECTORS = ['main', 'article', '.post-content', '.article-content', '.content', 'body'];

const metaContent = ($: CheerioAPI, selector: string): string => normalizeWhitespace($(selector).first().attr('content') ?? '');

const extractContent = ($: CheerioAPI): string => {
  for (const selector of CONTENT_SELECTORS) {
    const text = normalizeWhitespace($(selector).first().text());
    if (text) return text;
  }
  return '';
};

const extractLinks = ($: CheerioAPI, baseUrl: string): string[] => {
  const seen = new Set<string>();
  const links: string[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')?.trim();
    if (!href || href.startsWith('#')) return;
    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      return;
    }
    if (!TRUSTED_PROTOCOLS.has(resolved.protocol)) return;
    resolved.hash = '';
    const value = resolved.toString();
    if (seen.has(value)) return;
    seen.add(value);
    links.push(value);
  });
  return links;
};

const extractTags = ($: CheerioAPI): string[] => {
  const tags: string[] = [];
  $('meta[property="article:tag"]').each((_, el) => {
    const value = normalizeWhitespace($(el).attr('content') ?? '');
    if (value) tags.push(value);
  });
  const keywords = metaContent($, 'meta[name="keywords"]');
  if (keywords) {
    tags.push(...keywords.split(',').map((k) => k.trim()).filter(Boolean));
  }
  return tags;
};

export const parsePageHtml = (html: string, baseUrl: string): RawPageResult => {
  const $ = load(html);
  // Links and images are read before the non-content elements are dropped.
  const links = extractLinks($, baseUrl);
  const images = $('img[src]')
    .map((_, el) => $(el).attr('src')?.trim() ?? '')
    .get()
    .filter(Boolean);
  $('script, style, noscript, template, svg').remove();

  const title =
    normalizeWhitespace($('h1').first().text()) ||
    normalizeWhitespace($('title').first().text()) ||
    metaContent($, 'meta[property="og:title"]');

  const date =
    metaContent($, 'meta[property="article:published_time"]') ||
    normalizeWhitespace($('time[datetime]').first().attr('datetime') ?? '') ||
    normalizeWhitespace($('.post-date, .date').first().text());

  const author = metaContent($, 'meta[name="author"]') || normalizeWhitespace($('.author, .writer').first().text());

  return {
    title,
    content: extractContent($),
    links,
    images,
    date,
    author,
    tags: extractTags($),
  };
};

const hostOf = (rawUrl: string): string | null => {
  try {
    return new URL(rawUrl).host;
  } catch {
    return null;
  }
};

export const createHttpPageFetcher = ({ config, logger }: HttpPageFetcherDeps): PageFetcher => {
  const discardBody = async (response: Response, url: string) => {
    try {
      await response.body?.cancel();
    } catch (error) {
      logger.debug('Failed to discard response body', { url, error: error instanceof Error ? error.message : String(error) });
    }
  };

  return {
    fetch: async (url, options = {}) => {
      const startedAt = Date.now();
      try {
        assertUrlAllowed(url);
        return await fetchWithTimeout(
          url,
          { timeoutMs: config.fetchTimeoutMs, userAgent: config.userAgent, signal: options.signal },
          async (response) => {
            if (!response.ok) {
              await discardBody(response, url);
              logger.warn('Page fetch failed', { url, status: response.status });
              return null;
            }
            const contentType = response.headers.get('content-type') ?? '';
            if (contentType && !/html|xml|text\/plain/i.test(contentType)) {
              await discardBody(response, url);
              logger.debug('Skipping non-HTML page', { url, contentType });
              return null;
            }
            const finalUrl = response.url || url;
            if (hostOf(finalUrl) !== hostOf(url)) {
              logger.info('Page redirected to another host', { url, finalUrl });
            }
            // Links are resolved against the requested URL: the normalizer keeps
            // only links on its host.
            const result = parsePageHtml(await response.text(), url);
            logger.debug('Page fetched', { url, elapsedMs: Date.now() - startedAt, links: result.links.length });
            return result;
          },
        );
      } catch (error) {
        logger.warn('Page fetch error', { url, error: error instanceof Error ? error.message : String(error) });
        return null;
      }
    },
  };
};
