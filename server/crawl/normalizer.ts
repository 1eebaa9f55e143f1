import type { PageRecord } from '../../shared/types';

export const MAX_PAGE_IMAGES = 5;

export const contentPlaceholder = (url: string): string => `no content extracted - ${url}`;

/**
 * Record for a URL whose fetch produced nothing. Content stays empty so the
 * crawl can tell a failed fetch apart from a page with no extractable text.
 */
export const emptyPageRecord = (url: string): PageRecord => ({
  sourceUrl: url,
  title: url,
  content: '',
  links: [],
  images: [],
  tags: new Set<string>(),
});

// Fetchers hand back either a keyed mapping or an object exposing the same
// names as accessors. This is the only place that knows about both shapes.
const readField = (raw: unknown, key: string): unknown => {
  if (raw instanceof Map) {
    return raw.get(key);
  }
  if (typeof raw !== 'object' || raw === null) {
    return undefined;
  }
  try {
    return Reflect.get(raw, key);
  } catch {
    return undefined;
  }
};

const readString = (raw: unknown, key: string): string => {
  const value = readField(raw, key);
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString();
  }
  return '';
};

const readList = (raw: unknown, key: string): unknown[] => {
  const value = readField(raw, key);
  if (Array.isArray(value)) {
    return value;
  }
  if (value instanceof Set) {
    return Array.from(value);
  }
  return [];
};

const hostOf = (rawUrl: string): string | null => {
  try {
    return new URL(rawUrl).host;
  } catch {
    return null;
  }
};

export const filterSameHostLinks = (rawLinks: unknown[], requestedUrl: string): string[] => {
  const baseHost = hostOf(requestedUrl);
  if (baseHost == null) {
    return [];
  }
  const links: string[] = [];
  for (const link of rawLinks) {
    if (typeof link !== 'string') continue;
    if (hostOf(link) === baseHost) {
      links.push(link);
    }
  }
  return links;
};

export const normalizeImageUrls = (rawImages: unknown[], requestedUrl: string): string[] => {
  const images: string[] = [];
  for (const entry of rawImages) {
    if (typeof entry !== 'string') continue;
    let img = entry;
    if (img.startsWith('//')) {
      img = `https:${img}`;
    } else if (!/^https?:\/\//i.test(img)) {
      try {
        img = new URL(img, requestedUrl).toString();
      } catch {
        continue;
      }
    }
    images.push(img);
  }
  return images.slice(0, MAX_PAGE_IMAGES);
};

const readTags = (raw: unknown): Set<string> => {
  const value = readField(raw, 'tags');
  const entries =
    typeof value === 'string' ? value.split(',') : readList(raw, 'tags').filter((tag): tag is string => typeof tag === 'string');
  return new Set(entries.map((tag) => tag.trim()).filter(Boolean));
};

/**
 * Turns whatever the fetcher returned into a {@link PageRecord}. Never throws:
 * missing or oddly typed fields fall back to empty values.
 */
export const normalizePageResult = (raw: unknown, requestedUrl: string): PageRecord => {
  if (raw == null || raw === '') {
    return emptyPageRecord(requestedUrl);
  }

  const content = readString(raw, 'content') || readString(raw, 'markdown');
  const title = readString(raw, 'title').trim() || requestedUrl;
  const publishedDate = readString(raw, 'date').trim();
  const author = readString(raw, 'author').trim();

  return {
    sourceUrl: requestedUrl,
    title,
    content: content || contentPlaceholder(requestedUrl),
    links: filterSameHostLinks(readList(raw, 'links'), requestedUrl),
    images: normalizeImageUrls(readList(raw, 'images'), requestedUrl),
    publishedDate: publishedDate || undefined,
    author: author || undefined,
    tags: readTags(raw),
  };
};
