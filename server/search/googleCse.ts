import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import type { SearchApi, SearchApiPage } from './types';

const GOOGLE_SEARCH_ENDPOINT = 'https://customsearch.googleapis.com/customsearch/v1';

const ResponseSchema = z.object({
  items: z.array(z.record(z.unknown())).optional(),
});

/**
 * Google Custom Search JSON API. The API serves at most 10 items per call and
 * refuses start offsets beyond 100.
 */
export const createGoogleCseApi = (config: AppConfig['search']['googleCse']): SearchApi => ({
  list: async (query, startIndex, count, signal): Promise<SearchApiPage> => {
    const { apiKey, searchEngineId } = config;
    if (!apiKey || !searchEngineId) {
      throw new Error('Google CSE credentials missing');
    }

    const params = new URLSearchParams({
      key: apiKey,
      cx: searchEngineId,
      q: query,
      num: String(count),
      start: String(startIndex),
      fields: 'items(title,link,snippet)',
    });

    const response = await fetch(`${GOOGLE_SEARCH_ENDPOINT}?${params.toString()}`, {
      method: 'GET',
      signal,
    });

    if (!response.ok) {
      if (response.status === 429) {
        throw new Error('Google CSE quota exceeded');
      }
      const text = await response.text().catch(() => '');
      throw new Error(`Google CSE request failed: ${response.status} ${response.statusText} ${text}`.trim());
    }

    const parsed = ResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Google CSE returned an unexpected payload');
    }
    return { items: parsed.data.items };
  },
});
