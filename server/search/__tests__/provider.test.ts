import { describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '../../obs/logger';
import { createPaginatedSearchProvider } from '../provider';
import type { SearchApi, SearchApiItem } from '../types';

const items = (start: number, count: number): SearchApiItem[] =>
  Array.from({ length: count }, (_, i) => ({
    title: `Result ${start + i}`,
    link: `https://site.com/${start + i}`,
    snippet: `snippet ${start + i}`,
  }));

const makeApi = (list: SearchApi['list']) => {
  const mock = vi.fn(list);
  return { api: { list: mock }, mock };
};

describe('createPaginatedSearchProvider', () => {
  it('requests pages of at most ten until the count is reached', async () => {
    const { api, mock } = makeApi(async (_query, startIndex, count) => ({ items: items(startIndex, count) }));
    const provider = createPaginatedSearchProvider({ api, logger: createSilentLogger() });

    const hits = await provider.fetchResults('bfs crawling', 25);

    expect(mock.mock.calls.map(([, start, count]) => [start, count])).toEqual([
      [1, 10],
      [11, 10],
      [21, 5],
    ]);
    expect(hits).toHaveLength(25);
    expect(hits[24]).toEqual({ title: 'Result 25', link: 'https://site.com/25', snippet: 'snippet 25' });
  });

  it('stops at the first empty page', async () => {
    const { api, mock } = makeApi(async (_query, startIndex, count) =>
      startIndex === 1 ? { items: items(1, count) } : {},
    );
    const provider = createPaginatedSearchProvider({ api, logger: createSilentLogger() });

    const hits = await provider.fetchResults('q', 30);

    expect(hits).toHaveLength(10);
    expect(mock).toHaveBeenCalledTimes(2);
  });

  it('returns collected hits when a later page fails', async () => {
    const { api } = makeApi(async (_query, startIndex, count) => {
      if (startIndex > 1) throw new Error('Google CSE quota exceeded');
      return { items: items(1, count) };
    });
    const provider = createPaginatedSearchProvider({ api, logger: createSilentLogger() });

    await expect(provider.fetchResults('q', 15)).resolves.toHaveLength(10);
  });

  it('never requests a start offset beyond 100', async () => {
    const { api, mock } = makeApi(async (_query, startIndex, count) => ({ items: items(startIndex, count) }));
    const provider = createPaginatedSearchProvider({ api, logger: createSilentLogger() });

    const hits = await provider.fetchResults('q', 150);

    expect(hits).toHaveLength(100);
    expect(mock.mock.calls.at(-1)?.[1]).toBe(91);
  });

  it('fills missing item fields with empty strings', async () => {
    const { api } = makeApi(async () => ({ items: [{ link: 'https://site.com/x', title: 7 }] }));
    const provider = createPaginatedSearchProvider({ api, logger: createSilentLogger() });

    await expect(provider.fetchResults('q', 1)).resolves.toEqual([{ title: '', link: 'https://site.com/x', snippet: '' }]);
  });

  it('returns nothing for a non-positive count', async () => {
    const { api, mock } = makeApi(async () => ({ items: items(1, 10) }));
    const provider = createPaginatedSearchProvider({ api, logger: createSilentLogger() });

    await expect(provider.fetchResults('q', 0)).resolves.toEqual([]);
    expect(mock).not.toHaveBeenCalled();
  });
});
