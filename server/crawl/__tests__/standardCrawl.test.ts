import { describe, expect, it, vi } from 'vitest';
import type { PageRecord } from '../../../shared/types';
import { createSilentLogger } from '../../obs/logger';
import { emptyPageRecord } from '../normalizer';
import { crawlHits } from '../standardCrawl';
import type { PageLoader } from '../traversal';

const record = (url: string, content: string): PageRecord => ({
  sourceUrl: url,
  title: 'Page title',
  content,
  links: ['https://site.com/other'],
  images: ['https://site.com/a.png'],
  author: 'Ann',
  tags: new Set(['t1']),
});

describe('crawlHits', () => {
  it('keeps hit order and metadata, falling back to the snippet', async () => {
    const pages: Record<string, PageRecord> = {
      'https://site.com/1': record('https://site.com/1', 'Full page text'),
    };
    const loadPage = vi.fn<PageLoader>(async (url) => pages[url] ?? emptyPageRecord(url));
    const onResult = vi.fn();

    const results = await crawlHits({
      hits: [
        { title: 'Hit one', link: 'https://site.com/1', snippet: 'one' },
        { title: '', link: 'https://site.com/2', snippet: 'two' },
        { title: 'No content', link: 'https://site.com/3', snippet: '' },
        { title: 'No link', link: '', snippet: 'ignored' },
      ],
      loadPage,
      logger: createSilentLogger(),
      onResult,
    });

    expect(results).toEqual([
      {
        title: 'Hit one',
        link: 'https://site.com/1',
        snippet: 'one',
        content: 'Full page text',
        depth: 0,
        author: 'Ann',
        tags: ['t1'],
        images: ['https://site.com/a.png'],
      },
      {
        title: 'https://site.com/2',
        link: 'https://site.com/2',
        snippet: 'two',
        content: 'two',
        depth: 0,
        tags: [],
        images: [],
      },
    ]);
    expect(loadPage).toHaveBeenCalledTimes(3);
    expect(onResult.mock.calls.map(([, index, total]) => [index, total])).toEqual([
      [1, 4],
      [2, 4],
    ]);
  });
});
