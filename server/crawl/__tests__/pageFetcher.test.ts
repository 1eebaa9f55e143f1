import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../../config/config';
import { createSilentLogger } from '../../obs/logger';
import { createPageLoader } from '../traversal';
import { createHttpPageFetcher, parsePageHtml } from '../pageFetcher';

const html = `
  <html>
    <head>
      <title>Fallback title</title>
      <meta name="author" content="Jane Doe" />
      <meta property="article:published_time" content="2024-03-01T10:00:00Z" />
      <meta property="article:tag" content="crawling" />
      <meta name="keywords" content="search, bfs" />
      <script>var tracking = true;</script>
    </head>
    <body>
      <nav><a href="/about#team">About</a></nav>
      <main>
        <h1>Main   heading</h1>
        <p>First paragraph.</p>
        <img src="/img/one.png" />
        <a href="https://site.com/next">Next</a>
        <a href="mailto:me@site.com">Mail</a>
        <a href="#top">Top</a>
        <a href="/about">About again</a>
      </main>
    </body>
  </html>
`;

const crawlConfig = buildConfig({}).crawl;

describe('parsePageHtml', () => {
  it('extracts the page fields', () => {
    const page = parsePageHtml(html, 'https://site.com/post');

    expect(page.title).toBe('Main heading');
    expect(page.content).toBe('Main heading First paragraph. Next Mail Top About again');
    expect(page.links).toEqual(['https://site.com/about', 'https://site.com/next']);
    expect(page.images).toEqual(['/img/one.png']);
    expect(page.date).toBe('2024-03-01T10:00:00Z');
    expect(page.author).toBe('Jane Doe');
    expect(page.tags).toEqual(['crawling', 'search', 'bfs']);
  });
});

describe('createHttpPageFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches and parses an HTML page', async () => {
    const fetchMock = vi.fn(async () => new Response(html, { status: 200, headers: { 'content-type': 'text/html' } }));
    vi.stubGlobal('fetch', fetchMock);

    const fetcher = createHttpPageFetcher({ config: crawlConfig, logger: createSilentLogger() });
    const result = await fetcher.fetch('https://site.com/post');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ title: 'Main heading', author: 'Jane Doe' });
  });

  it('returns null for error statuses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 404 })));

    const fetcher = createHttpPageFetcher({ config: crawlConfig, logger: createSilentLogger() });

    await expect(fetcher.fetch('https://site.com/missing')).resolves.toBeNull();
  });

  it('returns null for non-HTML responses', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('{}', { status: 200, headers: { 'content-type': 'application/json' } })),
    );

    const fetcher = createHttpPageFetcher({ config: crawlConfig, logger: createSilentLogger() });

    await expect(fetcher.fetch('https://site.com/data.json')).resolves.toBeNull();
  });

  it('does not read the body of non-HTML responses', async () => {
    const response = new Response('%PDF-1.7', { status: 200, headers: { 'content-type': 'application/pdf' } });
    const text = vi.spyOn(response, 'text');
    vi.stubGlobal('fetch', vi.fn(async () => response));

    const fetcher = createHttpPageFetcher({ config: crawlConfig, logger: createSilentLogger() });

    await expect(fetcher.fetch('https://site.com/f.pdf')).resolves.toBeNull();
    expect(text).not.toHaveBeenCalled();
  });

  it('does not read the body of error responses', async () => {
    const response = new Response('<html>gone</html>', { status: 410, headers: { 'content-type': 'text/html' } });
    const text = vi.spyOn(response, 'text');
    vi.stubGlobal('fetch', vi.fn(async () => response));

    const fetcher = createHttpPageFetcher({ config: crawlConfig, logger: createSilentLogger() });

    await expect(fetcher.fetch('https://site.com/gone')).resolves.toBeNull();
    expect(text).not.toHaveBeenCalled();
  });

  it('keeps relative links when the page redirects to another host', async () => {
    const response = new Response('<main><p>Home</p><a href="/docs">Docs</a></main>', {
      status: 200,
      headers: { 'content-type': 'text/html' },
    });
    Object.defineProperty(response, 'url', { value: 'https://www.site.com/' });
    vi.stubGlobal('fetch', vi.fn(async () => response));

    const loadPage = createPageLoader(createHttpPageFetcher({ config: crawlConfig, logger: createSilentLogger() }));
    const record = await loadPage('https://site.com/');

    expect(record.links).toEqual(['https://site.com/docs']);
  });

  it('refuses private addresses without calling fetch', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const fetcher = createHttpPageFetcher({ config: crawlConfig, logger: createSilentLogger() });

    await expect(fetcher.fetch('http://127.0.0.1/admin')).resolves.toBeNull();
    await expect(fetcher.fetch('http://localhost:3000/')).resolves.toBeNull();
    await expect(fetcher.fetch('ftp://site.com/file')).resolves.toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns null when the network call throws', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );

    const fetcher = createHttpPageFetcher({ config: crawlConfig, logger: createSilentLogger() });

    await expect(fetcher.fetch('https://site.com/post')).resolves.toBeNull();
  });
});
