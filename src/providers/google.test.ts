import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { GoogleSearchProvider, resolveSearchRequest } from './google.js';
import { buildSearchUrl } from './google-url.js';
import { DEFAULT_USER_AGENT, type SearchResult } from './types.js';
import { FetchError, InvalidRequestError } from '../utils/errors.js';
import { FakeDocumentFetcher, articlePage, resultsPage } from '../testing/fake-fetcher.js';

const TERM = 'typescript generics';
const SEARCH_URL = buildSearchUrl(resolveSearchRequest(TERM));

const GUIDE = { title: 'Generics guide', href: 'https://example.com/guide' };
const HANDBOOK = { title: 'Handbook', href: 'https://docs.example.org/handbook' };
const BLOG = { title: 'Blog post', href: 'https://blog.example.net/post' };
const FORUM = { title: 'Forum thread', href: 'https://forum.example.io/thread' };
const PAGES = [GUIDE, HANDBOOK, BLOG, FORUM];

function byHref(a: SearchResult, b: SearchResult): number {
  return a.href.localeCompare(b.href);
}

async function collect(stream: AsyncIterable<SearchResult>): Promise<SearchResult[]> {
  const results: SearchResult[] = [];
  for await (const result of stream) {
    results.push(result);
  }
  return results;
}

describe('GoogleSearchProvider', () => {
  let fetcher: FakeDocumentFetcher;
  let provider: GoogleSearchProvider;

  beforeEach(() => {
    fetcher = new FakeDocumentFetcher();
    provider = new GoogleSearchProvider(fetcher);
  });

  function serveArticles(): void {
    for (const page of PAGES) {
      fetcher.serve(page.href, { html: articlePage(page.title, `Body of ${page.title}`) });
    }
  }

  describe('Request', () => {
    it('fetches the search page with the configured user agent and timeout', async () => {
      const url = 'https://www.google.com/search?q=rust+lang&hl=en&safe=active&num=7&tbs=qdr:w';
      fetcher.serve(url, { html: resultsPage([]) });

      await provider.search('rust lang', {
        numResults: 5,
        timeframe: 'past-week',
        userAgent: 'test-agent/1.0',
        timeoutMs: 2500,
      });

      expect(fetcher.requests).toEqual([
        { url, options: { userAgent: 'test-agent/1.0', timeoutMs: 2500 } },
      ]);
    });

    it('uses the defaults when no options are given', () => {
      const request = resolveSearchRequest('rust lang');

      expect(request).toEqual({
        term: 'rust lang',
        numResults: 10,
        language: 'en',
        safeMode: 'active',
        timeoutMs: 10000,
        readPageText: true,
        userAgent: DEFAULT_USER_AGENT,
      });
    });

    it('rejects a blank term before any request', async () => {
      await expect(provider.search('   ')).rejects.toBeInstanceOf(InvalidRequestError);
      expect(fetcher.requests).toHaveLength(0);
    });

    it('rejects invalid options before any request', async () => {
      await expect(provider.search(TERM, { numResults: 0 })).rejects.toThrow(
        'Invalid search options: numResults'
      );
      await expect(provider.searchAsStream(TERM, { timeoutMs: -1 }).next()).rejects.toBeInstanceOf(
        InvalidRequestError
      );
      expect(fetcher.requests).toHaveLength(0);
    });
  });

  describe('search', () => {
    it('drops blocks without a link and returns the rest', async () => {
      fetcher.serve(SEARCH_URL, {
        html: resultsPage([GUIDE, HANDBOOK, { title: 'No link here' }, BLOG]),
      });

      const results = await provider.search(TERM, { readPageText: false });

      expect(results.sort(byHref)).toEqual([
        { title: 'Blog post', href: 'https://blog.example.net/post', pageText: '' },
        { title: 'Handbook', href: 'https://docs.example.org/handbook', pageText: '' },
        { title: 'Generics guide', href: 'https://example.com/guide', pageText: '' },
      ]);
      expect(fetcher.requestedUrls()).toEqual([SEARCH_URL]);
    });

    it('drops blocks without a heading and never fetches their page', async () => {
      fetcher.serve(SEARCH_URL, {
        html: resultsPage([GUIDE, { href: 'https://example.com/untitled' }]),
      });
      serveArticles();

      const results = await provider.search(TERM);

      expect(results).toEqual([
        {
          title: 'Generics guide',
          href: 'https://example.com/guide',
          pageText: 'Generics guide Body of Generics guide',
        },
      ]);
      expect(fetcher.requestedUrls()).not.toContain('https://example.com/untitled');
    });

    it('reads the text of every linked page', async () => {
      fetcher.serve(SEARCH_URL, { html: resultsPage(PAGES) });
      serveArticles();

      const results = await provider.search(TERM);

      expect(results).toHaveLength(4);
      for (const result of results) {
        expect(result.pageText).toBe(`${result.title} Body of ${result.title}`);
      }
      expect(fetcher.requests.slice(1).map((r) => r.options)).toEqual(
        PAGES.map(() => ({ userAgent: DEFAULT_USER_AGENT, timeoutMs: 10000 }))
      );
    });

    it('returns an empty list when the page has no result blocks', async () => {
      fetcher.serve(SEARCH_URL, { html: '<html><body><p>No results</p></body></html>' });

      await expect(provider.search(TERM)).resolves.toEqual([]);
    });

    it('fails when the search page cannot be fetched', async () => {
      fetcher.serve(SEARCH_URL, { error: new FetchError(SEARCH_URL, 'HTTP 429: Too Many Requests', 429) });

      await expect(provider.search(TERM)).rejects.toMatchObject({
        name: 'FetchError',
        url: SEARCH_URL,
        statusCode: 429,
      });
    });

    it('fails as a whole when one linked page cannot be fetched', async () => {
      fetcher.serve(SEARCH_URL, { html: resultsPage(PAGES) });
      serveArticles();
      const failing = BLOG.href;
      fetcher.serve(failing, { error: new FetchError(failing, 'HTTP 500: Internal Server Error', 500) });

      await expect(provider.search(TERM)).rejects.toMatchObject({
        name: 'FetchError',
        url: failing,
      });
    });

    it('does not fetch linked pages when page text is disabled', async () => {
      fetcher.serve(SEARCH_URL, { html: resultsPage(PAGES) });

      const results = await provider.search(TERM, { readPageText: false });

      expect(results).toHaveLength(4);
      expect(results.every((r) => r.pageText === '')).toBe(true);
      expect(fetcher.requests).toHaveLength(1);
    });

    it('fetches every linked page at once by default', async () => {
      fetcher.serve(SEARCH_URL, { html: resultsPage(PAGES) });
      for (const page of PAGES) {
        fetcher.serve(page.href, { html: articlePage(page.title, 'text'), delayMs: 20 });
      }

      await provider.search(TERM);

      expect(fetcher.maxInFlight).toBe(4);
    });

    it('caps simultaneous page fetches when a concurrency is set', async () => {
      fetcher.serve(SEARCH_URL, { html: resultsPage(PAGES) });
      for (const page of PAGES) {
        fetcher.serve(page.href, { html: articlePage(page.title, 'text'), delayMs: 20 });
      }

      const results = await provider.search(TERM, { concurrency: 2 });

      expect(results).toHaveLength(4);
      expect(fetcher.maxInFlight).toBe(2);
    });
  });

  describe('searchAsStream', () => {
    it('yields every well-formed result and completes', async () => {
      fetcher.serve(SEARCH_URL, {
        html: resultsPage([GUIDE, { title: 'No link here' }, HANDBOOK, BLOG]),
      });

      const results = await collect(provider.searchAsStream(TERM, { readPageText: false }));

      expect(results.sort(byHref)).toEqual([
        { title: 'Blog post', href: 'https://blog.example.net/post', pageText: '' },
        { title: 'Handbook', href: 'https://docs.example.org/handbook', pageText: '' },
        { title: 'Generics guide', href: 'https://example.com/guide', pageText: '' },
      ]);
    });

    it('drops only the result whose page cannot be fetched', async () => {
      fetcher.serve(SEARCH_URL, { html: resultsPage(PAGES) });
      serveArticles();
      const failing = HANDBOOK.href;
      fetcher.serve(failing, { error: new FetchError(failing, 'HTTP 500: Internal Server Error', 500) });

      const results = await collect(provider.searchAsStream(TERM));

      expect(results.map((r) => r.href).sort()).toEqual([
        'https://blog.example.net/post',
        'https://example.com/guide',
        'https://forum.example.io/thread',
      ]);
      expect(results.every((r) => r.pageText.startsWith(r.title))).toBe(true);
    });

    it('logs why a dropped result could not be fetched', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });
      provider = new GoogleSearchProvider(fetcher, logger);
      fetcher.serve(SEARCH_URL, { html: resultsPage([GUIDE, BLOG]) });
      serveArticles();
      fetcher.serve(BLOG.href, {
        error: new FetchError(BLOG.href, 'Request timed out after 500ms'),
      });

      const results = await collect(provider.searchAsStream(TERM));

      expect(results.map((r) => r.href)).toEqual([GUIDE.href]);
      expect(lines.map((line) => JSON.parse(line))).toEqual([
        expect.objectContaining({
          level: 40,
          msg: 'Dropping result, page fetch failed',
          href: BLOG.href,
          error: '[https://blog.example.net/post] Request timed out after 500ms',
          err: expect.objectContaining({
            type: 'FetchError',
            message: '[https://blog.example.net/post] Request timed out after 500ms',
          }),
        }),
      ]);
    });

    it('yields results in the order their pages arrive', async () => {
      fetcher.serve(SEARCH_URL, { html: resultsPage([GUIDE, HANDBOOK]) });
      fetcher.serve(GUIDE.href, { html: articlePage('slow', 'slow'), delayMs: 50 });
      fetcher.serve(HANDBOOK.href, { html: articlePage('fast', 'fast') });

      const results = await collect(provider.searchAsStream(TERM));

      expect(results.map((r) => r.href)).toEqual([HANDBOOK.href, GUIDE.href]);
    });

    it('fails on the first read when the search page cannot be fetched', async () => {
      fetcher.serve(SEARCH_URL, { error: new FetchError(SEARCH_URL, 'HTTP 503: Service Unavailable', 503) });

      const stream = provider.searchAsStream(TERM);

      await expect(stream.next()).rejects.toBeInstanceOf(FetchError);
      await expect(stream.next()).resolves.toEqual({ value: undefined, done: true });
    });

    it('does not touch the network before the first read', () => {
      fetcher.serve(SEARCH_URL, { html: resultsPage(PAGES) });

      provider.searchAsStream(TERM);

      expect(fetcher.requests).toHaveLength(0);
    });
  });
});
