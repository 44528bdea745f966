import { load } from 'cheerio';
import type { DocumentFetcher, FetchedDocument, FetchOptions } from '../pipeline/document-fetcher.js';
import { FetchError } from '../utils/errors.js';

export interface FakePage {
  html?: string;
  error?: Error;
  delayMs?: number;
}

/** Serves fixed HTML by URL; unknown URLs fail with a 404. */
export class FakeDocumentFetcher implements DocumentFetcher {
  readonly requests: Array<{ url: string; options: FetchOptions }> = [];
  private inFlight = 0;
  maxInFlight = 0;

  constructor(private pages: Map<string, FakePage> = new Map()) {}

  serve(url: string, page: FakePage): this {
    this.pages.set(url, page);
    return this;
  }

  async fetch(url: string, options: FetchOptions): Promise<FetchedDocument> {
    this.requests.push({ url, options });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      const page = this.pages.get(url);
      if (page?.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, page.delayMs));
      }
      if (!page) {
        throw new FetchError(url, 'HTTP 404: Not Found', 404);
      }
      if (page.error) {
        throw page.error;
      }
      return { url, $: load(page.html ?? '') };
    } finally {
      this.inFlight -= 1;
    }
  }

  requestedUrls(): string[] {
    return this.requests.map((r) => r.url);
  }
}

export interface ResultBlock {
  title?: string;
  href?: string;
}

/** Builds a results page with one `div.g` block per entry. */
export function resultsPage(blocks: ResultBlock[]): string {
  const body = blocks
    .map(({ title, href }) => {
      const heading = title !== undefined ? `<h3>${title}</h3>` : `<span>untitled</span>`;
      const link = href !== undefined ? `<a href="${href}">${heading}</a>` : heading;
      return `<div class="g"><div class="yuRUbf">${link}</div><div class="VwiC3b">Snippet</div></div>`;
    })
    .join('');

  return `<html><body><div id="search"><div id="rso">${body}</div></div></body></html>`;
}

export function articlePage(title: string, body: string): string {
  return `<html><head><title>${title}</title></head><body><p>${body}</p></body></html>`;
}
