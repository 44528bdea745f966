import { load, type CheerioAPI } from 'cheerio';
import { FetchError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('document-fetcher');

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const PARSEABLE_CONTENT_TYPE = /^(text\/|application\/([\w.+-]*\+)?xml)/i;

export interface FetchedDocument {
  /** Final URL after redirects. */
  url: string;
  $: CheerioAPI;
}

export interface FetchOptions {
  userAgent: string;
  timeoutMs: number;
}

export interface DocumentFetcher {
  fetch(url: string, options: FetchOptions): Promise<FetchedDocument>;
}

export class HttpDocumentFetcher implements DocumentFetcher {
  async fetch(url: string, options: FetchOptions): Promise<FetchedDocument> {
    logger.debug({ url, timeoutMs: options.timeoutMs }, 'Fetching document');

    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(options.timeoutMs),
        redirect: 'follow',
        headers: {
          'User-Agent': options.userAgent,
          Accept: HTML_ACCEPT,
        },
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new FetchError(
          url,
          `HTTP ${response.status}: ${response.statusText}`,
          response.status
        );
      }

      const contentType = response.headers.get('content-type');
      if (contentType && !PARSEABLE_CONTENT_TYPE.test(contentType)) {
        await response.body?.cancel();
        throw new FetchError(url, `Unsupported content type: ${contentType}`, response.status);
      }

      const html = await response.text();
      logger.debug({ url, bytes: html.length }, 'Document fetched');

      return {
        url: response.url || url,
        $: load(html),
      };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new FetchError(url, `Request timed out after ${options.timeoutMs}ms`, undefined, {
          cause: error,
        });
      }
      throw new FetchError(url, `Fetch failed: ${error}`, undefined, { cause: error });
    }
  }
}
