import pLimit from 'p-limit';
import type { Logger } from 'pino';
import type { Candidate, SearchOptions, SearchRequest, SearchResult } from './types.js';
import { buildSearchUrl } from './google-url.js';
import { SearchConfigSchema } from '../config/schema.js';
import { HttpDocumentFetcher, type DocumentFetcher } from '../pipeline/document-fetcher.js';
import { extractCandidates } from '../pipeline/extractor.js';
import { PageEnricher } from '../pipeline/enricher.js';
import { AsyncChannel } from '../utils/channel.js';
import { InvalidRequestError, errorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const defaultLogger = createChildLogger('google');

export function resolveSearchRequest(term: string, options: SearchOptions = {}): SearchRequest {
  if (!term.trim()) {
    throw new InvalidRequestError('Search term must not be empty');
  }

  const result = SearchConfigSchema.safeParse(options);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new InvalidRequestError(`Invalid search options: ${errors}`);
  }

  return { term, ...result.data };
}

/**
 * Scrapes one page of Google results and, optionally, the text of every
 * linked page.
 *
 * Both entry points share the same pipeline and differ in delivery:
 * `search` waits for every page and fails as a whole if any page fetch
 * fails, `searchAsStream` yields results as their pages arrive and drops
 * the ones whose page could not be fetched.
 */
export class GoogleSearchProvider {
  private readonly enricher: PageEnricher;

  constructor(
    private readonly fetcher: DocumentFetcher = new HttpDocumentFetcher(),
    private readonly logger: Logger = defaultLogger
  ) {
    this.enricher = new PageEnricher(fetcher);
  }

  async search(term: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const request = resolveSearchRequest(term, options);
    const candidates = await this.fetchCandidates(request);
    const limit = pLimit(request.concurrency ?? Infinity);
    const results: SearchResult[] = [];

    await Promise.all(
      candidates.map((candidate) =>
        limit(async () => {
          const result = await this.processCandidate(candidate, request);
          if (result) {
            results.push(result);
          }
        })
      )
    );

    this.logger.info({ term: request.term, results: results.length }, 'Search complete');
    return results;
  }

  async *searchAsStream(
    term: string,
    options: SearchOptions = {}
  ): AsyncGenerator<SearchResult, void, undefined> {
    const request = resolveSearchRequest(term, options);
    const candidates = await this.fetchCandidates(request);
    const limit = pLimit(request.concurrency ?? Infinity);
    const channel = new AsyncChannel<SearchResult>();

    const tasks = candidates.map((candidate) =>
      limit(async () => {
        try {
          const result = await this.processCandidate(candidate, request);
          if (result) {
            channel.push(result);
          }
        } catch (error) {
          this.logger.warn(
            { href: candidate.href, error: errorMessage(error), err: error },
            'Dropping result, page fetch failed'
          );
        }
      })
    );

    void Promise.allSettled(tasks).then(() => {
      this.logger.info({ term: request.term }, 'Search stream complete');
      channel.close();
    });

    yield* channel;
  }

  private async fetchCandidates(request: SearchRequest): Promise<Candidate[]> {
    const url = buildSearchUrl(request);
    this.logger.debug({ term: request.term, url }, 'Fetching search page');

    const page = await this.fetcher.fetch(url, {
      userAgent: request.userAgent,
      timeoutMs: request.timeoutMs,
    });
    const candidates = extractCandidates(page);

    this.logger.debug({ count: candidates.length }, 'Result blocks extracted');
    return candidates;
  }

  private async processCandidate(
    candidate: Candidate,
    request: SearchRequest
  ): Promise<SearchResult | null> {
    if (!candidate.title || !candidate.href) {
      this.logger.debug({ candidate }, 'Skipping incomplete result block');
      return null;
    }

    const pageText = await this.enricher.enrich(candidate.href, {
      readPageText: request.readPageText,
      userAgent: request.userAgent,
      timeoutMs: request.timeoutMs,
    });

    return {
      title: candidate.title,
      href: candidate.href,
      pageText,
    };
  }
}
