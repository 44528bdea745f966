import { GoogleSearchProvider } from './providers/google.js';
import type { SearchOptions, SearchResult } from './providers/types.js';

export * from './providers/index.js';
export * from './pipeline/index.js';
export {
  GserpError,
  ConfigError,
  FetchError,
  InvalidRequestError,
  OutputError,
  AsyncChannel,
  createChildLogger,
} from './utils/index.js';

const defaultProvider = new GoogleSearchProvider();

/** Returns every result once all linked pages have been read. */
export function search(term: string, options?: SearchOptions): Promise<SearchResult[]> {
  return defaultProvider.search(term, options);
}

/** Yields results as soon as each linked page has been read. */
export function searchAsStream(
  term: string,
  options?: SearchOptions
): AsyncGenerator<SearchResult, void, undefined> {
  return defaultProvider.searchAsStream(term, options);
}
