export { GoogleSearchProvider, resolveSearchRequest } from './google.js';
export { buildSearchUrl, GOOGLE_SEARCH_ENDPOINT } from './google-url.js';
export {
  SEARCH_TIMEFRAMES,
  TIMEFRAME_CODES,
  DEFAULT_USER_AGENT,
  type SearchResult,
  type SearchOptions,
  type SearchRequest,
  type SearchTimeframe,
  type Candidate,
} from './types.js';
