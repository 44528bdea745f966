import { TIMEFRAME_CODES, type SearchRequest } from './types.js';

export const GOOGLE_SEARCH_ENDPOINT = 'https://www.google.com/search';

// Google renders a couple of blocks per page that are not organic results
const RESULT_COUNT_PADDING = 2;

export function buildSearchUrl(
  request: Pick<SearchRequest, 'term' | 'numResults' | 'language' | 'safeMode' | 'timeframe'>
): string {
  const params = new URLSearchParams({
    q: request.term.trim(),
    hl: request.language,
    safe: request.safeMode,
    num: (request.numResults + RESULT_COUNT_PADDING).toString(),
  });

  let url = `${GOOGLE_SEARCH_ENDPOINT}?${params.toString()}`;

  // appended raw: URLSearchParams would escape the colon
  if (request.timeframe) {
    url += `&tbs=qdr:${TIMEFRAME_CODES[request.timeframe]}`;
  }

  return url;
}
