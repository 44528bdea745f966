export const SEARCH_TIMEFRAMES = [
  'past-hour',
  'past-24-hours',
  'past-week',
  'past-month',
  'past-year',
] as const;

export type SearchTimeframe = (typeof SEARCH_TIMEFRAMES)[number];

/** Values of Google's `tbs=qdr:` filter. */
export const TIMEFRAME_CODES: Record<SearchTimeframe, string> = {
  'past-hour': 'h',
  'past-24-hours': 'd',
  'past-week': 'w',
  'past-month': 'm',
  'past-year': 'y',
};

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/101.0.4951.54 Safari/537.36';

export interface SearchResult {
  readonly title: string;
  readonly href: string;
  readonly pageText: string;
}

export interface SearchOptions {
  numResults?: number;
  language?: string;
  safeMode?: string;
  timeframe?: SearchTimeframe;
  timeoutMs?: number;
  readPageText?: boolean;
  userAgent?: string;
  /** Cap on simultaneous page fetches. Unbounded when omitted. */
  concurrency?: number;
}

export interface SearchRequest {
  term: string;
  numResults: number;
  language: string;
  safeMode: string;
  timeframe?: SearchTimeframe;
  timeoutMs: number;
  readPageText: boolean;
  userAgent: string;
  concurrency?: number;
}

/** A result block as found on the page, before filtering. */
export interface Candidate {
  title: string;
  href: string;
}
