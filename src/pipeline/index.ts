export {
  HttpDocumentFetcher,
  type DocumentFetcher,
  type FetchedDocument,
  type FetchOptions,
} from './document-fetcher.js';
export { extractCandidates, resolveHref, RESULT_BLOCK_SELECTOR } from './extractor.js';
export { PageEnricher, flattenText, type EnrichOptions } from './enricher.js';
