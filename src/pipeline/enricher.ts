import type { DocumentFetcher, FetchedDocument, FetchOptions } from './document-fetcher.js';
import { normalizeWhitespace } from '../utils/text.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('enricher');

const HIDDEN_ELEMENTS = 'script, style, noscript, template';

const BLOCK_ELEMENTS = [
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt',
  'fieldset', 'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4',
  'h5', 'h6', 'header', 'hr', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section',
  'table', 'td', 'th', 'title', 'tr', 'ul',
].join(', ');

export interface EnrichOptions extends FetchOptions {
  readPageText: boolean;
}

export class PageEnricher {
  constructor(private readonly fetcher: DocumentFetcher) {}

  async enrich(href: string, options: EnrichOptions): Promise<string> {
    if (!options.readPageText || !href) {
      return '';
    }

    const document = await this.fetcher.fetch(href, {
      userAgent: options.userAgent,
      timeoutMs: options.timeoutMs,
    });
    const text = flattenText(document);
    logger.debug({ href, length: text.length }, 'Page text extracted');
    return text;
  }
}

/**
 * Reduces a document to its visible text on one line.
 * Mutates the document: hidden elements are removed.
 */
export function flattenText(document: FetchedDocument): string {
  const { $ } = document;

  $(HIDDEN_ELEMENTS).remove();
  // keeps words in adjacent blocks from running together
  $(BLOCK_ELEMENTS).before(' ').after(' ');

  return normalizeWhitespace($.root().text());
}
