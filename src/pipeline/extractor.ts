import type { FetchedDocument } from './document-fetcher.js';
import type { Candidate } from '../providers/types.js';
import { normalizeWhitespace } from '../utils/text.js';

export const RESULT_BLOCK_SELECTOR = 'div.g';

const GOOGLE_REDIRECT_PATH = '/url';

/**
 * Lists the result blocks of a Google results page in document order.
 * Blocks without a heading or a usable link come back with empty fields.
 */
export function extractCandidates(document: FetchedDocument): Candidate[] {
  const { $ } = document;

  return $(RESULT_BLOCK_SELECTOR)
    .toArray()
    .map((block) => {
      const $block = $(block);
      const title = normalizeWhitespace($block.find('h3').first().text());
      const rawHref = $block.find('a').first().attr('href') ?? '';

      return {
        title,
        href: resolveHref(rawHref, document.url),
      };
    });
}

export function resolveHref(rawHref: string, baseUrl: string): string {
  const trimmed = rawHref.trim();
  if (!trimmed) {
    return '';
  }

  let url: URL;
  try {
    url = new URL(trimmed, baseUrl);
  } catch {
    return '';
  }

  // /url?q=<target>&sa=... wraps the real destination
  if (url.pathname === GOOGLE_REDIRECT_PATH && isGoogleHost(url.hostname)) {
    const target = url.searchParams.get('q') ?? url.searchParams.get('url');
    return target ? resolveHref(target, baseUrl) : '';
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return '';
  }

  return url.toString();
}

function isGoogleHost(hostname: string): boolean {
  return /(^|\.)google\.[a-z.]+$/i.test(hostname);
}
