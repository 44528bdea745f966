import type { SearchResult } from '../providers/types.js';
import { domainOf } from '../utils/text.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('json');

export const OUTPUT_VERSION = '1.0.0';

export interface JsonOutputOptions {
  query: string;
  pretty?: boolean;
}

export interface JsonOutput {
  meta: {
    query: string;
    timestamp: string;
    totalResults: number;
    uniqueDomains: number;
    version: string;
  };
  results: JsonResult[];
}

export interface JsonResult {
  title: string;
  href: string;
  domain: string;
  pageText: string;
}

export class JsonGenerator {
  generate(results: SearchResult[], options: JsonOutputOptions): string {
    const jsonResults = results.map((r) => this.toJsonResult(r));
    const domains = new Set(jsonResults.map((r) => r.domain));

    const output: JsonOutput = {
      meta: {
        query: options.query,
        timestamp: new Date().toISOString(),
        totalResults: results.length,
        uniqueDomains: domains.size,
        version: OUTPUT_VERSION,
      },
      results: jsonResults,
    };

    logger.debug({ resultCount: results.length }, 'JSON generated');

    if (options.pretty ?? true) {
      return JSON.stringify(output, null, 2);
    }

    return JSON.stringify(output);
  }

  /** One compact line per result, for piping streamed output to other tools. */
  generateLine(result: SearchResult): string {
    return JSON.stringify(this.toJsonResult(result));
  }

  private toJsonResult(result: SearchResult): JsonResult {
    return {
      title: result.title,
      href: result.href,
      domain: domainOf(result.href),
      pageText: result.pageText,
    };
  }
}
