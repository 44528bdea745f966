import type { SearchResult } from '../providers/types.js';
import type { OutputConfig } from '../config/schema.js';
import { domainOf } from '../utils/text.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('markdown');

export interface MarkdownOptions {
  query: string;
}

export class MarkdownGenerator {
  constructor(private config: Pick<OutputConfig, 'pageTextLength'>) {}

  generate(results: SearchResult[], options: MarkdownOptions): string {
    const parts: string[] = [];

    parts.push(`# ${this.escapeMarkdown(options.query)}\n`);
    parts.push(this.generateSummary(results));
    parts.push(results.map((r, i) => this.renderResult(r, i + 1)).join('\n\n---\n\n'));

    logger.debug({ resultCount: results.length }, 'Markdown generated');
    return parts.join('\n');
  }

  renderResult(result: SearchResult, position: number): string {
    const lines = [
      `## ${position}. [${this.escapeMarkdown(result.title)}](${result.href})`,
      '',
      `*${domainOf(result.href)}*`,
    ];

    if (result.pageText && this.config.pageTextLength > 0) {
      lines.push('', this.truncateText(result.pageText, this.config.pageTextLength));
    }

    return lines.join('\n');
  }

  private generateSummary(results: SearchResult[]): string {
    const domains = new Set(results.map((r) => domainOf(r.href)));
    const noun = results.length === 1 ? 'result' : 'results';

    return `> ${results.length} ${noun} from ${domains.size} domain(s)\n`;
  }

  private truncateText(text: string, maxLength: number): string {
    if (text.length <= maxLength) {
      return text;
    }

    // Try to truncate at word boundary
    const truncated = text.slice(0, maxLength);
    const lastSpace = truncated.lastIndexOf(' ');

    if (lastSpace > maxLength * 0.8) {
      return truncated.slice(0, lastSpace) + '...';
    }

    return truncated + '...';
  }

  private escapeMarkdown(text: string): string {
    return text
      .replace(/\[/g, '\\[')
      .replace(/\]/g, '\\]')
      .replace(/\|/g, '\\|');
  }
}
