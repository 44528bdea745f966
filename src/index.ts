#!/usr/bin/env node

import { Command, Option } from 'commander';
import { appendFile, mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';

import { loadConfig, mergeConfigWithCLI } from './config/loader.js';
import type { Config, OutputFormat } from './config/schema.js';
import { GoogleSearchProvider } from './providers/google.js';
import { SEARCH_TIMEFRAMES, type SearchOptions, type SearchTimeframe } from './providers/types.js';
import { JsonGenerator, MarkdownGenerator } from './output/index.js';
import { InvalidRequestError, OutputError, errorMessage } from './utils/errors.js';
import { createChildLogger } from './utils/logger.js';

const cliLogger = createChildLogger('cli');

interface SearchCommandOptions {
  numResults?: string;
  language?: string;
  safe?: string;
  timeframe?: string;
  timeout?: string;
  pageText: boolean;
  userAgent?: string;
  concurrency?: string;
  stream?: boolean;
  format?: string;
  output?: string;
  config?: string;
}

const program = new Command();

program
  .name('gserp')
  .description('Scrape Google search results and the text of the pages they link to')
  .version('1.0.0');

program
  .command('search')
  .description('Search Google and print the results')
  .argument('<term...>', 'Search term')
  .option('-n, --num-results <number>', 'Number of results to ask Google for')
  .option('-l, --language <code>', 'Interface language (hl)')
  .option('--safe <mode>', 'SafeSearch mode')
  .addOption(
    new Option('-t, --timeframe <timeframe>', 'Only results from this period').choices(
      SEARCH_TIMEFRAMES
    )
  )
  .option('--timeout <ms>', 'Timeout for each request in milliseconds')
  .option('--no-page-text', 'Do not fetch the text of linked pages')
  .option('-u, --user-agent <agent>', 'User-Agent header sent with every request')
  .option('--concurrency <number>', 'Maximum simultaneous page fetches')
  .option('-s, --stream', 'Print each result as soon as its page has been read')
  .addOption(
    new Option('-f, --format <format>', 'Output format').choices(['markdown', 'json'])
  )
  .option('-o, --output <path>', 'Output file path')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (terms: string[], options: SearchCommandOptions) => {
    const term = terms.join(' ');

    try {
      const config = await loadConfig(options.config);
      const mergedConfig = mergeConfigWithCLI(config, {
        numResults: parseInteger(options.numResults),
        language: options.language,
        safeMode: options.safe,
        timeframe: parseTimeframe(options.timeframe),
        timeoutMs: parseInteger(options.timeout),
        readPageText: options.pageText ? undefined : false,
        userAgent: options.userAgent,
        concurrency: parseInteger(options.concurrency),
        format: parseFormat(options.format),
      });

      const provider = new GoogleSearchProvider();
      const count = options.stream
        ? await runStreamingSearch(provider, term, mergedConfig, options.output)
        : await runBufferedSearch(provider, term, mergedConfig, options.output);

      cliLogger.info({ term, results: count, stream: options.stream ?? false }, 'Search complete');
    } catch (error) {
      cliLogger.error({ error: errorMessage(error), err: error }, 'Search failed');
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });

await program.parseAsync();

// Helper functions

async function runBufferedSearch(
  provider: GoogleSearchProvider,
  term: string,
  config: Config,
  outputPath?: string
): Promise<number> {
  const results = await provider.search(term, toSearchOptions(config));

  const output =
    config.output.format === 'json'
      ? new JsonGenerator().generate(results, { query: term })
      : new MarkdownGenerator(config.output).generate(results, { query: term });

  if (outputPath) {
    const path = resolve(outputPath);
    await writeOutput(path, output, 'write');
    console.log(`Output written to: ${path}`);
  } else {
    console.log(output);
  }

  return results.length;
}

async function runStreamingSearch(
  provider: GoogleSearchProvider,
  term: string,
  config: Config,
  outputPath?: string
): Promise<number> {
  const json = new JsonGenerator();
  const markdown = new MarkdownGenerator(config.output);
  const path = outputPath ? resolve(outputPath) : undefined;
  let count = 0;

  if (path) {
    await writeOutput(path, '', 'write');
  }

  for await (const result of provider.searchAsStream(term, toSearchOptions(config))) {
    count += 1;
    const chunk =
      config.output.format === 'json'
        ? json.generateLine(result)
        : `${markdown.renderResult(result, count)}\n`;

    if (path) {
      await writeOutput(path, `${chunk}\n`, 'append');
    } else {
      console.log(chunk);
    }
  }

  return count;
}

function toSearchOptions(config: Config): SearchOptions {
  return { ...config.search };
}

async function writeOutput(path: string, content: string, mode: 'write' | 'append'): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    if (mode === 'append') {
      await appendFile(path, content);
    } else {
      await writeFile(path, content);
    }
  } catch (error) {
    throw new OutputError(`Failed to write output: ${path}`, { cause: error });
  }
}

function parseInteger(value?: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new InvalidRequestError(`Expected a number, got "${value}"`);
  }
  return parsed;
}

function parseTimeframe(value?: string): SearchTimeframe | undefined {
  if (value === undefined) {
    return undefined;
  }

  const timeframe = SEARCH_TIMEFRAMES.find((t) => t === value);
  if (!timeframe) {
    throw new InvalidRequestError(`Unknown timeframe "${value}"`);
  }
  return timeframe;
}

function parseFormat(value?: string): OutputFormat | undefined {
  if (value === 'markdown' || value === 'json') {
    return value;
  }
  return undefined;
}
