// src/cli/commands/fetch.ts
import { Command, InvalidArgumentError } from 'commander';
import { DocCrawler } from '../../core/crawl/crawler.js';
import { PageFetcher } from '../../core/fetch/fetcher.js';
import { formatJsonOutput } from '../../core/export/json.js';
import { DocFetchError } from '../../core/errors.js';
import {
  DEFAULT_DELAY_SECONDS,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_RETRIES,
  DEFAULT_TIMEOUT,
} from '../../core/config/constants.js';

export interface FetchCommandOptions {
  url?: string;
  delay: number;
  maxPages?: number;
  out: string;
  extractor?: string;
  timeout: number;
  retries: number;
  allowExternal: boolean;
  json: boolean;
  verbose: boolean;
}

export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return parsed;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

export function registerFetchCommand(program: Command): void {
  program
    .option('-u, --url <url>', 'URL to fetch content from')
    .option('-d, --delay <seconds>', 'Delay between requests in seconds', parseSeconds, DEFAULT_DELAY_SECONDS)
    .option('-m, --max-pages <n>', 'Maximum number of pages to scrape after the first', parseCount)
    .option('-o, --out <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
    .option('-e, --extractor <name>', 'Force an extractor instead of detecting one')
    .option('--timeout <ms>', 'Request timeout in milliseconds', parseCount, DEFAULT_TIMEOUT)
    .option('--retries <n>', 'Retries for timeouts, 429 and 5xx responses', parseCount, DEFAULT_RETRIES)
    .option('--allow-external', 'Follow links to other hosts', false)
    .option('--json', 'Output JSON result to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (options: FetchCommandOptions) => {
      if (options.url) {
        await handleFetch(options.url, options);
        return;
      }

      console.error('Error: --url is required');
      process.exit(1);
    });
}

async function handleFetch(url: string, options: FetchCommandOptions): Promise<void> {
  const crawler = new DocCrawler({
    fetcher: new PageFetcher({
      timeout: options.timeout,
      retries: options.retries,
    }),
  });

  try {
    const result = await crawler.crawl(url, {
      outputDir: options.out,
      delayMs: Math.round(options.delay * 1000),
      maxPages: options.maxPages,
      extractor: options.extractor,
      allowExternal: options.allowExternal,
      verbose: options.verbose,
    });

    if (options.json) {
      console.log(formatJsonOutput(result));
    }

    if (result.status === 'success') {
      console.log(`Done: ${result.stats?.pageCount} pages written to ${result.outputPath}`);
      const failed = result.stats?.failedCount ?? 0;
      if (failed > 0) {
        console.log(`${failed} pages failed`);
      }
    } else {
      const error = result.diagnostics?.error;
      console.error('Error:', error?.message);
      if (error?.suggestion) {
        console.error('Suggestion:', error.suggestion);
      }
      process.exit(1);
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    if (error instanceof DocFetchError && error.suggestion) {
      console.error('Suggestion:', error.suggestion);
    }
    process.exit(1);
  }
}
