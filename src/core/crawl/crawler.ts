// src/core/crawl/crawler.ts
import * as cheerio from 'cheerio';
import { PageFetcher } from '../fetch/fetcher.js';
import type { Fetcher } from '../fetch/types.js';
import {
  isSameHost,
  isValidUrl,
  normalizeUrl,
  resolveUrl,
  sleep,
  stripFragment,
} from '../fetch/utils.js';
import { registry as defaultRegistry, type ExtractorRegistry } from '../extract/registry.js';
import type { Extractor } from '../extract/types.js';
import { MarkdownConverter } from '../convert/markdown.js';
import { RecordWriter } from '../export/writer.js';
import { formatHeaderRecord, formatPageRecord } from '../export/record.js';
import { formatTimestamp, generateOutputPath } from '../export/path.js';
import { buildCrawlResult } from '../export/json.js';
import { DocFetchError, ErrorCode, createFailedResult } from '../errors.js';
import type { CrawlResult } from '../export/types.js';
import type { CrawlFailure, CrawlOptions, ScrapedPage } from '../types/index.js';

export interface CrawlerDeps {
  fetcher?: Fetcher;
  registry?: ExtractorRegistry;
  converter?: MarkdownConverter;
  now?: () => Date;
}

// `seen` holds normalized keys of every URL fetched or queued.
interface Frontier {
  queue: string[];
  seen: Set<string>;
}

export class DocCrawler {
  private fetcher: Fetcher;
  private registry: ExtractorRegistry;
  private converter: MarkdownConverter;
  private now: () => Date;

  constructor(deps: CrawlerDeps = {}) {
    this.fetcher = deps.fetcher ?? new PageFetcher();
    this.registry = deps.registry ?? defaultRegistry;
    this.converter = deps.converter ?? new MarkdownConverter();
    this.now = deps.now ?? (() => new Date());
  }

  async crawl(url: string, options: CrawlOptions): Promise<CrawlResult> {
    if (!isValidUrl(url)) {
      throw new DocFetchError(ErrorCode.INVALID_URL, `Invalid URL: ${url}`);
    }

    const startUrl = stripFragment(url);
    const startTime = Date.now();
    const limit = options.maxPages ?? Number.POSITIVE_INFINITY;
    const frontier: Frontier = { queue: [], seen: new Set([normalizeUrl(startUrl)]) };
    const pages: string[] = [];
    const failures: CrawlFailure[] = [];

    try {
      console.log(`Fetching initial page: ${startUrl}`);
      const fetched = await this.fetcher.fetch(startUrl);
      const $ = cheerio.load(fetched.html);

      const extractor = this.chooseExtractor($, options.extractor);
      const first = this.scrape($, startUrl, fetched.finalUrl, extractor);

      this.enqueue(frontier, first.links, startUrl, options);
      console.log(`Found ${frontier.queue.length} unique navigation links`);

      const outputPath = generateOutputPath(startUrl, options.outputDir, this.now());
      console.log(`Saving documentation to: ${outputPath}`);

      const writer = new RecordWriter(outputPath);
      await writer.start(
        formatHeaderRecord(formatTimestamp(this.now()), extractor.name, first.url, first.content)
      );
      pages.push(first.url);
      console.log(`[1/${this.progressTotal(pages.length, frontier, limit)}] Scraped: ${startUrl}`);

      let attempted = 0;
      while (frontier.queue.length > 0 && attempted < limit) {
        const link = frontier.queue.shift();
        if (link === undefined) break;

        if (options.delayMs > 0) {
          await sleep(options.delayMs);
        }

        attempted++;

        try {
          const page = await this.scrapePage(link, extractor);
          await writer.append(formatPageRecord(page.url, page.content));
          pages.push(page.url);

          const added = this.enqueue(frontier, page.links, startUrl, options);
          if (options.verbose && added > 0) {
            console.log(`[Crawl] Queued ${added} new links from ${page.url}`);
          }

          const index = attempted + 1;
          console.log(`[${index}/${this.progressTotal(index, frontier, limit)}] Scraped: ${link}`);
        } catch (error) {
          if (error instanceof DocFetchError && error.code === ErrorCode.EXPORT_FAILED) {
            throw error;
          }
          const message = error instanceof Error ? error.message : String(error);
          failures.push({ url: link, error: message });
          console.error(`Error scraping ${link}: ${message}`);
        }
      }

      return buildCrawlResult(
        startUrl,
        extractor.name,
        outputPath,
        pages,
        failures,
        Date.now() - startTime
      );
    } catch (error) {
      if (error instanceof DocFetchError) {
        return createFailedResult(startUrl, error);
      }

      throw error;
    }
  }

  private chooseExtractor($: cheerio.CheerioAPI, forced?: string): Extractor {
    if (forced) {
      const extractor = this.registry.get(forced);
      console.log(`Using extractor: ${extractor.name}`);
      return extractor;
    }

    const detected = this.registry.detect($);
    if (detected) {
      console.log(`Detected documentation type: ${detected.name}`);
      return detected;
    }

    console.log('Unknown documentation type. Using default extractors.');
    return this.registry.select($);
  }

  private async scrapePage(url: string, extractor: Extractor): Promise<ScrapedPage> {
    const fetched = await this.fetcher.fetch(url);
    return this.scrape(cheerio.load(fetched.html), url, fetched.finalUrl, extractor);
  }

  // Links first: content extraction may strip the navigation.
  private scrape(
    $: cheerio.CheerioAPI,
    url: string,
    baseUrl: string,
    extractor: Extractor
  ): ScrapedPage {
    let links: string[];
    let html: string;
    try {
      links = extractor.extractLinks($);
      html = extractor.extractContent($);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DocFetchError(
        ErrorCode.EXTRACT_FAILED,
        `Failed to extract ${url} with ${extractor.name}: ${reason}`,
        false,
        'Try another --extractor',
        { url, extractor: extractor.name }
      );
    }

    return {
      url,
      content: this.converter.convert(html),
      links: links
        .map(href => resolveUrl(href, baseUrl))
        .filter((href): href is string => href !== undefined),
    };
  }

  private enqueue(frontier: Frontier, links: string[], startUrl: string, options: CrawlOptions): number {
    let added = 0;

    for (const link of links) {
      if (!isValidUrl(link)) continue;

      if (!options.allowExternal && !isSameHost(link, startUrl)) {
        if (options.verbose) {
          console.log(`[Crawl] Ignoring external link: ${link}`);
        }
        continue;
      }

      const key = normalizeUrl(link);
      if (frontier.seen.has(key)) continue;

      frontier.seen.add(key);
      frontier.queue.push(link);
      added++;
    }

    return added;
  }

  private progressTotal(done: number, frontier: Frontier, limit: number): number {
    return Math.min(done + frontier.queue.length, limit + 1);
  }
}
