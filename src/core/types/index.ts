// src/core/types/index.ts
export interface FetchedPage {
  url: string;
  finalUrl: string;
  status: number;
  html: string;
  title?: string;
}

export interface ScrapedPage {
  url: string;
  content: string;
  links: string[];
}

export interface CrawlOptions {
  outputDir: string;
  delayMs: number;
  maxPages?: number;
  extractor?: string;
  allowExternal?: boolean;
  verbose?: boolean;
}

export interface CrawlFailure {
  url: string;
  error: string;
}
