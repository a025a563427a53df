// src/core/extract/types.ts
import type { CheerioAPI } from 'cheerio';

export interface Extractor {
  readonly name: string;

  /** True when the page was generated by this extractor's platform. */
  detect($: CheerioAPI): boolean;

  /** Main content as an HTML fragment. May remove nodes from `$`. */
  extractContent($: CheerioAPI): string;

  /** Candidate next-page hrefs, unresolved, in document order. */
  extractLinks($: CheerioAPI): string[];
}
