// src/core/extract/registry.ts
import type { CheerioAPI } from 'cheerio';
import type { Extractor } from './types.js';
import { WebdocExtractor } from './extractors/webdoc/index.js';
import { DocusaurusExtractor } from './extractors/docusaurus/index.js';
import { MkDocsExtractor } from './extractors/mkdocs/index.js';
import { GenericExtractor } from './extractors/generic/index.js';
import { DocFetchError, ErrorCode } from '../errors.js';

export class ExtractorRegistry {
  private extractors: Extractor[] = [
    new WebdocExtractor(),
    new DocusaurusExtractor(),
    new MkDocsExtractor(),
  ];

  private readonly fallback: Extractor = new GenericExtractor();

  detect($: CheerioAPI): Extractor | undefined {
    return this.extractors.find(e => e.detect($));
  }

  select($: CheerioAPI): Extractor {
    return this.detect($) ?? this.fallback;
  }

  get(name: string): Extractor {
    const extractor = [...this.extractors, this.fallback].find(e => e.name === name);

    if (!extractor) {
      throw new DocFetchError(
        ErrorCode.UNKNOWN_EXTRACTOR,
        `Unknown extractor: ${name}`,
        false,
        `Use one of: ${this.names().join(', ')}`
      );
    }

    return extractor;
  }

  register(extractor: Extractor): void {
    this.extractors.push(extractor);
  }

  names(): string[] {
    return [...this.extractors, this.fallback].map(e => e.name);
  }
}

// Singleton instance
export const registry = new ExtractorRegistry();
