// src/core/extract/extractors/mkdocs/index.ts
import type { CheerioAPI } from 'cheerio';
import { BaseExtractor } from '../base.js';

// Material and ReadTheDocs themes both advertise MkDocs in the generator tag.
export class MkDocsExtractor extends BaseExtractor {
  readonly name = 'mkdocs';

  protected readonly contentSelectors = [
    'article.md-content__inner',
    'div.md-content',
    'div[role="main"]',
  ];
  protected readonly linkSources = [
    ['nav.md-nav--primary', 'nav.md-nav'],
    ['.wy-menu-vertical'],
  ];

  detect($: CheerioAPI): boolean {
    return this.generator($).includes('mkdocs');
  }
}
