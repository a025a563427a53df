// src/core/extract/extractors/docusaurus/index.ts
import type { CheerioAPI } from 'cheerio';
import { BaseExtractor } from '../base.js';

export class DocusaurusExtractor extends BaseExtractor {
  readonly name = 'docusaurus';

  protected readonly contentSelectors = ['article .markdown', 'article'];
  protected readonly linkSources = [
    ['nav.menu'],
    ['nav.pagination-nav'],
  ];

  detect($: CheerioAPI): boolean {
    return this.generator($).includes('docusaurus') || $('#__docusaurus').length > 0;
  }
}
