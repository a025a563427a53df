// src/core/extract/extractors/generic/index.ts
import { BaseExtractor } from '../base.js';
import { NAVIGATION_LINK_SOURCES } from '../webdoc/index.js';

export class GenericExtractor extends BaseExtractor {
  readonly name = 'generic';

  protected readonly contentSelectors = ['main', 'article', 'div.main'];
  protected readonly linkSources = NAVIGATION_LINK_SOURCES;

  // Fallback only; never claims a page.
  detect(): boolean {
    return false;
  }
}
