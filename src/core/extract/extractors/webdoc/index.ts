// src/core/extract/extractors/webdoc/index.ts
import type { CheerioAPI } from 'cheerio';
import { BaseExtractor } from '../base.js';

const GENERATED_BY = 'Documentation generated by';

/** Sidebar lookup shared with the generic fallback. */
export const NAVIGATION_LINK_SOURCES: string[][] = [
  ['nav', 'div.navigation'],
  ['div.sidebar, div.menu, div.side-nav'],
];

export class WebdocExtractor extends BaseExtractor {
  readonly name = 'webdoc';

  protected readonly contentSelectors = ['div.main'];
  protected readonly linkSources = NAVIGATION_LINK_SOURCES;

  detect($: CheerioAPI): boolean {
    const footerLink = $('a[href*="webdoc-js/webdoc"]')
      .toArray()
      .some(el => {
        const link = $(el);
        if (!link.text().includes('Webdoc')) return false;
        const parentDiv = link.parents('div').first();
        return parentDiv.length > 0 && parentDiv.text().includes(GENERATED_BY);
      });

    if (footerLink) {
      return true;
    }

    // Themes without the linked footer div
    const footer = $('footer.content-size').first();
    if (footer.length === 0) return false;

    const text = footer.text();
    return text.includes('Webdoc') && text.includes(GENERATED_BY);
  }
}
