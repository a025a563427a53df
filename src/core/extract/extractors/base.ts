// src/core/extract/extractors/base.ts
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { Extractor } from '../types.js';

const IGNORED_HREF_PREFIXES = ['#', 'javascript:', 'mailto:'];
const CHROME_CLASS_PATTERN = /sidebar|menu|nav/;

export abstract class BaseExtractor implements Extractor {
  abstract readonly name: string;

  /** Tried in order; the first one present holds the main content. */
  protected abstract readonly contentSelectors: string[];

  /**
   * Link containers, grouped by priority. Within a group the first selector
   * that matches wins; the next group is consulted only when the previous
   * one produced no links.
   */
  protected abstract readonly linkSources: string[][];

  abstract detect($: CheerioAPI): boolean;

  extractContent($: CheerioAPI): string {
    for (const selector of this.contentSelectors) {
      const match = $(selector).first();
      if (match.length > 0) {
        return this.cleanContent($, match);
      }
    }

    const body = $('body').first();
    if (body.length > 0) {
      body.find('header, footer, nav').remove();
      body
        .find('[class]')
        .filter((_, el) => CHROME_CLASS_PATTERN.test($(el).attr('class') ?? ''))
        .remove();
      return this.cleanContent($, body);
    }

    return $.html().trim();
  }

  extractLinks($: CheerioAPI): string[] {
    for (const group of this.linkSources) {
      const container = this.findContainer($, group);
      if (!container) continue;

      const links = this.collectLinks($, container);
      if (links.length > 0) {
        return links;
      }
    }

    return [];
  }

  protected cleanContent($: CheerioAPI, content: Cheerio<AnyNode>): string {
    content.find('script, style, footer').remove();
    return $.html(content).trim();
  }

  protected collectLinks($: CheerioAPI, container: Cheerio<AnyNode>): string[] {
    const seen = new Set<string>();
    const links: string[] = [];

    container.find('a[href]').each((_, el) => {
      const href = ($(el).attr('href') ?? '').trim();
      if (!isFollowableHref(href) || seen.has(href)) return;
      seen.add(href);
      links.push(href);
    });

    return links;
  }

  protected generator($: CheerioAPI): string {
    return ($('meta[name="generator"]').attr('content') ?? '').toLowerCase();
  }

  private findContainer($: CheerioAPI, selectors: string[]): Cheerio<AnyNode> | undefined {
    for (const selector of selectors) {
      const match = $(selector).first();
      if (match.length > 0) {
        return match;
      }
    }
    return undefined;
  }
}

export function isFollowableHref(href: string): boolean {
  if (!href) return false;
  const lower = href.toLowerCase();
  return !IGNORED_HREF_PREFIXES.some(prefix => lower.startsWith(prefix));
}
