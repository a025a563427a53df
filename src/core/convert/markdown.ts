// src/core/convert/markdown.ts
import TurndownService from 'turndown';

export class MarkdownConverter {
  private turndown: TurndownService;

  constructor() {
    this.turndown = new TurndownService({
      headingStyle: 'atx',
      bulletListMarker: '-',
      codeBlockStyle: 'fenced',
    });
    this.turndown.remove(['script', 'style', 'noscript']);
  }

  /**
   * Convert an extracted content fragment to Markdown. Falls back to the
   * wrapped HTML when conversion fails.
   */
  convert(fragment: string): string {
    const html = `<html><body>${fragment}</body></html>`;

    try {
      return escapeStrikeTags(this.turndown.turndown(html));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`Error converting HTML to markdown: ${reason}`);
      return html;
    }
  }
}

// Literal <s>/<S> in docs (type parameters, mostly) would render as strikethrough.
export function escapeStrikeTags(markdown: string): string {
  return markdown.replace(/<S>/g, '\\<S>').replace(/<s>/g, '\\<s>');
}
