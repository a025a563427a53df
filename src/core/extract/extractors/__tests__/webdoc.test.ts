import { describe, it, expect } from '@jest/globals';
import * as cheerio from 'cheerio';
import { WebdocExtractor } from '../webdoc/index.js';

const FOOTER = '<div class="footer">Documentation generated by <a href="https://github.com/webdoc-js/webdoc">Webdoc</a></div>';

describe('WebdocExtractor', () => {
  const extractor = new WebdocExtractor();

  describe('detect', () => {
    it('detects the generated-by footer link', () => {
      const $ = cheerio.load(`<html><body><div class="main">x</div>${FOOTER}</body></html>`);
      expect(extractor.detect($)).toBe(true);
    });

    it('detects the content-size footer variant', () => {
      const $ = cheerio.load(
        '<html><body><footer class="content-size">Documentation generated by Webdoc</footer></body></html>'
      );
      expect(extractor.detect($)).toBe(true);
    });

    it('ignores a webdoc link outside the generated-by div', () => {
      const $ = cheerio.load(
        '<html><body><div>See <a href="https://github.com/webdoc-js/webdoc">Webdoc</a></div></body></html>'
      );
      expect(extractor.detect($)).toBe(false);
    });

    it('ignores unrelated pages', () => {
      const $ = cheerio.load('<html><body><footer>Built with love</footer></body></html>');
      expect(extractor.detect($)).toBe(false);
    });
  });

  describe('extractContent', () => {
    it('returns div.main without scripts, styles or footers', () => {
      const $ = cheerio.load(
        '<html><body><nav><a href="/a">A</a></nav>' +
          '<div class="main"><h1>Title</h1><script>track()</script><style>p{}</style><p>Body</p><footer>f</footer></div>' +
          '</body></html>'
      );

      expect(extractor.extractContent($)).toBe('<div class="main"><h1>Title</h1><p>Body</p></div>');
    });

    it('falls back to the body without page chrome', () => {
      const $ = cheerio.load(
        '<html><body><header>Top</header><div class="sidebar">Side</div>' +
          '<section><p>Kept</p></section><footer>Bottom</footer></body></html>'
      );

      expect(extractor.extractContent($)).toBe('<body><section><p>Kept</p></section></body>');
    });
  });

  describe('extractLinks', () => {
    it('collects nav links in order, skipping anchors and scripts', () => {
      const $ = cheerio.load(
        '<html><body><nav>' +
          '<a href="intro.html">Intro</a>' +
          '<a href="#top">Top</a>' +
          '<a href="javascript:void(0)">Menu</a>' +
          '<a href="api.html">API</a>' +
          '<a href="intro.html">Intro again</a>' +
          '</nav></body></html>'
      );

      expect(extractor.extractLinks($)).toEqual(['intro.html', 'api.html']);
    });

    it('uses div.navigation when there is no nav', () => {
      const $ = cheerio.load(
        '<html><body><div class="navigation"><a href="a.html">A</a></div></body></html>'
      );

      expect(extractor.extractLinks($)).toEqual(['a.html']);
    });

    it('falls back to the sidebar when the nav has no links', () => {
      const $ = cheerio.load(
        '<html><body><nav><a href="#">Home</a></nav>' +
          '<div class="side-nav"><a href="classes/Foo.html">Foo</a></div></body></html>'
      );

      expect(extractor.extractLinks($)).toEqual(['classes/Foo.html']);
    });

    it('returns an empty list when nothing matches', () => {
      const $ = cheerio.load('<html><body><p><a href="x.html">x</a></p></body></html>');
      expect(extractor.extractLinks($)).toEqual([]);
    });
  });
});
