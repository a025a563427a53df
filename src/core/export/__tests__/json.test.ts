import { describe, it, expect } from '@jest/globals';
import { buildCrawlResult, formatJsonOutput } from '../json.js';

describe('export/json', () => {
  it('builds a successful crawl result without failures', () => {
    const result = buildCrawlResult(
      'https://docs.example.com',
      'webdoc',
      '/out/docs_example_com/api_2026_01_05.md',
      ['https://docs.example.com', 'https://docs.example.com/intro'],
      [],
      1200
    );

    expect(result).toEqual({
      status: 'success',
      startUrl: 'https://docs.example.com',
      extractor: 'webdoc',
      outputPath: '/out/docs_example_com/api_2026_01_05.md',
      pages: ['https://docs.example.com', 'https://docs.example.com/intro'],
      stats: { pageCount: 2, failedCount: 0, duration: 1200 },
    });
  });

  it('includes failures in diagnostics', () => {
    const failures = [{ url: 'https://docs.example.com/gone', error: 'HTTP 404' }];

    const result = buildCrawlResult('https://docs.example.com', 'generic', '/out.md', [], failures, 5);

    expect(result.diagnostics?.failures).toEqual(failures);
    expect(result.stats?.failedCount).toBe(1);
  });

  it('formats results as indented JSON', () => {
    const result = buildCrawlResult('https://docs.example.com', 'generic', '/out.md', [], [], 0);

    expect(JSON.parse(formatJsonOutput(result))).toEqual(result);
    expect(formatJsonOutput(result)).toContain('\n  "status": "success"');
  });
});
