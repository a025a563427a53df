// src/core/export/json.ts
import type { CrawlResult } from './types.js';
import type { CrawlFailure } from '../types/index.js';

export function buildCrawlResult(
  startUrl: string,
  extractor: string,
  outputPath: string,
  pages: string[],
  failures: CrawlFailure[],
  duration: number
): CrawlResult {
  const result: CrawlResult = {
    status: 'success',
    startUrl,
    extractor,
    outputPath,
    pages,
    stats: {
      pageCount: pages.length,
      failedCount: failures.length,
      duration,
    },
  };

  if (failures.length > 0) {
    result.diagnostics = { failures };
  }

  return result;
}

export function formatJsonOutput(result: CrawlResult): string {
  return JSON.stringify(result, null, 2);
}
