// src/core/errors.ts
import { ErrorCode } from './export/types.js';
import type { CrawlResult } from './export/types.js';

export { ErrorCode };

export class DocFetchError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocFetchError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function createFailedResult(
  startUrl: string,
  error: DocFetchError
): CrawlResult & { status: 'failed' } {
  return {
    status: 'failed',
    startUrl,
    pages: [],
    diagnostics: {
      error: {
        code: error.code,
        message: error.message,
        retryable: error.retryable,
        suggestion: error.suggestion,
      },
    },
  };
}
