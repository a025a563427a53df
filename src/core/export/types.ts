// src/core/export/types.ts
import type { CrawlFailure } from '../types/index.js';

export interface CrawlStats {
  pageCount: number;
  failedCount: number;
  duration: number;
}

export interface CrawlResult {
  status: 'success' | 'failed';
  startUrl: string;
  extractor?: string;
  outputPath?: string;
  pages: string[];
  stats?: CrawlStats;
  diagnostics?: {
    error?: CrawlError;
    failures?: CrawlFailure[];
  };
}

export interface CrawlError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export enum ErrorCode {
  NETWORK_ERROR = 'network_error',
  TIMEOUT = 'timeout',
  HTTP_ERROR = 'http_error',
  RATE_LIMITED = 'rate_limited',
  INVALID_URL = 'invalid_url',
  UNKNOWN_EXTRACTOR = 'unknown_extractor',
  EXTRACT_FAILED = 'extract_failed',
  EXPORT_FAILED = 'export_failed',
}
