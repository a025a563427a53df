// src/core/fetch/types.ts
import type { FetchedPage } from '../types/index.js';

export interface Fetcher {
  fetch(url: string): Promise<FetchedPage>;
}

export interface FetcherOptions {
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  userAgent?: string;
}
