// src/core/fetch/fetcher.ts
import * as cheerio from 'cheerio';
import type { FetchedPage } from '../types/index.js';
import type { Fetcher, FetcherOptions } from './types.js';
import { isValidUrl, sleep } from './utils.js';
import { DocFetchError, ErrorCode } from '../errors.js';
import {
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
} from '../config/constants.js';

export class PageFetcher implements Fetcher {
  private timeout: number;
  private retries: number;
  private retryDelay: number;
  private userAgent: string;

  constructor(options: FetcherOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.retries = options.retries ?? DEFAULT_RETRIES;
    this.retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async fetch(url: string): Promise<FetchedPage> {
    if (!isValidUrl(url)) {
      throw new DocFetchError(ErrorCode.INVALID_URL, `Invalid URL: ${url}`);
    }

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.fetchOnce(url);
      } catch (error) {
        const retryable = error instanceof DocFetchError && error.retryable;
        if (!retryable || attempt >= this.retries) {
          throw error;
        }
        await sleep(this.retryDelay * (attempt + 1));
      }
    }
  }

  private async fetchOnce(url: string): Promise<FetchedPage> {
    let response: Response;
    let html: string;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeout),
      });

      if (!response.ok) {
        // Release the connection before giving up on this response
        await response.body?.cancel();
        throw this.toHttpError(url, response.status, response.statusText);
      }

      html = await response.text();
    } catch (error) {
      if (error instanceof DocFetchError) {
        throw error;
      }
      throw this.toFetchError(url, error);
    }

    return {
      url,
      finalUrl: response.url || url,
      status: response.status,
      html,
      title: extractTitle(html),
    };
  }

  private toHttpError(url: string, status: number, statusText: string): DocFetchError {
    if (status === 429) {
      return new DocFetchError(
        ErrorCode.RATE_LIMITED,
        `Rate limited fetching ${url}`,
        true,
        'Increase --delay between requests',
        { url, status }
      );
    }

    const label = statusText ? `${status} ${statusText}` : String(status);
    return new DocFetchError(
      ErrorCode.HTTP_ERROR,
      `HTTP ${label} fetching ${url}`,
      status >= 500,
      undefined,
      { url, status }
    );
  }

  private toFetchError(url: string, error: unknown): DocFetchError {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new DocFetchError(
        ErrorCode.TIMEOUT,
        `Timed out after ${this.timeout}ms fetching ${url}`,
        true,
        'Raise --timeout',
        { url }
      );
    }

    const reason = error instanceof Error ? error.message : String(error);
    return new DocFetchError(
      ErrorCode.NETWORK_ERROR,
      `Error fetching ${url}: ${reason}`,
      true,
      'Check your network connection',
      { url }
    );
  }
}

export function extractTitle(html: string): string | undefined {
  const title = cheerio.load(html)('title').first().text().trim();
  return title || undefined;
}
