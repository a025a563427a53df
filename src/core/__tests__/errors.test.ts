// src/core/__tests__/errors.test.ts
import { describe, it, expect } from '@jest/globals';
import { DocFetchError, createFailedResult } from '../errors.js';
import { ErrorCode } from '../export/types.js';

describe('DocFetchError', () => {
  it('should create error with all properties', () => {
    const error = new DocFetchError(
      ErrorCode.NETWORK_ERROR,
      'Network connection failed',
      true,
      'Check your network connection',
      { url: 'https://docs.example.com' }
    );

    expect(error).toBeInstanceOf(DocFetchError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DocFetchError');
    expect(error.code).toBe(ErrorCode.NETWORK_ERROR);
    expect(error.message).toBe('Network connection failed');
    expect(error.retryable).toBe(true);
    expect(error.suggestion).toBe('Check your network connection');
    expect(error.context).toEqual({ url: 'https://docs.example.com' });
  });

  it('should create error with minimal properties', () => {
    const error = new DocFetchError(ErrorCode.EXTRACT_FAILED, 'Extract failed');

    expect(error.code).toBe(ErrorCode.EXTRACT_FAILED);
    expect(error.retryable).toBe(false);
    expect(error.suggestion).toBeUndefined();
    expect(error.context).toBeUndefined();
  });
});

describe('createFailedResult', () => {
  it('should create failed crawl result from error', () => {
    const error = new DocFetchError(
      ErrorCode.HTTP_ERROR,
      'HTTP 404 Not Found fetching https://docs.example.com/missing',
      false,
      'Check the start URL'
    );

    const result = createFailedResult('https://docs.example.com/missing', error);

    expect(result).toEqual({
      status: 'failed',
      startUrl: 'https://docs.example.com/missing',
      pages: [],
      diagnostics: {
        error: {
          code: ErrorCode.HTTP_ERROR,
          message: 'HTTP 404 Not Found fetching https://docs.example.com/missing',
          retryable: false,
          suggestion: 'Check the start URL',
        },
      },
    });
  });

  it('keeps the start URL and omits an absent suggestion', () => {
    const error = new DocFetchError(ErrorCode.EXPORT_FAILED, 'Failed to write output: disk full');

    const result = createFailedResult('https://docs.example.com/guide/', error);

    expect(result.startUrl).toBe('https://docs.example.com/guide/');
    expect(result.pages).toEqual([]);
    expect(result.extractor).toBeUndefined();
    expect(result.diagnostics?.error).toEqual({
      code: ErrorCode.EXPORT_FAILED,
      message: 'Failed to write output: disk full',
      retryable: false,
      suggestion: undefined,
    });
  });
});
