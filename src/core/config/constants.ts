// src/core/config/constants.ts
export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_DELAY_SECONDS = 1;
export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY = 1000;
export const DEFAULT_OUTPUT_DIR = '../data';
export const OUTPUT_FILE_PREFIX = 'api';
export const RECORD_SEPARATOR = '----';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
