// src/core/export/record.ts
import { RECORD_SEPARATOR as SEP } from '../config/constants.js';

/** Opening record: crawl metadata followed by the start page. */
export function formatHeaderRecord(
  timestamp: string,
  extractor: string,
  url: string,
  content: string
): string {
  return [
    SEP,
    '',
    `Created: ${timestamp}`,
    `Extractor: ${extractor}`,
    '',
    SEP,
    '',
    url,
    '',
    SEP,
    '',
    content,
    '',
    SEP,
    '',
  ].join('\n');
}

export function formatPageRecord(url: string, content: string): string {
  return ['', url, '', SEP, '', content, '', SEP, ''].join('\n');
}
