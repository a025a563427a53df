// src/core/export/path.ts
import * as path from 'path';
import { OUTPUT_FILE_PREFIX } from '../config/constants.js';

export function generateOutputPath(url: string, outputDir: string, date: Date = new Date()): string {
  const domain = new URL(url).host.replace(/\./g, '_');

  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');

  const filename = `${OUTPUT_FILE_PREFIX}_${year}_${month}_${day}.md`;
  return path.join(outputDir, domain, filename);
}

export function formatTimestamp(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');

  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day}:${time}`;
}
