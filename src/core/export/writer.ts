// src/core/export/writer.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { DocFetchError, ErrorCode } from '../errors.js';

export class RecordWriter {
  constructor(readonly filePath: string) {}

  /** Create the file (and its directories), replacing any earlier run's output. */
  async start(record: string): Promise<void> {
    await this.write(record, 'w');
  }

  async append(record: string): Promise<void> {
    await this.write(record, 'a');
  }

  private async write(content: string, flag: 'w' | 'a'): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, content, { encoding: 'utf-8', flag });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DocFetchError(
        ErrorCode.EXPORT_FAILED,
        `Error saving to file ${this.filePath}: ${reason}`,
        false,
        'Check that the output directory is writable',
        { path: this.filePath }
      );
    }
  }
}
