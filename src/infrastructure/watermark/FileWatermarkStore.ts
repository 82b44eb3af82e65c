/**
 * Watermark in a local JSON file, used with the file sinks. The file holds
 * a single ISO-8601 string.
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '@core/logger';
import type { IWatermarkStore } from '@domain/interfaces/IWatermarkStore';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileWatermarkStore implements IWatermarkStore {
  constructor(
    private file: string,
    private log: Logger,
  ) {}

  async read(): Promise<Date | null> {
    let content: string;
    try {
      content = await readFile(this.file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    let value: unknown;
    try {
      value = JSON.parse(content);
    } catch {
      value = null;
    }
    const stop = typeof value === 'string' ? new Date(value) : null;
    if (!stop || Number.isNaN(stop.getTime())) {
      this.log.warn({ file: this.file }, 'Watermark file is unreadable, treating as first run');
      return null;
    }
    return stop;
  }

  async write(stop: Date): Promise<void> {
    await mkdir(path.dirname(path.resolve(this.file)), { recursive: true });
    await writeFile(this.file, JSON.stringify(stop.toISOString()));
    this.log.info({ watermark: stop.toISOString(), file: this.file }, 'Watermark advanced');
  }
}
