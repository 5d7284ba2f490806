import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { log } from '../logger.js';
import { EXPORT_HEADER, toRows } from './columns.js';
import type { JobListing } from '../types.js';
import type { RecordSink } from './types.js';

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(records: readonly JobListing[], letterPaths: ReadonlyMap<string, string> = new Map()): string {
  const lines = [EXPORT_HEADER, ...toRows(records, letterPaths)].map((row) => row.map(csvField).join(','));
  return `${lines.join('\r\n')}\r\n`;
}

export class CsvRecordSink implements RecordSink {
  readonly name = 'csv';
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async write(records: readonly JobListing[], letterPaths: ReadonlyMap<string, string>): Promise<void> {
    if (records.length === 0) {
      log.warn(`No listings to export; ${this.path} left unchanged`);
      return;
    }
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, toCsv(records, letterPaths), 'utf-8');
    log.info(`${records.length} listings written to ${this.path}`);
  }
}
