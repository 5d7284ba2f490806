import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { log } from '../logger.js';
import { letterFileName } from '../letter.js';
import type { LetterDraft } from '../types.js';
import type { DebugSink, LetterSink } from './types.js';

const MAX_DEBUG_NAME = 120;

export class FileLetterSink implements LetterSink {
  private readonly dir: string;
  private readonly written = new Set<string>();

  constructor(dir: string) {
    this.dir = dir;
  }

  async write(draft: LetterDraft): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const path = this.freePath(letterFileName(draft));
    await writeFile(path, draft.text, 'utf-8');
    this.written.add(path);
    return path;
  }

  // Same company, title and day twice in one run: number the later letters.
  private freePath(fileName: string): string {
    const first = join(this.dir, fileName);
    if (!this.written.has(first)) return first;

    const stem = fileName.replace(/\.txt$/, '');
    let n = 2;
    while (this.written.has(join(this.dir, `${stem}_${n}.txt`))) n++;
    const path = join(this.dir, `${stem}_${n}.txt`);
    log.warn(`${fileName} already written in this run; saving the next letter as ${path}`);
    return path;
  }
}

export function debugFileName(url: string): string {
  const flat = url
    .replace(/^https?:\/\//, '')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `${flat.slice(0, MAX_DEBUG_NAME)}.html`;
}

export class FileDebugSink implements DebugSink {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  async save(url: string, body: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = join(this.dir, debugFileName(url));
    await writeFile(path, body, 'utf-8');
    log.info(`Raw page saved to ${path}`);
  }
}
