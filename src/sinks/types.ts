import type { JobListing, LetterDraft } from '../types.js';

export interface RecordSink {
  readonly name: string;
  /** `letterPaths` maps a posting URL to the letter drafted for it. */
  write(records: readonly JobListing[], letterPaths: ReadonlyMap<string, string>): Promise<void>;
}

export interface LetterSink {
  write(draft: LetterDraft): Promise<string>;
}

export interface DebugSink {
  save(url: string, body: string): Promise<void>;
}
