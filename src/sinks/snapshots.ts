import { z } from 'zod';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { log } from '../logger.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { JobListing } from '../types.js';

const ListingSchema = z.object({
  url: z.string().url(),
  title: z.string(),
  company: z.string(),
  location: z.string(),
  description: z.string(),
  contractType: z.string(),
  isApprenticeship: z.boolean(),
  discoveredAt: z.coerce.date(),
});

const SnapshotSchema = z.object({
  timestamp: z.string(),
  search: z.object({
    job: z.string(),
    location: z.string().optional(),
    contract: z.string().optional(),
    pages: z.number().int().positive(),
  }),
  listings: z.array(ListingSchema),
});

export type RunSnapshot = z.infer<typeof SnapshotSchema>;

export interface SnapshotStore {
  save(snapshot: RunSnapshot): Promise<string>;
  load(path: string): Promise<RunSnapshot>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function snapshotFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `scraping_state_${day}_${time}.json`;
}

export class FileSnapshotStore implements SnapshotStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  async save(snapshot: RunSnapshot): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const path = join(this.dir, snapshotFileName(new Date(snapshot.timestamp)));
    await writeFile(path, JSON.stringify(snapshot, null, 2), 'utf-8');
    log.info(`Run state saved to ${path}`);
    return path;
  }

  async load(path: string): Promise<RunSnapshot> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (err: unknown) {
      throw new ConfigurationError(`Saved state unreadable: ${path} (${errorMessage(err)})`);
    }

    const result = SnapshotSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigurationError(`Saved state ${path} is invalid: ${issue.path.join('.')} ${issue.message}`);
    }
    return result.data;
  }
}

export function frozenListings(snapshot: RunSnapshot): JobListing[] {
  return snapshot.listings.map((listing) => Object.freeze({ ...listing }));
}
