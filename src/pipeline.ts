import { log } from './logger.js';
import { ConfigurationError, FetchFailedError, SinkError } from './errors.js';
import { buildSearchUrl, pageUrl } from './board.js';
import { matchesContract } from './contracts.js';
import { formatScore, match } from './matcher.js';
import type { Config } from './config.js';
import type { Extractor } from './extractor.js';
import type { LetterComposer } from './letter.js';
import type { SkillExtractor } from './skills.js';
import { frozenListings, type SnapshotStore } from './sinks/snapshots.js';
import type { LetterSink, RecordSink } from './sinks/types.js';
import type { Candidate, FetchAttempt, JobListing, RunReport, RunState } from './types.js';

export interface RunOptions {
  job: string;
  location?: string;
  contract?: string;
  pages: number;
  letters: boolean;
  saveState?: boolean;
  resumeFrom?: string;
}

export interface PageFetcher {
  fetch(url: string): Promise<FetchAttempt>;
}

export interface LetterResources {
  candidate: Candidate;
  skills: SkillExtractor;
  composer: LetterComposer;
}

export interface LetterSetup {
  // Throws ConfigurationError when a resource is missing or invalid.
  load(): Promise<LetterResources>;
  sink: LetterSink;
}

export interface PipelineDeps {
  board: Config['board'];
  fetcher: PageFetcher;
  extractor: Extractor;
  recordSinks: RecordSink[];
  letters?: LetterSetup;
  snapshots?: SnapshotStore;
}

// idle → fetching(i) → extracting(i) → … → matching → done; aborted only before the first request.
export class Pipeline {
  private readonly deps: PipelineDeps;
  private readonly details = new Map<string, string | undefined>();
  private report: RunReport = Pipeline.emptyReport();

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  private static emptyReport(): RunReport {
    return { state: 'idle', pagesFetched: 0, listings: [], letters: [], failures: [], warnings: [] };
  }

  async run(options: RunOptions): Promise<RunReport> {
    this.report = Pipeline.emptyReport();
    this.details.clear();

    let resources: LetterResources | undefined;
    let resumed: JobListing[] | undefined;
    try {
      if (options.resumeFrom) resumed = await this.resume(options.resumeFrom);
      if (options.letters) resources = await this.prepareLetters();
    } catch (err: unknown) {
      if (!(err instanceof ConfigurationError)) throw err;
      log.error(err.message);
      this.report.error = err.message;
      this.transition('aborted');
      return this.report;
    }

    let listings = resumed ?? (await this.collect(options));
    if (options.contract) {
      listings = await this.filterByContract(listings, options.contract);
    }
    this.report.listings = listings;

    if (options.saveState) await this.saveState(options, listings);

    if (resources && this.deps.letters) {
      this.transition('matching');
      await this.writeLetters(listings, resources, this.deps.letters.sink);
    }

    await this.export(listings);

    this.transition('done');
    return this.report;
  }

  private async resume(path: string): Promise<JobListing[]> {
    if (!this.deps.snapshots) {
      throw new ConfigurationError('Resuming requested but no saved state store is configured');
    }
    const snapshot = await this.deps.snapshots.load(path);
    log.info(`Resuming "${snapshot.search.job}" from ${path}: ${snapshot.listings.length} listings saved at ${snapshot.timestamp}`);
    return frozenListings(snapshot);
  }

  private async saveState(options: RunOptions, listings: JobListing[]): Promise<void> {
    if (!this.deps.snapshots) {
      this.warn('Saving state requested but no saved state store is configured');
      return;
    }
    try {
      this.report.savedState = await this.deps.snapshots.save({
        timestamp: new Date().toISOString(),
        search: { job: options.job, location: options.location, contract: options.contract, pages: options.pages },
        listings,
      });
    } catch (err: unknown) {
      this.warn(new SinkError('snapshot', err).message);
    }
  }

  private async prepareLetters(): Promise<LetterResources> {
    if (!this.deps.letters) {
      throw new ConfigurationError('Letter generation requested but no letter output is configured');
    }
    const resources = await this.deps.letters.load();
    log.info(`Candidate profile loaded for ${resources.candidate.profile.name} (${resources.skills.size} known skills)`);
    return resources;
  }

  private async collect(options: RunOptions): Promise<JobListing[]> {
    const searchUrl = buildSearchUrl(this.deps.board, { job: options.job, location: options.location });
    log.info(`Searching "${options.job}"${options.location ? ` in ${options.location}` : ''}: ${searchUrl}`);

    const seen = new Set<string>();
    const listings: JobListing[] = [];
    let duplicates = 0;

    for (let page = 1; page <= options.pages; page++) {
      const url = pageUrl(searchUrl, page);
      this.transition('fetching', page);

      let attempt: FetchAttempt;
      try {
        attempt = await this.deps.fetcher.fetch(url);
      } catch (err: unknown) {
        if (!(err instanceof FetchFailedError)) throw err;
        log.warn(`Skipping page ${page}${err.blocked ? ' (blocked)' : ''}: ${err.message}`);
        this.report.failures.push({ page, url, reason: err.message, blocked: err.blocked });
        continue;
      }

      this.transition('extracting', page);
      this.report.pagesFetched++;
      const found = this.deps.extractor.extract(attempt.body ?? '', url);
      if (found.length === 0) {
        log.info(`Page ${page} has no listings — stopping pagination`);
        break;
      }

      for (const listing of found) {
        if (seen.has(listing.url)) {
          duplicates++;
          continue;
        }
        seen.add(listing.url);
        listings.push(listing);
      }
      log.info(`Page ${page}: ${found.length} listings (${listings.length} unique so far)`);
    }

    log.info(`Extraction complete: ${listings.length} unique listings (${duplicates} duplicates removed)`);
    return listings;
  }

  private async filterByContract(listings: JobListing[], contract: string): Promise<JobListing[]> {
    const wanted = contract.toLowerCase();
    const kept: JobListing[] = [];

    for (const listing of listings) {
      if (matchesContract(contract, listing.contractType, listing.isApprenticeship)) {
        kept.push(listing);
        continue;
      }
      const description = await this.postingDescription(listing);
      if (description?.toLowerCase().includes(wanted)) kept.push(listing);
    }

    log.info(`${kept.length} of ${listings.length} listings match contract type "${contract}"`);
    return kept;
  }

  private async export(listings: JobListing[]): Promise<void> {
    const letterPaths = new Map<string, string>();
    for (const letter of this.report.letters) {
      if (letter.path !== null) letterPaths.set(letter.url, letter.path);
    }

    for (const sink of this.deps.recordSinks) {
      try {
        await sink.write(listings, letterPaths);
      } catch (err: unknown) {
        this.warn(new SinkError(sink.name, err).message);
      }
    }
  }

  private async writeLetters(listings: JobListing[], resources: LetterResources, sink: LetterSink): Promise<void> {
    const { candidate, skills, composer } = resources;
    const candidateSkills = skills.extractSkills(candidate.cvText);
    log.info(`CV skills: ${[...candidateSkills].map((s) => skills.label(s)).join(', ') || 'none recognised'}`);

    for (const listing of listings) {
      const description = await this.postingDescription(listing);
      const posting = description ? Object.freeze({ ...listing, description }) : listing;
      const result = match(posting, candidateSkills, skills.extractSkills(posting.description));
      const draft = composer.compose(candidate, posting, result);

      let path: string | null = null;
      try {
        path = await sink.write(draft);
        log.info(`Letter for "${listing.title}" at ${listing.company} (match ${formatScore(result.score)}) → ${path}`);
      } catch (err: unknown) {
        this.warn(new SinkError('letters', err).message);
      }
      this.report.letters.push({ url: listing.url, draft, path });
    }
  }

  // Detail pages are fetched at most once per URL.
  private async postingDescription(listing: JobListing): Promise<string | undefined> {
    if (this.details.has(listing.url)) return this.details.get(listing.url);

    let description: string | undefined;
    try {
      const attempt = await this.deps.fetcher.fetch(listing.url);
      description = this.deps.extractor.extractDescription(attempt.body ?? '');
    } catch (err: unknown) {
      if (!(err instanceof FetchFailedError)) throw err;
      this.warn(`Posting details unavailable for ${listing.url}: ${err.message}`);
    }
    this.details.set(listing.url, description);
    return description;
  }

  private warn(message: string): void {
    log.warn(message);
    this.report.warnings.push(message);
  }

  private transition(state: RunState, page?: number): void {
    this.report.state = state;
    log.info(`State: ${state}${page !== undefined ? `(page ${page})` : ''}`);
  }
}
