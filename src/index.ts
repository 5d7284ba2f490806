#!/usr/bin/env node
import 'dotenv/config';
import { writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { log } from './logger.js';
import { HELP, parseCliArgs, type CliOptions } from './cli.js';
import { loadCandidate, loadConfig, readProxyList, type Config } from './config.js';
import { errorMessage } from './errors.js';
import { Extractor } from './extractor.js';
import { Fetcher, IdentityRotator, UndiciTransport } from './fetcher.js';
import { LetterComposer, loadTemplate } from './letter.js';
import { Pipeline, type LetterResources } from './pipeline.js';
import { ProxyPool, parseProxyList } from './proxyPool.js';
import { SkillExtractor } from './skills.js';
import { RequestThrottle } from './throttle.js';
import { CsvRecordSink } from './sinks/csvSink.js';
import { FileDebugSink, FileLetterSink } from './sinks/files.js';
import { FileSnapshotStore } from './sinks/snapshots.js';
import { GoogleSpreadsheetClient, SheetsRecordSink } from './sinks/sheetsSink.js';
import type { RecordSink } from './sinks/types.js';
import type { RunReport, RunStatus } from './types.js';

const SECOND = 1000;
const DEFAULT_DATA_DIR = 'data';

function buildRecordSinks(cli: CliOptions, config: Config): RecordSink[] {
  const sinks: RecordSink[] = [];

  const csvPath = cli.csv ?? config.export.csv;
  if (csvPath) sinks.push(new CsvRecordSink(csvPath));

  const sheetTitle = cli.sheet ?? config.export.sheet;
  if (sheetTitle) {
    const keyFile = process.env['GOOGLE_APPLICATION_CREDENTIALS'];
    if (keyFile) {
      sinks.push(new SheetsRecordSink(new GoogleSpreadsheetClient(keyFile), sheetTitle));
    } else {
      log.warn('GOOGLE_APPLICATION_CREDENTIALS not set — Google Sheets export disabled');
    }
  }
  return sinks;
}

async function loadLetterResources(config: Config): Promise<LetterResources> {
  const candidate = await loadCandidate(config.paths.cv, config.paths.profile, config.paths.background);
  const skills = await SkillExtractor.fromFile(config.paths.vocabulary);
  const template = await loadTemplate(config.paths.letterTemplate);
  return { candidate, skills, composer: new LetterComposer(template, skills) };
}

function printSummary(report: RunReport): void {
  report.listings.forEach((listing, i) => {
    log.info(`${i + 1}. ${listing.title} - ${listing.company} - ${listing.location}`);
    log.info(`   ${listing.url}`);
  });
}

function writeStatus(dataDir: string, status: RunStatus): void {
  mkdirSync(dataDir, { recursive: true });
  writeFileSync(join(dataDir, 'last_run_status.json'), JSON.stringify(status, null, 2));
}

async function main(): Promise<void> {
  const startTime = Date.now();
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.help) {
    process.stdout.write(HELP);
    return;
  }

  const config = loadConfig(cli.configPath);
  if (cli.validate) {
    log.info('Config valid');
    return;
  }

  const { scraper } = config;
  const proxies = cli.useProxies ? parseProxyList(await readProxyList(config.paths.proxies)) : [];
  if (cli.useProxies) log.info(`${proxies.length} proxies loaded from ${config.paths.proxies}`);

  const transport = new UndiciTransport();
  const fetcher = new Fetcher({
    transport,
    throttle: new RequestThrottle({
      rateLimitMs: (cli.rateLimit ?? scraper.rateLimitSeconds) * SECOND,
      jitterMs: scraper.jitterSeconds * SECOND,
      backoffBaseMs: scraper.backoffBaseSeconds * SECOND,
      backoffCapMs: scraper.backoffCapSeconds * SECOND,
    }),
    proxies: new ProxyPool(proxies, { enabled: cli.useProxies, failureThreshold: scraper.proxyFailureThreshold }),
    identities: new IdentityRotator(scraper.userAgents),
    maxAttempts: scraper.maxAttempts,
    timeoutMs: scraper.timeoutSeconds * SECOND,
    acceptLanguage: scraper.acceptLanguage,
    blockSignatures: scraper.blockSignatures,
    expectedAnchors: scraper.expectedAnchors,
    debugSink: cli.debug ? new FileDebugSink(config.paths.debugDir) : undefined,
  });

  const pipeline = new Pipeline({
    board: config.board,
    fetcher,
    extractor: new Extractor(config.markup, { defaultLocation: cli.location }),
    recordSinks: buildRecordSinks(cli, config),
    letters: { load: () => loadLetterResources(config), sink: new FileLetterSink(config.paths.lettersDir) },
    snapshots: new FileSnapshotStore(config.paths.savesDir),
  });

  log.info(`Starting run${cli.debug ? ' (debug mode)' : ''}`);
  let report: RunReport;
  try {
    report = await pipeline.run({
      job: cli.job ?? '',
      location: cli.location,
      contract: cli.contract,
      pages: cli.pages,
      letters: cli.letters,
      saveState: cli.saveState,
      resumeFrom: cli.resume,
    });
  } finally {
    await transport.close();
  }

  printSummary(report);
  const written = report.letters.filter((letter) => letter.path !== null).length;
  log.info(
    `Run ${report.state}: ${report.listings.length} listings from ${report.pagesFetched} pages, ` +
      `${report.failures.length} pages skipped, ${written} letters written`,
  );

  writeStatus(config.paths.dataDir, {
    timestamp: new Date().toISOString(),
    success: report.state === 'done',
    state: report.state,
    pagesFetched: report.pagesFetched,
    listingsExtracted: report.listings.length,
    lettersWritten: written,
    durationMs: Date.now() - startTime,
    errors: [
      ...(report.error ? [report.error] : []),
      ...report.failures.map((failure) => failure.reason),
      ...report.warnings,
    ],
  });

  if (report.state === 'aborted') process.exitCode = 1;
}

const runStart = Date.now();
main().catch((err: unknown) => {
  const message = errorMessage(err);
  log.error(message);
  writeStatus(DEFAULT_DATA_DIR, {
    timestamp: new Date().toISOString(),
    success: false,
    state: 'aborted',
    pagesFetched: 0,
    listingsExtracted: 0,
    lettersWritten: 0,
    durationMs: Date.now() - runStart,
    errors: [message],
  });
  process.exitCode = 1;
});
