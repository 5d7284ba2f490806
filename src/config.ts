import { z } from 'zod';
import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import YAML from 'yaml';
import { log } from './logger.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { Candidate } from './types.js';

const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
];

const BoardSchema = z.object({
  baseUrl: z.string().url().default('https://www.hellowork.com'),
  searchPath: z.string().default('/fr-fr/emploi/recherche.html'),
});

const BlockSignaturesSchema = z.object({
  statusCodes: z.array(z.number().int()).default([403, 429, 503]),
  bodyPatterns: z
    .array(z.string())
    .default([
      'captcha',
      'Attention Required',
      'Checking your browser',
      'Access denied',
      'Please verify you are a human',
    ]),
});

const ScraperSchema = z.object({
  rateLimitSeconds: z.number().nonnegative().default(2),
  jitterSeconds: z.number().nonnegative().default(1),
  maxAttempts: z.number().int().positive().default(3),
  backoffBaseSeconds: z.number().nonnegative().default(1),
  backoffCapSeconds: z.number().nonnegative().default(30),
  timeoutSeconds: z.number().positive().default(10),
  proxyFailureThreshold: z.number().int().positive().default(3),
  acceptLanguage: z.string().default('fr-FR,fr;q=0.9,en-US;q=0.8,en;q=0.7'),
  userAgents: z.array(z.string().min(1)).min(1).default(DEFAULT_USER_AGENTS),
  blockSignatures: BlockSignaturesSchema.default({}),
  expectedAnchors: z.array(z.string().min(1)).min(1).default(['<body']),
});

const MarkupSchema = z.object({
  card: z.string().default('div[data-cy="serpCard"]'),
  link: z.string().default('a[href*="/emplois/"]'),
  title: z.string().default('p.tw-typo-l, p.tw-typo-xl, h3 p'),
  company: z.string().default('p.tw-inline, p.tw-typo-s'),
  location: z.string().default('div[data-cy="localisationCard"]'),
  contract: z.string().default('div[data-cy="contractCard"]'),
  published: z.string().default('div.tw-typo-s.tw-text-grey'),
  postingPathFragment: z.string().min(1).default('/emplois/'),
  excludedLinkFragments: z.array(z.string()).default(['recherche', 'page=']),
  descriptionSelectors: z
    .array(z.string())
    .default([
      'div.job-description',
      'div.description',
      "div[data-testid='job-description']",
      "div[data-cy='jobDescription']",
      'section.job-description',
      'div.offer-description',
      'div.tw-prose',
    ]),
});

const PathsSchema = z.object({
  cv: z.string().default('cv.txt'),
  profile: z.string().default('profile.yaml'),
  background: z.string().default('parcours.txt'),
  proxies: z.string().default('proxies.txt'),
  vocabulary: z.string().default('data/skills.json'),
  letterTemplate: z.string().default('templates/letter.txt'),
  lettersDir: z.string().default('lettres'),
  debugDir: z.string().default('debug'),
  dataDir: z.string().default('data'),
  savesDir: z.string().default('saves'),
});

const ExportSchema = z.object({
  csv: z.string().optional(),
  sheet: z.string().optional(),
});

export const ConfigSchema = z.object({
  board: BoardSchema.default({}),
  scraper: ScraperSchema.default({}),
  markup: MarkupSchema.default({}),
  paths: PathsSchema.default({}),
  export: ExportSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type MarkupConfig = Config['markup'];
export type BlockSignatures = Config['scraper']['blockSignatures'];

/**
 * Paths in the file are relative to the directory holding it.
 */
export function resolvePaths(config: Config, baseDir: string): Config {
  const at = (value: string): string => resolve(baseDir, value);
  const { paths } = config;
  return {
    ...config,
    paths: {
      cv: at(paths.cv),
      profile: at(paths.profile),
      background: at(paths.background),
      proxies: at(paths.proxies),
      vocabulary: at(paths.vocabulary),
      letterTemplate: at(paths.letterTemplate),
      lettersDir: at(paths.lettersDir),
      debugDir: at(paths.debugDir),
      dataDir: at(paths.dataDir),
      savesDir: at(paths.savesDir),
    },
    export: { ...config.export, csv: config.export.csv ? at(config.export.csv) : undefined },
  };
}

export function loadConfig(path: string): Config {
  log.info(`Loading config from ${path}`);

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    throw new ConfigurationError(`Config file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw) ?? {};
  } catch (err: unknown) {
    throw new ConfigurationError(`Config file is not valid YAML: ${path} (${errorMessage(err)})`);
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid config ${path}: ${issue.path.join('.')} ${issue.message}`);
  }
  return resolvePaths(result.data, dirname(resolve(path)));
}

const ProfileSchema = z.object({
  name: z.string().min(1),
  contact: z.string().min(1),
  motivation: z.string().min(1),
  signature: z.string().min(1),
});

export async function loadCandidate(cvPath: string, profilePath: string, backgroundPath?: string): Promise<Candidate> {
  let cvText: string;
  try {
    cvText = await readFile(cvPath, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigurationError(`CV file unreadable: ${cvPath} (${errorMessage(err)})`);
  }

  let rawProfile: string;
  try {
    rawProfile = await readFile(profilePath, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigurationError(`Profile file unreadable: ${profilePath} (${errorMessage(err)})`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(rawProfile);
  } catch (err: unknown) {
    throw new ConfigurationError(`Profile file is not valid YAML: ${profilePath} (${errorMessage(err)})`);
  }

  const profile = ProfileSchema.safeParse(parsed);
  if (!profile.success) {
    const fields = profile.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigurationError(`Profile ${profilePath} is missing required fields: ${fields}`);
  }

  return { profile: profile.data, cvText, background: backgroundPath ? await readBackground(backgroundPath) : '' };
}

async function readBackground(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    log.warn(`Background file ${path} not found; letters will quote the CV only`);
    return '';
  }
}

// A missing proxy file disables proxies.
export async function readProxyList(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    log.warn(`Proxy list ${path} not found — continuing without proxies`);
    return '';
  }
}
