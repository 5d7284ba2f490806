import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseCliArgs, readFlag } from '../src/cli.js';
import { loadCandidate, loadConfig, readProxyList } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'offer-relay-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('merges the file over defaults and resolves paths beside it', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'scraper:\n  rateLimitSeconds: 5\npaths:\n  cv: me/cv.txt\nexport:\n  csv: out/offres.csv\n');

    const config = loadConfig(path);

    expect(config.scraper.rateLimitSeconds).toBe(5);
    expect(config.scraper.maxAttempts).toBe(3);
    expect(config.scraper.blockSignatures.statusCodes).toEqual([403, 429, 503]);
    expect(config.paths.cv).toBe(join(dir, 'me', 'cv.txt'));
    expect(config.paths.profile).toBe(join(dir, 'profile.yaml'));
    expect(config.paths.background).toBe(join(dir, 'parcours.txt'));
    expect(config.paths.savesDir).toBe(join(dir, 'saves'));
    expect(config.export.csv).toBe(join(dir, 'out', 'offres.csv'));
    expect(config.export.sheet).toBeUndefined();
  });

  it('rejects a missing file', () => {
    expect(() => loadConfig(join(dir, 'absent.yaml'))).toThrow(ConfigurationError);
  });

  it('reports malformed YAML as a configuration error', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'scraper:\n  rateLimitSeconds: [2\n');

    expect(() => loadConfig(path)).toThrow(ConfigurationError);
    expect(() => loadConfig(path)).toThrow(`Config file is not valid YAML: ${path}`);
  });

  it('rejects invalid values', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'scraper:\n  maxAttempts: 0\n');

    expect(() => loadConfig(path)).toThrow(/^Invalid config .*: scraper\.maxAttempts /);
  });
});

describe('loadCandidate', () => {
  it('reads the CV and profile', async () => {
    const cv = join(dir, 'cv.txt');
    const profile = join(dir, 'profile.yaml');
    await writeFile(cv, 'Python, SQL');
    await writeFile(
      profile,
      'name: Camille Martin\ncontact: camille@example.com\nmotivation: Rejoindre {{company}}\nsignature: Camille\n',
    );

    const candidate = await loadCandidate(cv, profile, join(dir, 'parcours.txt'));

    expect(candidate).toEqual({
      cvText: 'Python, SQL',
      background: '',
      profile: {
        name: 'Camille Martin',
        contact: 'camille@example.com',
        motivation: 'Rejoindre {{company}}',
        signature: 'Camille',
      },
    });
  });

  it('reads the background file when present', async () => {
    const cv = join(dir, 'cv.txt');
    const profile = join(dir, 'profile.yaml');
    const background = join(dir, 'parcours.txt');
    await writeFile(cv, 'Python');
    await writeFile(profile, 'name: Camille\ncontact: c@example.com\nmotivation: Motivée\nsignature: Camille\n');
    await writeFile(background, 'Trois ans de back-end.');

    expect((await loadCandidate(cv, profile, background)).background).toBe('Trois ans de back-end.');
  });

  it('rejects an unreadable CV', async () => {
    await expect(loadCandidate(join(dir, 'cv.txt'), join(dir, 'profile.yaml'))).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('names the missing profile fields', async () => {
    const cv = join(dir, 'cv.txt');
    const profile = join(dir, 'profile.yaml');
    await writeFile(cv, 'Python');
    await writeFile(profile, 'name: Camille\ncontact: camille@example.com\nmotivation: Motivée\n');

    await expect(loadCandidate(cv, profile)).rejects.toThrow(`Profile ${profile} is missing required fields: signature`);
  });
});

describe('readProxyList', () => {
  it('treats a missing proxy file as an empty list', async () => {
    expect(await readProxyList(join(dir, 'proxies.txt'))).toBe('');
  });
});

describe('parseCliArgs', () => {
  it('reads flags in both spellings', () => {
    const options = parseCliArgs(['--job', 'data engineer', '--location', 'Lyon', '--pages', '3', '--letters', '--rate-limit=1.5']);

    expect(options).toMatchObject({
      job: 'data engineer',
      location: 'Lyon',
      pages: 3,
      rateLimit: 1.5,
      letters: true,
      useProxies: false,
      debug: false,
      configPath: 'config.yaml',
    });
  });

  it('defaults to one page', () => {
    expect(parseCliArgs(['--job', 'dev']).pages).toBe(1);
  });

  it('requires a job unless only validating', () => {
    expect(() => parseCliArgs([])).toThrow(ConfigurationError);
    expect(parseCliArgs(['--validate']).validate).toBe(true);
  });

  it('rejects a non-positive page count', () => {
    expect(() => parseCliArgs(['--job', 'dev', '--pages', '0'])).toThrow(/pages/);
  });

  it('accepts a saved state in place of a job', () => {
    const options = parseCliArgs(['--resume', 'saves/scraping_state_20261018_093000.json', '--save-state']);

    expect(options.resume).toBe('saves/scraping_state_20261018_093000.json');
    expect(options.saveState).toBe(true);
    expect(options.job).toBeUndefined();
  });

  it('does not take the next flag as a value', () => {
    expect(readFlag(['--job', '--pages', '2'], '--job')).toBeUndefined();
  });
});
