import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import { ConfigurationError, errorMessage } from './errors.js';
import type { SkillSet } from './types.js';

const MAX_NGRAM = 3;

const VocabularySchema = z
  .array(
    z.object({
      label: z.string().min(1),
      aliases: z.array(z.string().min(1)).default([]),
    }),
  )
  .min(1);

export type VocabularyEntry = z.input<typeof VocabularySchema>[number];

/**
 * Lower-cases and splits on anything that is not a letter, digit or one of `+ # . / -`,
 * then trims punctuation from both ends so `Docker.` and `docker` agree while `c++`,
 * `c#`, `node.js` and `ci/cd` survive intact.
 */
export function tokenize(text: string): string[] {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .split(/[^\p{L}\p{N}+#./-]+/u)
    .map((token) => token.replace(/^[^\p{L}\p{N}]+/u, '').replace(/[^\p{L}\p{N}+#]+$/u, ''))
    .filter((token) => token.length > 0);
}

export class SkillExtractor {
  private readonly phrases = new Map<string, string>();
  private readonly labels = new Map<string, string>();

  constructor(vocabulary: readonly VocabularyEntry[]) {
    for (const entry of vocabulary) {
      const skill = tokenize(entry.label).join(' ');
      if (!skill) continue;
      this.labels.set(skill, entry.label);
      for (const phrase of [entry.label, ...(entry.aliases ?? [])]) {
        const key = tokenize(phrase).slice(0, MAX_NGRAM).join(' ');
        if (key) this.phrases.set(key, skill);
      }
    }
  }

  static async fromFile(path: string): Promise<SkillExtractor> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (err: unknown) {
      throw new ConfigurationError(`Skill vocabulary unreadable: ${path} (${errorMessage(err)})`);
    }
    const parsed = VocabularySchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Skill vocabulary ${path} is invalid: ${parsed.error.issues[0].message}`);
    }
    return new SkillExtractor(parsed.data);
  }

  get size(): number {
    return this.labels.size;
  }

  extractSkills(text: string): SkillSet {
    return new Set(this.firstOccurrences(text).keys());
  }

  firstOccurrences(text: string): Map<string, number> {
    const found = new Map<string, number>();
    const remember = (skill: string, position: number): void => {
      if (!found.has(skill)) found.set(skill, position);
    };

    const tokens = tokenize(text);
    let i = 0;
    while (i < tokens.length) {
      const matched = this.longestMatchAt(tokens, i);
      if (matched) {
        remember(matched.skill, i);
        i += matched.length;
        continue;
      }

      // "Python/SQL" or "front-end/React": try the pieces one by one.
      if (/[/-]/.test(tokens[i])) {
        for (const part of tokenize(tokens[i].replace(/[/-]/g, ' '))) {
          const skill = this.phrases.get(part);
          if (skill) remember(skill, i);
        }
      }
      i++;
    }
    return found;
  }

  label(skill: string): string {
    return this.labels.get(skill) ?? skill;
  }

  private longestMatchAt(tokens: string[], start: number): { skill: string; length: number } | undefined {
    for (let length = Math.min(MAX_NGRAM, tokens.length - start); length > 0; length--) {
      const skill = this.phrases.get(tokens.slice(start, start + length).join(' '));
      if (skill) return { skill, length };
    }
    return undefined;
  }
}
