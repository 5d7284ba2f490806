import { readFile } from 'node:fs/promises';
import { ConfigurationError, errorMessage } from './errors.js';
import { UNSPECIFIED } from './contracts.js';
import type { SkillExtractor } from './skills.js';
import type { Candidate, JobListing, LetterDraft, MatchResult } from './types.js';

const COMPANY_PLACEHOLDER = '{{company}}';

export async function loadTemplate(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigurationError(`Letter template unreadable: ${path} (${errorMessage(err)})`);
  }
}

/**
 * Replaces `{{key}}` placeholders in one pass; unknown keys are left untouched.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}

export function joinFrench(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} et ${items[items.length - 1]}`;
}

// First blank-line separated paragraph, or the first 200 characters when there is none.
export function leadParagraph(text: string): string {
  const trimmed = text.trim();
  const blocks = trimmed.split(/\n\s*\n/);
  if (blocks.length > 1) return blocks[0].trim();
  return trimmed.slice(0, 200).trim();
}

export function cvExtract(candidate: Candidate): string {
  const parts = [leadParagraph(candidate.cvText), leadParagraph(candidate.background)].filter(Boolean);
  return parts.length > 0 ? `\n\n${parts.join('\n\n')}` : '';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatLetterDate(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
}

function slug(value: string): string {
  return value
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/\s+/g, '_');
}

export function letterFileName(draft: LetterDraft): string {
  const { date } = draft;
  const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  return `${stamp}_${slug(draft.company)}_${slug(draft.title)}.txt`;
}

export interface LetterComposerOptions {
  now?: () => Date;
}

export class LetterComposer {
  private readonly template: string;
  private readonly skills: SkillExtractor;
  private readonly now: () => Date;

  constructor(template: string, skills: SkillExtractor, options: LetterComposerOptions = {}) {
    this.template = template;
    this.skills = skills;
    this.now = options.now ?? (() => new Date());
  }

  compose(candidate: Candidate, listing: JobListing, match: MatchResult): LetterDraft {
    const { profile } = candidate;
    const date = this.now();
    const company = listing.company === UNSPECIFIED ? '' : listing.company;
    const companyName = company || 'votre entreprise';

    const text = renderTemplate(this.template, {
      date: formatLetterDate(date),
      candidate_name: profile.name,
      candidate_contact: profile.contact,
      recipient: company ? `Service recrutement ${company}` : 'Service recrutement',
      company: companyName,
      title: listing.title,
      contract_clause: listing.isApprenticeship ? ' en alternance' : '',
      location_clause: listing.location && listing.location !== UNSPECIFIED ? ` à ${listing.location}` : '',
      skills_passage: this.skillsPassage(listing, match),
      cv_extract: cvExtract(candidate),
      motivation: this.motivationPassage(profile.motivation, companyName, listing.title),
      signature: profile.signature,
    });

    return Object.freeze({ text, date, company: company || UNSPECIFIED, title: listing.title });
  }

  // Matched skills in the order the posting first mentions them.
  orderedSkills(listing: JobListing, match: MatchResult): string[] {
    const positions = this.skills.firstOccurrences(listing.description);
    return [...match.matchedSkills]
      .sort((a, b) => {
        const pa = positions.get(a) ?? Number.MAX_SAFE_INTEGER;
        const pb = positions.get(b) ?? Number.MAX_SAFE_INTEGER;
        return pa - pb || a.localeCompare(b);
      })
      .map((skill) => this.skills.label(skill));
  }

  private skillsPassage(listing: JobListing, match: MatchResult): string {
    const ordered = this.orderedSkills(listing, match);
    if (ordered.length === 0) {
      return 'Mon profil correspond aux qualifications que vous recherchez, comme le montre mon CV ci-joint.';
    }
    return `Mon profil correspond aux qualifications que vous recherchez, notamment en ce qui concerne ${joinFrench(ordered)}, comme le montre mon CV ci-joint.`;
  }

  private motivationPassage(motivation: string, company: string, title: string): string {
    const passage = renderTemplate(motivation.trim(), { company, title });
    if (motivation.includes(COMPANY_PLACEHOLDER)) return passage;
    return `${passage}\n\nParticulièrement intéressé(e) par ${company}, je souhaite mettre à profit mon expertise pour contribuer à vos projets.`;
  }
}
