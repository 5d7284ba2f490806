import type { JobListing, MatchResult, SkillSet } from './types.js';

/**
 * Share of the posting's skills the candidate covers: |candidate ∩ posting| / max(1, |posting|).
 * Skills the posting does not ask for never move the score.
 */
export function scoreOverlap(candidateSkills: SkillSet, postingSkills: SkillSet): { matched: SkillSet; score: number } {
  const matched = new Set<string>();
  for (const skill of postingSkills) {
    if (candidateSkills.has(skill)) matched.add(skill);
  }
  const score = Math.min(1, Math.max(0, matched.size / Math.max(1, postingSkills.size)));
  return { matched, score };
}

export function match(listing: JobListing, candidateSkills: SkillSet, postingSkills: SkillSet): MatchResult {
  const { matched, score } = scoreOverlap(candidateSkills, postingSkills);
  return { listing, matchedSkills: matched, score };
}

export function formatScore(score: number): string {
  return `${Math.round(score * 100)}%`;
}
