export interface JobListing {
  readonly url: string;
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly description: string;
  readonly contractType: string;
  readonly isApprenticeship: boolean;
  readonly discoveredAt: Date;
}

export type ProxyStatus = 'healthy' | 'suspect' | 'dead';

export interface Proxy {
  readonly host: string;
  readonly port: number;
  status: ProxyStatus;
  failures: number;
}

export type FetchOutcome = 'ok' | 'blocked' | 'http-error' | 'missing-anchors' | 'network-error';

export interface FetchAttempt {
  url: string;
  attempt: number;
  outcome: FetchOutcome;
  status: number | null;
  latencyMs: number;
  proxy: string | null;
  userAgent: string;
  body?: string;
  error?: string;
  savedState?: string;
  cause?: Error;
}

export type SkillSet = ReadonlySet<string>;

export interface MatchResult {
  listing: JobListing;
  matchedSkills: SkillSet;
  score: number;
}

export interface CandidateProfile {
  name: string;
  contact: string;
  motivation: string;
  signature: string;
}

export interface Candidate {
  profile: CandidateProfile;
  cvText: string;
  background: string;
}

export interface LetterDraft {
  readonly text: string;
  readonly date: Date;
  readonly company: string;
  readonly title: string;
}

export type RunState = 'idle' | 'fetching' | 'extracting' | 'matching' | 'done' | 'aborted';

export interface PageFailure {
  page: number;
  url: string;
  reason: string;
  blocked: boolean;
}

export interface RunReport {
  state: RunState;
  pagesFetched: number;
  listings: JobListing[];
  letters: Array<{ url: string; draft: LetterDraft; path: string | null }>;
  failures: PageFailure[];
  warnings: string[];
  error?: string;
  savedState?: string;
}

export interface RunStatus {
  timestamp: string;
  success: boolean;
  state: RunState;
  pagesFetched: number;
  listingsExtracted: number;
  lettersWritten: number;
  durationMs: number;
  errors: string[];
}
