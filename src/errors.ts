// Only ConfigurationError ends a run.
import type { FetchAttempt } from './types.js';

export class FetchFailedError extends Error {
  readonly url: string;
  readonly attempts: FetchAttempt[];

  constructor(url: string, attempts: FetchAttempt[]) {
    const last = attempts[attempts.length - 1];
    const reason = last ? `${last.outcome}${last.status !== null ? ` (HTTP ${last.status})` : ''}` : 'no attempt made';
    super(`Fetch failed for ${url} after ${attempts.length} attempt(s): ${reason}`);
    this.name = 'FetchFailedError';
    this.url = url;
    this.attempts = attempts;
  }

  get blocked(): boolean {
    return this.attempts.some((attempt) => attempt.cause instanceof BlockDetectedError);
  }
}

export class BlockDetectedError extends Error {
  readonly url: string;
  readonly signature: string;

  constructor(url: string, signature: string) {
    super(`Block page detected for ${url} (matched "${signature}")`);
    this.name = 'BlockDetectedError';
    this.url = url;
    this.signature = signature;
  }
}

export class MalformedRecordError extends Error {
  constructor(pageUrl: string, missing: string) {
    super(`Dropping listing on ${pageUrl}: missing ${missing}`);
    this.name = 'MalformedRecordError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SinkError extends Error {
  readonly sink: string;

  constructor(sink: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`${sink} write failed: ${message}`);
    this.name = 'SinkError';
    this.sink = sink;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
