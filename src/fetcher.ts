import { parse } from 'node-html-parser';
import { fetch, ProxyAgent } from 'undici';
import { log } from './logger.js';
import { BlockDetectedError, FetchFailedError, errorMessage } from './errors.js';
import { proxyLabel, type ProxyPool } from './proxyPool.js';
import { systemClock, type Clock, type RequestThrottle } from './throttle.js';
import type { BlockSignatures } from './config.js';
import type { DebugSink } from './sinks/types.js';
import type { FetchAttempt, FetchOutcome, Proxy } from './types.js';

const ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8';

export interface HttpResponse {
  status: number;
  body: string;
}

export interface TransportRequest {
  headers: Record<string, string>;
  proxy?: Proxy;
  timeoutMs: number;
}

export interface HttpTransport {
  get(url: string, request: TransportRequest): Promise<HttpResponse>;
}

// One ProxyAgent per proxy for the whole run.
export class UndiciTransport implements HttpTransport {
  private readonly agents = new Map<string, ProxyAgent>();

  async get(url: string, request: TransportRequest): Promise<HttpResponse> {
    const dispatcher = request.proxy ? this.agentFor(request.proxy) : undefined;
    const response = await fetch(url, {
      headers: request.headers,
      dispatcher,
      signal: AbortSignal.timeout(request.timeoutMs),
    });
    return { status: response.status, body: await response.text() };
  }

  async close(): Promise<void> {
    await Promise.all([...this.agents.values()].map((agent) => agent.close()));
    this.agents.clear();
  }

  private agentFor(proxy: Proxy): ProxyAgent {
    const key = proxyLabel(proxy);
    let agent = this.agents.get(key);
    if (!agent) {
      agent = new ProxyAgent(`http://${key}`);
      this.agents.set(key, agent);
    }
    return agent;
  }
}

export class IdentityRotator {
  private readonly pool: readonly string[];
  private readonly random: () => number;
  private last = -1;

  constructor(pool: readonly string[], random: () => number = Math.random) {
    if (pool.length === 0) throw new Error('Identity pool must not be empty');
    this.pool = pool;
    this.random = random;
  }

  next(): string {
    if (this.pool.length === 1) return this.pool[0];

    const candidates = this.last < 0 ? this.pool.length : this.pool.length - 1;
    let index = Math.min(candidates - 1, Math.floor(this.random() * candidates));
    if (this.last >= 0 && index >= this.last) index++;
    this.last = index;
    return this.pool[index];
  }
}

export interface Classification {
  outcome: FetchOutcome;
  signature?: string;
}

// Script, style and noscript contents are not page text.
export function visibleText(html: string): string {
  const root = parse(html, { comment: false, blockTextElements: { script: false, style: false, noscript: false } });
  return root.text.replace(/\s+/g, ' ').trim();
}

export function classifyResponse(
  response: HttpResponse,
  signatures: BlockSignatures,
  anchors: readonly string[],
): Classification {
  if (signatures.statusCodes.includes(response.status)) {
    return { outcome: 'blocked', signature: `HTTP ${response.status}` };
  }

  const text = visibleText(response.body).toLowerCase();
  const pattern = signatures.bodyPatterns.find((p) => text.includes(p.toLowerCase()));
  if (pattern) return { outcome: 'blocked', signature: pattern };

  const lowered = response.body.toLowerCase();

  if (response.status < 200 || response.status >= 300) return { outcome: 'http-error' };
  if (!anchors.some((anchor) => lowered.includes(anchor.toLowerCase()))) return { outcome: 'missing-anchors' };
  return { outcome: 'ok' };
}

export type NextStep = { kind: 'success' } | { kind: 'retry'; nextAttempt: number } | { kind: 'failed' };

/**
 * Attempt(n) → Success | Retry(n+1) | Failed
 */
export function decideNextStep(outcome: FetchOutcome, attempt: number, maxAttempts: number): NextStep {
  if (outcome === 'ok') return { kind: 'success' };
  if (attempt < maxAttempts) return { kind: 'retry', nextAttempt: attempt + 1 };
  return { kind: 'failed' };
}

export interface FetcherOptions {
  transport: HttpTransport;
  throttle: RequestThrottle;
  proxies: ProxyPool;
  identities: IdentityRotator;
  maxAttempts: number;
  timeoutMs: number;
  acceptLanguage: string;
  blockSignatures: BlockSignatures;
  expectedAnchors: readonly string[];
  debugSink?: DebugSink;
  clock?: Clock;
}

export class Fetcher {
  private readonly options: FetcherOptions;
  private readonly clock: Clock;

  constructor(options: FetcherOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  async fetch(url: string): Promise<FetchAttempt> {
    const { throttle, proxies, maxAttempts } = this.options;
    const attempts: FetchAttempt[] = [];
    let attempt = 1;

    for (;;) {
      await throttle.wait();
      const proxy = proxies.next();
      const result = await this.attempt(url, attempt, proxy);
      attempts.push(result);

      if (proxy) {
        if (result.outcome === 'ok') proxies.reportSuccess(proxy);
        else proxies.reportFailure(proxy);
      }

      const step = decideNextStep(result.outcome, attempt, maxAttempts);
      if (step.kind === 'success') {
        log.info(`GET ${url} → ${result.status} in ${result.latencyMs}ms (attempt ${attempt}/${maxAttempts})`);
        return result;
      }

      if (result.cause instanceof BlockDetectedError) {
        log.warn(`Block page on ${result.cause.url} (matched "${result.cause.signature}"), attempt ${attempt}/${maxAttempts}`);
      } else {
        log.warn(`GET ${url} attempt ${attempt}/${maxAttempts} failed: ${result.error ?? result.outcome}`);
      }
      if (step.kind === 'failed') throw new FetchFailedError(url, attempts);

      await throttle.backoff(attempt);
      attempt = step.nextAttempt;
    }
  }

  private async attempt(url: string, attempt: number, proxy: Proxy | undefined): Promise<FetchAttempt> {
    const { transport, identities, timeoutMs, acceptLanguage, blockSignatures, expectedAnchors } = this.options;
    const userAgent = identities.next();
    const startedAt = this.clock.now();
    const base = { url, attempt, proxy: proxy ? proxyLabel(proxy) : null, userAgent };

    let response: HttpResponse;
    try {
      response = await transport.get(url, {
        headers: { 'User-Agent': userAgent, Accept: ACCEPT, 'Accept-Language': acceptLanguage },
        proxy,
        timeoutMs,
      });
    } catch (err: unknown) {
      return {
        ...base,
        outcome: 'network-error',
        status: null,
        latencyMs: this.clock.now() - startedAt,
        error: errorMessage(err),
        cause: err instanceof Error ? err : undefined,
      };
    }

    const latencyMs = this.clock.now() - startedAt;
    await this.saveDebug(url, response.body);

    const { outcome, signature } = classifyResponse(response, blockSignatures, expectedAnchors);
    const result: FetchAttempt = { ...base, outcome, status: response.status, latencyMs, body: response.body };
    if (outcome === 'blocked' && signature) {
      result.cause = new BlockDetectedError(url, signature);
      result.error = result.cause.message;
    } else if (outcome === 'http-error') {
      result.error = `HTTP ${response.status}`;
    } else if (outcome === 'missing-anchors') {
      result.error = 'expected page structure not found';
    }
    return result;
  }

  private async saveDebug(url: string, body: string): Promise<void> {
    if (!this.options.debugSink) return;
    try {
      await this.options.debugSink.save(url, body);
    } catch (err: unknown) {
      log.warn(`Debug artifact for ${url} not saved: ${errorMessage(err)}`);
    }
  }
}
