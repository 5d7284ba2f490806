import { log } from './logger.js';
import type { Proxy } from './types.js';

const DEFAULT_FAILURE_THRESHOLD = 3;

export function proxyLabel(proxy: Proxy): string {
  return `${proxy.host}:${proxy.port}`;
}

/**
 * Parses `host:port` lines. Blank lines, `#` comments and malformed entries are skipped;
 * an `http://` prefix is tolerated.
 */
export function parseProxyList(text: string): Proxy[] {
  const proxies: Proxy[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim().replace(/^https?:\/\//, '');
    if (!line || line.startsWith('#')) continue;

    const separator = line.lastIndexOf(':');
    const host = line.slice(0, separator);
    const port = Number(line.slice(separator + 1));
    if (separator <= 0 || !Number.isInteger(port) || port <= 0 || port > 65535) {
      log.warn(`Ignoring malformed proxy entry "${rawLine.trim()}"`);
      continue;
    }
    proxies.push({ host, port, status: 'healthy', failures: 0 });
  }
  return proxies;
}

export interface ProxyPoolOptions {
  enabled: boolean;
  failureThreshold?: number;
}

export class ProxyPool {
  private readonly proxies: Proxy[];
  private readonly enabled: boolean;
  private readonly threshold: number;
  private cursor = 0;

  constructor(proxies: Proxy[], options: ProxyPoolOptions) {
    this.proxies = proxies;
    this.enabled = options.enabled;
    this.threshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
  }

  get size(): number {
    return this.proxies.length;
  }

  get alive(): number {
    return this.proxies.filter((p) => p.status !== 'dead').length;
  }

  next(): Proxy | undefined {
    if (!this.enabled || this.proxies.length === 0) return undefined;

    for (let step = 0; step < this.proxies.length; step++) {
      const proxy = this.proxies[this.cursor];
      this.cursor = (this.cursor + 1) % this.proxies.length;
      if (proxy.status !== 'dead') return proxy;
    }
    return undefined;
  }

  reportFailure(proxy: Proxy): void {
    if (proxy.status === 'dead') return;
    proxy.failures++;
    if (proxy.failures >= this.threshold) {
      proxy.status = 'dead';
      log.warn(`Proxy ${proxyLabel(proxy)} marked dead after ${proxy.failures} consecutive failures (${this.alive} left)`);
    } else {
      proxy.status = 'suspect';
    }
  }

  reportSuccess(proxy: Proxy): void {
    if (proxy.status === 'dead') return;
    proxy.failures = 0;
    proxy.status = 'healthy';
  }
}
