import { describe, expect, it } from 'vitest';
import { ProxyPool, parseProxyList, proxyLabel } from '../src/proxyPool.js';
import type { Proxy } from '../src/types.js';

function proxies(...ports: number[]): Proxy[] {
  return ports.map((port) => ({ host: '10.0.0.1', port, status: 'healthy', failures: 0 }));
}

describe('parseProxyList', () => {
  it('reads host:port lines and skips comments, blanks and malformed entries', () => {
    const parsed = parseProxyList('# proxies\n10.0.0.1:8080\n\nhttp://10.0.0.2:3128\nbad-entry\n10.0.0.3:99999\n');

    expect(parsed.map(proxyLabel)).toEqual(['10.0.0.1:8080', '10.0.0.2:3128']);
    expect(parsed.every((p) => p.status === 'healthy' && p.failures === 0)).toBe(true);
  });

  it('returns nothing for an empty file', () => {
    expect(parseProxyList('')).toEqual([]);
  });
});

describe('ProxyPool', () => {
  it('rotates round-robin', () => {
    const pool = new ProxyPool(proxies(1, 2, 3), { enabled: true });
    const picked = [pool.next(), pool.next(), pool.next(), pool.next()].map((p) => p?.port);
    expect(picked).toEqual([1, 2, 3, 1]);
  });

  it('returns nothing when disabled or empty', () => {
    expect(new ProxyPool(proxies(1), { enabled: false }).next()).toBeUndefined();
    expect(new ProxyPool([], { enabled: true }).next()).toBeUndefined();
  });

  it('marks a proxy dead after consecutive failures and never returns it again', () => {
    const list = proxies(1, 2);
    const pool = new ProxyPool(list, { enabled: true, failureThreshold: 2 });
    const [first] = list;

    pool.reportFailure(first);
    expect(first.status).toBe('suspect');
    pool.reportFailure(first);
    expect(first.status).toBe('dead');
    expect(pool.alive).toBe(1);

    for (let i = 0; i < 5; i++) {
      expect(pool.next()?.port).toBe(2);
    }
  });

  it('resets a suspect proxy on success but leaves dead ones dead', () => {
    const list = proxies(1, 2);
    const pool = new ProxyPool(list, { enabled: true, failureThreshold: 1 });
    const [first, second] = list;

    pool.reportFailure(first);
    pool.reportSuccess(first);
    expect(first.status).toBe('dead');

    second.status = 'suspect';
    second.failures = 0;
    pool.reportSuccess(second);
    expect(second.status).toBe('healthy');
  });

  it('counts failures in a row, not in total', () => {
    const list = proxies(1);
    const pool = new ProxyPool(list, { enabled: true, failureThreshold: 3 });
    const [proxy] = list;

    pool.reportFailure(proxy);
    pool.reportFailure(proxy);
    pool.reportSuccess(proxy);
    pool.reportFailure(proxy);

    expect(proxy.failures).toBe(1);
    expect(proxy.status).toBe('suspect');
  });

  it('returns nothing once every proxy is dead', () => {
    const list = proxies(1, 2);
    const pool = new ProxyPool(list, { enabled: true, failureThreshold: 1 });
    list.forEach((p) => pool.reportFailure(p));

    expect(pool.alive).toBe(0);
    expect(pool.next()).toBeUndefined();
  });
});
