import { describe, it, expect, vi } from 'vitest';
import { MemoryCache } from './cache.ts';
import { createWebVerifier, matchesDomainList } from './web-verifier.ts';
import type { FetchLike } from './web-verifier.ts';
import type { Cache } from './types.ts';

const NO_CACHE: Cache = { isValid: () => undefined };

function respondWith(...statuses: number[]) {
  const queue = [...statuses];
  return vi.fn<FetchLike>(async () => ({ status: queue.shift() ?? 500, body: null }));
}

describe('matchesDomainList', () => {
  it('matches the domain and its subdomains', () => {
    expect(matchesDomainList('x.com', ['x.com'])).toBe(true);
    expect(matchesDomainList('www.linkedin.com', ['linkedin.com'])).toBe(true);
  });

  it('does not match lookalike hosts', () => {
    expect(matchesDomainList('notx.com', ['x.com'])).toBe(false);
    expect(matchesDomainList('x.com.evil.test', ['x.com'])).toBe(false);
  });
});

describe('createWebVerifier', () => {
  it('accepts 2xx and 3xx responses', async () => {
    const fetch = respondWith(200, 301);
    const verifier = createWebVerifier({ fetch });

    expect(await verifier.verify({ href: 'https://example.com/a' }, NO_CACHE)).toEqual({ kind: 'valid' });
    expect(await verifier.verify({ href: 'https://example.com/b' }, NO_CACHE)).toEqual({ kind: 'valid' });
  });

  it('sends HEAD with redirects followed and the configured user agent', async () => {
    const fetch = respondWith(200);
    await createWebVerifier({ fetch, userAgent: 'test-agent' }).verify({ href: 'https://example.com/' }, NO_CACHE);

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe('https://example.com/');
    expect(init.method).toBe('HEAD');
    expect(init.redirect).toBe('follow');
    expect(init.headers).toEqual({
      'User-Agent': 'test-agent',
      'Accept': 'text/html,application/xhtml+xml,*/*',
    });
  });

  it('retries with GET when HEAD is refused', async () => {
    const fetch = respondWith(405, 200);
    const result = await createWebVerifier({ fetch }).verify({ href: 'https://example.com/' }, NO_CACHE);

    expect(result).toEqual({ kind: 'valid' });
    expect(fetch.mock.calls.map(([, init]) => init.method)).toEqual(['HEAD', 'GET']);
  });

  it('cancels every response body', async () => {
    let cancelled = 0;
    const body = () => new ReadableStream({ cancel: () => { cancelled++; } });
    const statuses = [403, 200];
    const fetch = vi.fn<FetchLike>(async () => ({ status: statuses.shift() ?? 500, body: body() }));

    const result = await createWebVerifier({ fetch }).verify({ href: 'https://example.com/' }, NO_CACHE);

    expect(result).toEqual({ kind: 'valid' });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(cancelled).toBe(2);
  });

  it('reports error statuses as unreachable', async () => {
    const result = await createWebVerifier({ fetch: respondWith(404) })
      .verify({ href: 'https://example.com/gone' }, NO_CACHE);

    expect(result).toEqual({ kind: 'ignored', reason: 'unreachable', detail: 'HTTP 404' });
  });

  it('reports network errors with their message', async () => {
    const fetch = vi.fn<FetchLike>(async () => { throw new Error('getaddrinfo ENOTFOUND example.invalid'); });
    const result = await createWebVerifier({ fetch }).verify({ href: 'https://example.invalid/' }, NO_CACHE);

    expect(result).toEqual({
      kind: 'ignored',
      reason: 'unreachable',
      detail: 'getaddrinfo ENOTFOUND example.invalid',
    });
  });

  it('reports timeouts as "timeout"', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetch = vi.fn<FetchLike>(async () => { throw timeout; });

    const result = await createWebVerifier({ fetch }).verify({ href: 'https://example.com/slow' }, NO_CACHE);
    expect(result).toEqual({ kind: 'ignored', reason: 'unreachable', detail: 'timeout' });
  });

  it('skips ignored domains without a request', async () => {
    const fetch = respondWith(200);
    const verifier = createWebVerifier({ fetch, ignoredDomains: ['twitter.com'] });

    expect(await verifier.verify({ href: 'https://mobile.twitter.com/someone' }, NO_CACHE)).toEqual({
      kind: 'ignored',
      reason: 'policy',
      detail: 'ignored domain',
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it('declines anything that is not an http(s) URL', async () => {
    const fetch = respondWith(200);
    const verifier = createWebVerifier({ fetch });

    for (const href of ['./local.md', 'mailto:someone@example.com', 'ftp://example.com/file', 'not a url']) {
      expect(await verifier.verify({ href }, NO_CACHE)).toEqual({ kind: 'unsupported' });
    }
    expect(fetch).not.toHaveBeenCalled();
  });

  it('records results in a recording cache', async () => {
    const cache = new MemoryCache(() => 1000);
    const verifier = createWebVerifier({ fetch: respondWith(200, 404) });

    await verifier.verify({ href: 'https://example.com/ok' }, cache);
    await verifier.verify({ href: 'https://example.com/gone' }, cache);

    expect(cache.get('https://example.com/ok')).toEqual({ ok: true, status: 200, checkedAt: 1000 });
    expect(cache.get('https://example.com/gone')).toEqual({ ok: false, status: 404, checkedAt: 1000 });
    expect(cache.isValid('https://example.com/ok')).toBe(true);
    expect(cache.isValid('https://example.com/gone')).toBe(false);
  });
});
