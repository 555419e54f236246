/**
 * Web verifier: HTTP(S) reachability checks.
 *
 * Sends HEAD first and falls back to GET for servers that reject HEAD.
 * Any final 2xx/3xx is healthy. Failures are reported as ignored/unreachable
 * with the status or error message as detail; there is no retry and no
 * per-domain throttling.
 */

import { UNSUPPORTED, VALID, canRecord, ignored } from './types.ts';
import type { Cache, Link, ValidationResult, Verifier } from './types.ts';

export type FetchLike = (input: string, init: RequestInit) => Promise<Pick<Response, 'status' | 'body'>>;

export interface WebVerifierOptions {
  /** Hosts (and their subdomains) that are never requested. */
  ignoredDomains?: readonly string[];
  timeoutMs?: number;
  userAgent?: string;
  fetch?: FetchLike;
}

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; refcheck/1.0)';

export function matchesDomainList(hostname: string, domains: readonly string[]): boolean {
  return domains.some(d => hostname === d || hostname.endsWith('.' + d));
}

interface HttpCheck {
  ok: boolean;
  status?: number;
  error?: string;
}

function isOkStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

export function createWebVerifier(options: WebVerifierOptions = {}): Verifier {
  const ignoredDomains = options.ignoredDomains ?? [];
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  async function request(url: string, method: 'HEAD' | 'GET'): Promise<HttpCheck> {
    try {
      const res = await doFetch(url, {
        method,
        redirect: 'follow',
        headers: {
          'User-Agent': userAgent,
          'Accept': 'text/html,application/xhtml+xml,*/*',
        },
        signal: AbortSignal.timeout(timeoutMs),
      });
      // Only the status matters; release the connection
      await res.body?.cancel();

      // Some servers refuse HEAD outright; ask again with GET
      if (method === 'HEAD' && (res.status === 405 || res.status === 403)) {
        return request(url, 'GET');
      }
      return { ok: isOkStatus(res.status), status: res.status };
    } catch (err: unknown) {
      const message = err instanceof Error
        ? (err.name === 'TimeoutError' ? 'timeout' : err.message)
        : String(err);
      return { ok: false, error: message };
    }
  }

  return {
    async verify(link: Link, cache: Cache): Promise<ValidationResult> {
      let url: URL;
      try {
        url = new URL(link.href);
      } catch {
        return UNSUPPORTED;
      }
      if (url.protocol !== 'http:' && url.protocol !== 'https:') return UNSUPPORTED;

      if (matchesDomainList(url.hostname, ignoredDomains)) {
        return ignored('policy', 'ignored domain');
      }

      const result = await request(link.href, 'HEAD');
      if (canRecord(cache)) {
        cache.record(link.href, result);
      }

      if (result.ok) return VALID;
      return ignored('unreachable', result.error ?? `HTTP ${result.status}`);
    },
  };
}
