/**
 * HTTP transport for the timetable endpoint
 * One best-effort request per call: no retry, no backoff, no cookies.
 */

import { TransportError } from './errors.js';
import { logger } from './logger.js';

const HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
};

export interface FetchInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
  redirect: 'follow';
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  body?: { cancel(): Promise<void> } | null;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * The exchange the query API runs on. Swap it to stub the network.
 */
export interface Transport {
  get(url: string, timeoutMs: number): Promise<string>;
  post(url: string, form: Record<string, string>, timeoutMs: number): Promise<string>;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

async function send(fetchImpl: FetchLike, url: string, init: Omit<FetchInit, 'signal' | 'redirect'>, timeoutMs: number): Promise<string> {
  logger.debug('HTTP', `${init.method} ${url}`);

  let response: FetchResponse;
  try {
    response = await fetchImpl(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
      redirect: 'follow',
    });
  } catch (err) {
    if (isTimeout(err)) {
      throw new TransportError('timeout', `${init.method} ${url} timed out after ${timeoutMs}ms`, null, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransportError('network', `${init.method} ${url} failed: ${reason}`, null, { cause: err });
  }

  if (!response.ok) {
    // Error pages are not read; cancel the body so the connection is released
    try {
      await response.body?.cancel();
    } catch (err) {
      logger.debug('HTTP', `Discarding the ${response.status} body failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    throw new TransportError(
      'status',
      `${init.method} ${url} returned HTTP ${response.status} ${response.statusText}`.trim(),
      response.status
    );
  }

  try {
    return await response.text();
  } catch (err) {
    if (isTimeout(err)) {
      throw new TransportError('timeout', `${init.method} ${url} timed out reading the body`, response.status, { cause: err });
    }
    throw new TransportError('network', `${init.method} ${url} body could not be read`, response.status, { cause: err });
  }
}

/**
 * Transport backed by the global fetch (or any fetch-compatible function)
 */
export function createFetchTransport(fetchImpl: FetchLike = (url, init) => fetch(url, init)): Transport {
  return {
    get(url, timeoutMs) {
      return send(fetchImpl, url, { method: 'GET', headers: { ...HEADERS } }, timeoutMs);
    },

    post(url, form, timeoutMs) {
      return send(fetchImpl, url, {
        method: 'POST',
        headers: { ...HEADERS, 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(form).toString(),
      }, timeoutMs);
    },
  };
}

export const defaultTransport = createFetchTransport();
