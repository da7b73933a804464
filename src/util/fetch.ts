import type { Logger } from 'pino';
import { fetch as undiciFetch } from 'undici';

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init?: FetchInit) => Promise<FetchResponseLike>;

export type FetchErrorKind = 'timeout' | 'http' | 'network';

export class ExternalFetchError extends Error {
  kind: FetchErrorKind;
  status?: number;
  constructor(kind: FetchErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ExternalFetchError';
    this.kind = kind;
    this.status = status;
  }
}

export function getFetch(): FetchLike {
  return undiciFetch;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * GETs a URL and returns the body as text. Non-2xx answers raise an `http` error.
 * There is no retry: a failed fetch ends the caller's run.
 */
export async function fetchText(
  url: string,
  opts: {
    timeoutMs?: number;
    headers?: Record<string, string>;
    target?: string;
    fetchImpl?: FetchLike;
    log?: Logger;
  } = {},
): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? 15000;
  const target = opts.target ?? 'unknown';
  const log = opts.log;

  try {
    new URL(url);
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }

  const fetchImpl = opts.fetchImpl ?? getFetch();
  const ac = new AbortController();
  const t = setTimeout(() => ac.abort(), timeoutMs);
  const start = Date.now();

  try {
    log?.debug({ target, url }, 'page request');
    const res = await fetchImpl(url, { headers: opts.headers, signal: ac.signal });
    log?.debug({ target, status: res.status, statusText: res.statusText }, 'page response received');

    if (!res.ok) {
      throw new ExternalFetchError('http', `HTTP_${res.status}`, res.status);
    }

    let body: string;
    try {
      body = await res.text();
    } catch (textErr) {
      log?.debug({ target, err: textErr }, 'failed to read response body');
      throw new ExternalFetchError('network', 'response_read_error');
    }
    log?.debug({ target, bytes: body.length, duration: Date.now() - start }, 'page fetched');
    return body;
  } catch (err: unknown) {
    if (err instanceof ExternalFetchError) throw err;
    if (isAbortError(err)) {
      throw new ExternalFetchError('timeout', 'timeout');
    }
    log?.debug({ target, err }, 'network error');
    throw new ExternalFetchError('network', err instanceof Error ? err.message : String(err));
  } finally {
    clearTimeout(t);
  }
}
