import { CacheMissError } from '../errors';
import { findHeader } from '../headers';
import { isRawHttpResponse } from '../rawResponse';
import type { HttpCache, HttpTransport, Logger, RawHttpResponse, TransportRequest } from '../types';

export interface CachingTransportOptions {
  /** Freshness lifetime of stored responses. Default: 5 minutes. */
  ttlMs?: number;
  logger?: Logger;
  now?: () => number;
}

const DEFAULT_TTL_MS = 5 * 60_000;

const isCacheable = (response: unknown): response is RawHttpResponse =>
  isRawHttpResponse(response) &&
  response.status >= 200 &&
  response.status <= 299 &&
  !(findHeader(response.headers, 'cache-control') ?? '').toLowerCase().includes('no-store');

const copyResponse = (response: RawHttpResponse): RawHttpResponse => ({
  status: response.status,
  headers: { ...response.headers },
  body: Uint8Array.from(response.body),
});

/**
 * Wraps a transport with a response cache keyed by request signature.
 *
 * Only GET requests are cached, and only replies shaped like an HTTP response are stored;
 * anything else is passed back untouched for the client to reject. The request's cache policy decides the lookup:
 * - `useProtocolCachePolicy`: serve a fresh entry, otherwise load and store
 * - `reloadIgnoringCacheData`: always load, then store
 * - `returnCacheDataElseLoad`: serve any entry regardless of age, otherwise load
 * - `returnCacheDataDontLoad`: serve any entry, otherwise reject with {@link CacheMissError}
 */
export function createCachingTransport(
  inner: HttpTransport,
  cache: HttpCache,
  options: CachingTransportOptions = {},
): HttpTransport {
  const ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
  const now = options.now ?? Date.now;
  const logger = options.logger;

  const lookup = async (req: TransportRequest): Promise<RawHttpResponse | undefined> => {
    if (req.cachePolicy === 'reloadIgnoringCacheData') {
      return undefined;
    }
    try {
      const entry = await cache.get<unknown>(req.signature);
      if (!entry || !isRawHttpResponse(entry.value)) return undefined;
      if (req.cachePolicy === 'useProtocolCachePolicy' && entry.expiresAt <= now()) {
        return undefined;
      }
      logger?.debug('http.cache.hit', { signature: req.signature, cachePolicy: req.cachePolicy });
      return copyResponse(entry.value);
    } catch (error) {
      logger?.warn('http.cache.error', {
        operation: 'get',
        signature: req.signature,
        error: error instanceof Error ? error.message : error,
      });
      return undefined;
    }
  };

  const store = async (req: TransportRequest, response: unknown): Promise<void> => {
    if (!isCacheable(response)) return;
    try {
      await cache.set(req.signature, { value: copyResponse(response), expiresAt: now() + ttlMs });
      logger?.debug('http.cache.store', { signature: req.signature });
    } catch (error) {
      logger?.warn('http.cache.error', {
        operation: 'set',
        signature: req.signature,
        error: error instanceof Error ? error.message : error,
      });
    }
  };

  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    if (req.method !== 'GET' || !req.signature) {
      return inner(req, signal);
    }

    const cached = await lookup(req);
    if (cached) {
      return cached;
    }
    if (req.cachePolicy === 'returnCacheDataDontLoad') {
      throw new CacheMissError(req.signature);
    }

    const response = await inner(req, signal);
    await store(req, response);
    return response;
  };
}
