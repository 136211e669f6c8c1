import type { CachePolicy, HttpHeaders, HttpMethod, QueryParams, RequestDescriptor } from './types';

export interface RequestDescriptorInit {
  method: HttpMethod;
  scheme: string;
  host: string;
  port?: number;
  path: string;
  headers?: HttpHeaders;
  query?: QueryParams;
  fragment?: string;
  body?: Uint8Array;
  cachePolicy?: CachePolicy;
}

/**
 * Builds a frozen descriptor. Headers, query and body are copied so later changes to the
 * caller's objects cannot leak into a request that is already in flight.
 */
export function createRequestDescriptor(init: RequestDescriptorInit): RequestDescriptor {
  const query = init.query && Object.keys(init.query).length > 0 ? Object.freeze({ ...init.query }) : undefined;
  const body = init.body && init.body.length > 0 ? Uint8Array.from(init.body) : undefined;

  return Object.freeze({
    method: init.method,
    scheme: init.scheme,
    host: init.host,
    port: init.port,
    path: init.path,
    headers: Object.freeze({ ...init.headers }),
    query,
    fragment: init.fragment || undefined,
    body,
    cachePolicy: init.cachePolicy ?? 'useProtocolCachePolicy',
  });
}
