import { digestHex, sign } from './signature';
import { formatAuthority } from './urlComposer';
import type { RequestDescriptor } from './types';

// Lexicographic order over UTF-8 bytes, independent of the JS engine's UTF-16 string order.
const compareBytes = (a: string, b: string): number => Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));

function sortedQuery(query: RequestDescriptor['query']): string {
  return Object.entries(query ?? {})
    .sort(([a], [b]) => compareBytes(a, b))
    .map(([key, value]) => `${key}=${value}`)
    .join('&');
}

function sortedHeaders(headers: RequestDescriptor['headers']): string {
  return Object.entries(headers)
    .map(([key, value]) => [key.toLowerCase(), value] as const)
    .sort(([keyA, valueA], [keyB, valueB]) => compareBytes(keyA, keyB) || compareBytes(valueA, valueB))
    .map(([key, value]) => `${key}:${value}`)
    .join('&');
}

export function hashBody(body: Uint8Array): string {
  return digestHex(body);
}

/**
 * Deterministic text form of a request:
 *
 * ```
 * <METHOD>|<scheme>://<host>[:<port>]<path>[?<sortedQuery>][#<fragment>][|headers:<sortedHeaders>]
 * ```
 *
 * Header and query insertion order never affects the result. The body is left out.
 */
export function canonicalize(descriptor: RequestDescriptor): string {
  let url = `${formatAuthority(descriptor)}${descriptor.path}`;

  const query = sortedQuery(descriptor.query);
  if (query) {
    url += `?${query}`;
  }
  if (descriptor.fragment) {
    url += `#${descriptor.fragment}`;
  }

  const segments = [descriptor.method, url];
  const headers = sortedHeaders(descriptor.headers);
  if (headers) {
    segments.push(`headers:${headers}`);
  }
  return segments.join('|');
}

/**
 * Canonical form used for signing: {@link canonicalize} plus a `|body:<sha256>` segment
 * when the request carries a non-empty body.
 */
export function canonicalizeForSigning(descriptor: RequestDescriptor): string {
  const canonical = canonicalize(descriptor);
  if (!descriptor.body || descriptor.body.length === 0) {
    return canonical;
  }
  return `${canonical}|body:${hashBody(descriptor.body)}`;
}

export interface RequestTrace {
  canonicalString: string;
  signature: string;
}

export function traceRequest(descriptor: RequestDescriptor): RequestTrace {
  return {
    canonicalString: canonicalize(descriptor),
    signature: sign(canonicalizeForSigning(descriptor)),
  };
}
