import type { HttpHeaders } from './types';

/**
 * Merges per-call headers over defaults. Keys match case-insensitively and the
 * override's casing is the one that goes out on the wire.
 *
 * @example
 * mergeHeaders({ Accept: 'a' }, { accept: 'b' }) // { accept: 'b' }
 */
export function mergeHeaders(defaults: Readonly<HttpHeaders>, overrides?: Readonly<HttpHeaders>): HttpHeaders {
  const merged = new Map<string, { name: string; value: string }>();
  for (const source of [defaults, overrides]) {
    if (!source) continue;
    for (const [name, value] of Object.entries(source)) {
      merged.set(name.toLowerCase(), { name, value });
    }
  }

  const result: HttpHeaders = {};
  for (const { name, value } of merged.values()) {
    result[name] = value;
  }
  return result;
}

export function findHeader(headers: Readonly<HttpHeaders>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}
