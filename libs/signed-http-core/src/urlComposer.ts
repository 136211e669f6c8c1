import type { ParsedHost, QueryParams } from './types';

const trimSegment = (value: string): string => value.replace(/^[\s/]+|[\s/]+$/g, '');

/**
 * Joins a base path and a call path into one absolute path with single slashes.
 *
 * @example
 * joinPaths('/api', '/users/') // '/api/users'
 * joinPaths('', '')            // '/'
 */
export function joinPaths(basePath: string, path: string): string {
  const parts = [trimSegment(basePath), trimSegment(path)].filter((part) => part.length > 0);
  return `/${parts.join('/')}`.replace(/\/{2,}/g, '/');
}

/**
 * Renders `scheme://host[:port]` for a parsed host.
 */
export function formatAuthority(parsed: Pick<ParsedHost, 'scheme' | 'host' | 'port'>): string {
  const port = parsed.port === undefined ? '' : `:${parsed.port}`;
  return `${parsed.scheme}://${parsed.host}${port}`;
}

/**
 * Composes the URL sent to the transport. Query pairs keep their insertion order here;
 * only the canonical form sorts them.
 *
 * @returns the URL, or `undefined` when the parsed host is empty
 */
export function composeUrl(
  parsed: ParsedHost,
  path: string,
  query?: Readonly<QueryParams>,
  fragment?: string,
): string | undefined {
  if (!parsed.host) {
    return undefined;
  }

  let url = `${formatAuthority(parsed)}${joinPaths(parsed.basePath, path)}`;

  const pairs = Object.entries(query ?? {});
  if (pairs.length > 0) {
    url += `?${pairs.map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`).join('&')}`;
  }

  if (fragment) {
    url += `#${fragment}`;
  }

  return url;
}
