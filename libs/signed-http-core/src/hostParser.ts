import type { ParsedHost } from './types';

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\//;
const DEFAULT_SCHEME = 'https';

/**
 * Parses a free-form base host into scheme, host, port and base path.
 * Never throws: unusable input yields an empty host, which callers treat as an invalid URL.
 *
 * @example
 * parseHost('https://example.com:8080/api/v1');
 * // { scheme: 'https', host: 'example.com', port: 8080, basePath: '/api/v1' }
 */
export function parseHost(raw: string): ParsedHost {
  const { scheme, rest } = extractScheme(raw);
  const { hostPort, path } = splitHostAndPath(rest);
  const { host, port } = splitHostAndPort(hostPort);
  const basePath = normalizeBasePath(path);
  return Object.freeze(port === undefined ? { scheme, host, basePath } : { scheme, host, port, basePath });
}

function extractScheme(input: string): { scheme: string; rest: string } {
  const match = SCHEME_PATTERN.exec(input);
  if (!match) {
    return { scheme: DEFAULT_SCHEME, rest: input };
  }
  return { scheme: match[1], rest: input.slice(match[0].length) };
}

function splitHostAndPath(input: string): { hostPort: string; path: string } {
  const trimmed = input.trim();
  const slash = trimmed.indexOf('/');
  if (slash === -1) {
    return { hostPort: trimmed, path: '' };
  }
  return { hostPort: trimmed.slice(0, slash), path: trimmed.slice(slash + 1) };
}

/**
 * Malformed port suffixes stay part of the host ("host:8080x" keeps its colon and suffix).
 */
function splitHostAndPort(hostPort: string): { host: string; port?: number } {
  if (hostPort.startsWith('[')) {
    const end = hostPort.indexOf(']');
    if (end !== -1) {
      const literal = hostPort.slice(0, end + 1);
      const remainder = hostPort.slice(end + 1);
      if (remainder === '') {
        return { host: literal };
      }
      const port = remainder.startsWith(':') ? parsePort(remainder.slice(1)) : undefined;
      return port === undefined ? { host: hostPort } : { host: literal, port };
    }
  }

  const colon = hostPort.indexOf(':');
  if (colon === -1) {
    return { host: hostPort };
  }
  const port = parsePort(hostPort.slice(colon + 1));
  return port === undefined ? { host: hostPort } : { host: hostPort.slice(0, colon), port };
}

function parsePort(value: string): number | undefined {
  if (!/^\d+$/.test(value)) {
    return undefined;
  }
  const port = Number(value);
  return Number.isSafeInteger(port) ? port : undefined;
}

function normalizeBasePath(path: string): string {
  const normalized = path.replace(/\/+/g, '/').replace(/^\/+|\/+$/g, '');
  return normalized ? `/${normalized}` : '';
}
