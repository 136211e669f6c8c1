import type { HttpHeaders } from './types';

/**
 * Status line and headers of the response a result was built from.
 */
export interface ResponseMetadata {
  status: number;
  headers: HttpHeaders;
}

/**
 * Why a call failed. Callers are expected to branch on `kind`.
 *
 * - `invalidURL`: the base host was unusable, so no request was built
 * - `server`: the response status was outside 200–299
 * - `invalidResponse`: the transport returned something that is not an HTTP response
 * - `transport`: connection, DNS or timeout failure raised by the transport provider
 * - `encoding`: the request body could not be serialized
 * - `decoding`: the response body did not fit the requested type
 * - `cancelled`: the call's AbortSignal fired before a response was processed
 */
export type HttpFailureReason =
  | { kind: 'invalidURL' }
  | { kind: 'server'; statusCode: number; body?: Uint8Array }
  | { kind: 'invalidResponse' }
  | { kind: 'transport'; cause: unknown }
  | { kind: 'encoding'; cause: unknown }
  | { kind: 'decoding'; typeName: string; fieldPath: string; cause: unknown }
  | { kind: 'cancelled'; cause?: unknown };

export type HttpFailureKind = HttpFailureReason['kind'];

export interface HttpSuccess<T> {
  readonly ok: true;
  readonly value: T;
  readonly response: ResponseMetadata;
  readonly canonicalString: string;
  readonly signature: string;
}

/**
 * `canonicalString` and `signature` are "" when the call failed before a descriptor existed.
 */
export interface HttpFailure {
  readonly ok: false;
  readonly error: HttpFailureReason;
  readonly response?: ResponseMetadata;
  readonly canonicalString: string;
  readonly signature: string;
}

export type ExecutionResult<T> = HttpSuccess<T> | HttpFailure;

export function success<T>(
  value: T,
  response: ResponseMetadata,
  canonicalString: string,
  signature: string,
): HttpSuccess<T> {
  return Object.freeze({ ok: true as const, value, response, canonicalString, signature });
}

export function failure(
  error: HttpFailureReason,
  trace: { canonicalString: string; signature: string } = { canonicalString: '', signature: '' },
  response?: ResponseMetadata,
): HttpFailure {
  return Object.freeze({
    ok: false as const,
    error,
    response,
    canonicalString: trace.canonicalString,
    signature: trace.signature,
  });
}

const causeMessage = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

export function describeFailure(reason: HttpFailureReason): string {
  switch (reason.kind) {
    case 'invalidURL':
      return 'Invalid URL';
    case 'server': {
      const text = reason.body && reason.body.length > 0 ? new TextDecoder().decode(reason.body) : '';
      return text
        ? `Server returned status code ${reason.statusCode} with body:\n${text}`
        : `Server returned status code ${reason.statusCode}`;
    }
    case 'invalidResponse':
      return 'Invalid or unexpected response from server';
    case 'transport':
      return `Transport error: ${causeMessage(reason.cause)}`;
    case 'encoding':
      return `Encoding error: ${causeMessage(reason.cause)}`;
    case 'decoding':
      return `Decoding failed in '${reason.typeName}' for key '${reason.fieldPath}': ${causeMessage(reason.cause)}`;
    case 'cancelled':
      return 'Request was cancelled';
  }
}
