import { describeFailure } from './result';
import type { ExecutionResult, HttpFailure, HttpFailureReason, ResponseMetadata } from './result';

/**
 * Thrown form of a failed `ExecutionResult`, for callers that prefer exceptions.
 */
export class HttpResultError extends Error {
  readonly reason: HttpFailureReason;
  readonly response?: ResponseMetadata;
  readonly canonicalString: string;
  readonly signature: string;

  constructor(failed: HttpFailure) {
    super(describeFailure(failed.error));
    this.name = 'HttpResultError';
    this.reason = failed.error;
    this.response = failed.response;
    this.canonicalString = failed.canonicalString;
    this.signature = failed.signature;
  }

  get kind(): HttpFailureReason['kind'] {
    return this.reason.kind;
  }
}

export function unwrapResult<T>(result: ExecutionResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new HttpResultError(result);
}

export class CodecEncodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CodecEncodeError';
  }
}

/**
 * Shape of a payload parse failure.
 *
 * - `keyNotFound`: a required key is absent; `codingPath` is the container, `key` the missing name
 * - `typeMismatch`: the value at `codingPath` has the wrong type
 * - `valueNotFound`: the value at `codingPath` is null where a value is required
 * - `dataCorrupted`: the bytes or the value at `codingPath` could not be interpreted
 */
export type ParseErrorShape = 'keyNotFound' | 'typeMismatch' | 'valueNotFound' | 'dataCorrupted';

export class CodecParseError extends Error {
  readonly shape: ParseErrorShape;
  readonly codingPath: readonly string[];
  readonly key?: string;

  constructor(options: {
    shape: ParseErrorShape;
    message: string;
    codingPath?: readonly string[];
    key?: string;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'CodecParseError';
    this.shape = options.shape;
    this.codingPath = options.codingPath ?? [];
    this.key = options.key;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid client configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class CacheMissError extends Error {
  readonly signature: string;

  constructor(signature: string) {
    super(`No cached response for request ${signature}`);
    this.name = 'CacheMissError';
    this.signature = signature;
  }
}
