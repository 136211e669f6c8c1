import { setTimeout as sleep } from 'timers/promises';
import {
  asBytes,
  failure,
  jsonCodec,
  mapDecodeError,
  sign,
  success,
} from '@signed-http/core';
import type {
  BodyCallOptions,
  CachePolicy,
  CallOptions,
  Codec,
  DecodeOption,
  ExecutionResult,
  HttpClientLike,
  HttpFailureReason,
  HttpHeaders,
  HttpMethod,
  QueryParams,
  RequestOptions,
  ResponseDecoder,
  ResponseMetadata,
} from '@signed-http/core';

/**
 * One call as seen by the mock, in the order calls were made.
 */
export interface RecordedCall {
  method: HttpMethod;
  path: string;
  headers: HttpHeaders;
  query?: QueryParams;
  fragment?: string;
  cachePolicy: CachePolicy;
  hadBody: boolean;
}

export interface StubOptions {
  statusCode?: number;
  headers?: HttpHeaders;
  /** Milliseconds to wait before resolving. */
  delay?: number;
}

type Stub =
  | { type: 'response'; body: Uint8Array; statusCode: number; headers: HttpHeaders; delay: number }
  | { type: 'failure'; reason: HttpFailureReason; delay: number };

type SendOptions<T> = BodyCallOptions & Partial<DecodeOption<T>>;

const stubKey = (method: HttpMethod, path: string): string => `${method} ${path}`;

const toBytes = (response: unknown): Uint8Array => {
  if (response instanceof Uint8Array) {
    return Uint8Array.from(response);
  }
  if (typeof response === 'string') {
    return new TextEncoder().encode(response);
  }
  return new TextEncoder().encode(JSON.stringify(response) ?? '');
};

/**
 * In-memory stand-in for `HttpClient` that returns stubbed results and records every call.
 *
 * Stubs are matched on the literal method and path only. A call with no matching stub
 * resolves to an `invalidURL` failure. Stubbed results carry `"<METHOD> <path>"` as their
 * canonical string, signed the same way the real client signs requests.
 *
 * @example
 * ```typescript
 * const mock = new MockHttpClient();
 * mock.stub('GET', '/users/1', { id: 1, name: 'Ada' });
 * const result = await mock.get('/users/1', { decode: asJson(User) });
 * expect(mock.callCount('GET', '/users/1')).toBe(1);
 * ```
 */
export class MockHttpClient implements HttpClientLike {
  private readonly stubs = new Map<string, Stub>();
  private readonly calls: RecordedCall[] = [];
  private readonly codec: Codec;

  constructor(options: { codec?: Codec } = {}) {
    this.codec = options.codec ?? jsonCodec;
  }

  /**
   * Registers a response for `method` + `path`. Strings are sent as UTF-8, `Uint8Array` as-is,
   * anything else as JSON. A `statusCode` outside 200-299 produces a `server` failure.
   */
  stub(method: HttpMethod, path: string, response: unknown, options: StubOptions = {}): void {
    this.stubs.set(stubKey(method, path), {
      type: 'response',
      body: toBytes(response),
      statusCode: options.statusCode ?? 200,
      headers: { ...options.headers },
      delay: options.delay ?? 0,
    });
  }

  stubFailure(method: HttpMethod, path: string, reason: HttpFailureReason, options: { delay?: number } = {}): void {
    this.stubs.set(stubKey(method, path), { type: 'failure', reason, delay: options.delay ?? 0 });
  }

  /** Copies of every call so far, oldest first. */
  recordedCalls(): readonly RecordedCall[] {
    return this.calls.map((call) => ({ ...call }));
  }

  /**
   * Number of recorded calls matching the given method and path; either filter may be omitted.
   */
  callCount(method?: HttpMethod, path?: string): number {
    return this.calls.filter(
      (call) => (method === undefined || call.method === method) && (path === undefined || call.path === path),
    ).length;
  }

  wasCalled(method: HttpMethod, path: string): boolean {
    return this.callCount(method, path) > 0;
  }

  /** Drops every stub and recorded call. */
  reset(): void {
    this.stubs.clear();
    this.calls.length = 0;
  }

  request(options: RequestOptions): Promise<ExecutionResult<Uint8Array>>;
  request<T>(options: RequestOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;
  request<T>(options: RequestOptions & Partial<DecodeOption<T>>): Promise<ExecutionResult<T | Uint8Array>> {
    return this.send(options.method, options.path, options);
  }

  get(path: string, options?: CallOptions): Promise<ExecutionResult<Uint8Array>>;
  get<T>(path: string, options: CallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;
  get<T>(path: string, options: CallOptions & Partial<DecodeOption<T>> = {}): Promise<ExecutionResult<T | Uint8Array>> {
    return this.send('GET', path, options);
  }

  post(path: string, options?: BodyCallOptions): Promise<ExecutionResult<Uint8Array>>;
  post<T>(path: string, options: BodyCallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;
  post<T>(path: string, options: SendOptions<T> = {}): Promise<ExecutionResult<T | Uint8Array>> {
    return this.send('POST', path, options);
  }

  put(path: string, options?: BodyCallOptions): Promise<ExecutionResult<Uint8Array>>;
  put<T>(path: string, options: BodyCallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;
  put<T>(path: string, options: SendOptions<T> = {}): Promise<ExecutionResult<T | Uint8Array>> {
    return this.send('PUT', path, options);
  }

  patch(path: string, options?: BodyCallOptions): Promise<ExecutionResult<Uint8Array>>;
  patch<T>(path: string, options: BodyCallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;
  patch<T>(path: string, options: SendOptions<T> = {}): Promise<ExecutionResult<T | Uint8Array>> {
    return this.send('PATCH', path, options);
  }

  delete(path: string, options?: BodyCallOptions): Promise<ExecutionResult<Uint8Array>>;
  delete<T>(path: string, options: BodyCallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;
  delete<T>(path: string, options: SendOptions<T> = {}): Promise<ExecutionResult<T | Uint8Array>> {
    return this.send('DELETE', path, options);
  }

  // Everything before the first await runs synchronously, so the call log and stub lookup
  // are never interleaved with another call.
  private async send<T>(
    method: HttpMethod,
    path: string,
    options: SendOptions<T>,
  ): Promise<ExecutionResult<T | Uint8Array>> {
    this.calls.push({
      method,
      path,
      headers: { ...options.headers },
      query: options.query ? { ...options.query } : undefined,
      fragment: options.fragment,
      cachePolicy: options.cachePolicy ?? 'useProtocolCachePolicy',
      hadBody: options.body !== undefined,
    });

    const stub = this.stubs.get(stubKey(method, path));
    if (!stub) {
      return failure({ kind: 'invalidURL' });
    }

    const canonicalString = stubKey(method, path);
    const trace = { canonicalString, signature: sign(canonicalString) };
    const { signal } = options;

    try {
      if (stub.delay > 0) {
        await sleep(stub.delay, undefined, { signal });
      }
    } catch (error) {
      return failure({ kind: 'cancelled', cause: error }, trace);
    }
    if (signal?.aborted) {
      return failure({ kind: 'cancelled', cause: signal.reason }, trace);
    }

    if (stub.type === 'failure') {
      return failure(stub.reason, trace);
    }

    const response: ResponseMetadata = { status: stub.statusCode, headers: { ...stub.headers } };
    if (stub.statusCode < 200 || stub.statusCode > 299) {
      return failure({ kind: 'server', statusCode: stub.statusCode, body: Uint8Array.from(stub.body) }, trace, response);
    }

    const decoder: ResponseDecoder<T | Uint8Array> = options.decode ?? asBytes();
    try {
      const value = decoder.decode(Uint8Array.from(stub.body), this.codec);
      return success(value, response, trace.canonicalString, trace.signature);
    } catch (error) {
      return failure(mapDecodeError(error, decoder.typeName), trace);
    }
  }
}
