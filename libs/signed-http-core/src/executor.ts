import { traceRequest } from './canonical';
import type { RequestTrace } from './canonical';
import { mapDecodeError } from './decodeErrors';
import { createRequestDescriptor } from './descriptor';
import { mergeHeaders } from './headers';
import { rawHttpResponseSchema } from './rawResponse';
import { failure, success } from './result';
import type { ExecutionResult, HttpFailure, HttpFailureReason, ResponseMetadata } from './result';
import type {
  CachePolicy,
  Codec,
  HttpHeaders,
  HttpTransport,
  Logger,
  ParsedHost,
  RequestDescriptor,
  RequestOptions,
  ResponseDecoder,
} from './types';
import { composeUrl, joinPaths } from './urlComposer';

/**
 * Read-only client configuration shared by every call.
 */
export interface ClientSettings {
  readonly parsedHost: ParsedHost;
  readonly defaultHeaders: Readonly<HttpHeaders>;
  readonly defaultCachePolicy: CachePolicy;
}

export interface RequestExecutorDeps {
  transport: HttpTransport;
  codec: Codec;
  logger?: Logger;
}

export type PreparedRequest = { ok: true; descriptor: RequestDescriptor } | HttpFailure;

const isSuccessStatus = (status: number): boolean => status >= 200 && status <= 299;

/**
 * Runs one call end to end: compose, encode, describe, sign, send, classify, decode.
 * Every outcome comes back as an {@link ExecutionResult}; nothing is thrown past this class.
 */
export class RequestExecutor {
  constructor(private readonly deps: RequestExecutorDeps) {}

  async run<T>(settings: ClientSettings, options: RequestOptions, decoder: ResponseDecoder<T>): Promise<ExecutionResult<T>> {
    const prepared = await this.prepare(settings, options);
    if (!prepared.ok) {
      return prepared;
    }
    return this.execute(prepared.descriptor, decoder, options.signal);
  }

  /**
   * Builds the descriptor for a call. Failures here happen before any request exists,
   * so they carry an empty canonical string and signature.
   */
  async prepare(settings: ClientSettings, options: RequestOptions): Promise<PreparedRequest> {
    const url = composeUrl(settings.parsedHost, options.path, options.query, options.fragment);
    if (url === undefined) {
      return this.fail({ kind: 'invalidURL' }, options);
    }

    let body: Uint8Array | undefined;
    try {
      body = await this.encodeBody(options.body);
    } catch (error) {
      return this.fail({ kind: 'encoding', cause: error }, options);
    }

    const { scheme, host, port, basePath } = settings.parsedHost;
    const descriptor = createRequestDescriptor({
      method: options.method,
      scheme,
      host,
      port,
      path: joinPaths(basePath, options.path),
      headers: mergeHeaders(settings.defaultHeaders, options.headers),
      query: options.query,
      fragment: options.fragment,
      body,
      cachePolicy: options.cachePolicy ?? settings.defaultCachePolicy,
    });
    return { ok: true, descriptor };
  }

  async execute<T>(
    descriptor: RequestDescriptor,
    decoder: ResponseDecoder<T>,
    signal?: AbortSignal,
  ): Promise<ExecutionResult<T>> {
    const url = composeUrl(
      { scheme: descriptor.scheme, host: descriptor.host, port: descriptor.port, basePath: '' },
      descriptor.path,
      descriptor.query,
      descriptor.fragment,
    );
    if (url === undefined) {
      return this.fail({ kind: 'invalidURL' }, descriptor);
    }

    const trace = traceRequest(descriptor);
    if (signal?.aborted) {
      return this.fail({ kind: 'cancelled', cause: signal.reason }, descriptor, trace);
    }

    this.deps.logger?.debug('http.request.send', { method: descriptor.method, url, signature: trace.signature });

    let raw: unknown;
    try {
      raw = await this.deps.transport(
        {
          method: descriptor.method,
          url,
          headers: { ...descriptor.headers },
          body: descriptor.body,
          cachePolicy: descriptor.cachePolicy,
          signature: trace.signature,
        },
        signal ?? new AbortController().signal,
      );
    } catch (error) {
      if (signal?.aborted) {
        return this.fail({ kind: 'cancelled', cause: signal.reason }, descriptor, trace);
      }
      return this.fail({ kind: 'transport', cause: error }, descriptor, trace);
    }

    if (signal?.aborted) {
      return this.fail({ kind: 'cancelled', cause: signal.reason }, descriptor, trace);
    }

    const parsed = rawHttpResponseSchema.safeParse(raw);
    if (!parsed.success) {
      return this.fail({ kind: 'invalidResponse' }, descriptor, trace);
    }

    const { status, headers, body } = parsed.data;
    const response: ResponseMetadata = { status, headers };
    if (!isSuccessStatus(status)) {
      return this.fail({ kind: 'server', statusCode: status, body }, descriptor, trace, response);
    }

    let value: T;
    try {
      value = decoder.decode(body, this.deps.codec);
    } catch (error) {
      return this.fail(mapDecodeError(error, decoder.typeName), descriptor, trace);
    }

    this.deps.logger?.debug('http.request.succeeded', { status, signature: trace.signature });
    return success(value, response, trace.canonicalString, trace.signature);
  }

  private async encodeBody(body: unknown): Promise<Uint8Array | undefined> {
    if (body === undefined) {
      return undefined;
    }
    if (body instanceof Uint8Array) {
      return body;
    }
    return this.deps.codec.encode(body);
  }

  private fail(
    reason: HttpFailureReason,
    request: { method: string; path: string },
    trace?: RequestTrace,
    response?: ResponseMetadata,
  ): HttpFailure {
    this.deps.logger?.warn('http.request.failed', {
      kind: reason.kind,
      method: request.method,
      path: request.path,
      status: response?.status,
      signature: trace?.signature ?? '',
    });
    return failure(reason, trace, response);
  }
}
