import { createCachingTransport } from './cache/cachingTransport';
import { jsonCodec } from './codec/jsonCodec';
import { asBytes } from './decoders';
import { RequestExecutor } from './executor';
import type { ClientSettings, PreparedRequest } from './executor';
import { parseHost } from './hostParser';
import type { ExecutionResult } from './result';
import { fetchTransport } from './transport/fetchTransport';
import type {
  BodyCallOptions,
  CallOptions,
  DecodeOption,
  HttpCache,
  HttpClientConfig,
  HttpHeaders,
  HttpMethod,
  ParsedHost,
  RequestDescriptor,
  RequestOptions,
  ResponseDecoder,
} from './types';

export const DEFAULT_HEADERS: Readonly<HttpHeaders> = Object.freeze({
  Accept: 'application/json',
  'Content-Type': 'application/json',
});

/**
 * Call surface shared by {@link HttpClient} and test doubles.
 * Without a `decode` option a call resolves to the raw response bytes.
 */
export interface HttpClientLike {
  request(options: RequestOptions): Promise<ExecutionResult<Uint8Array>>;
  request<T>(options: RequestOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;

  get(path: string, options?: CallOptions): Promise<ExecutionResult<Uint8Array>>;
  get<T>(path: string, options: CallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;

  post(path: string, options?: BodyCallOptions): Promise<ExecutionResult<Uint8Array>>;
  post<T>(path: string, options: BodyCallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;

  put(path: string, options?: BodyCallOptions): Promise<ExecutionResult<Uint8Array>>;
  put<T>(path: string, options: BodyCallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;

  patch(path: string, options?: BodyCallOptions): Promise<ExecutionResult<Uint8Array>>;
  patch<T>(path: string, options: BodyCallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;

  delete(path: string, options?: BodyCallOptions): Promise<ExecutionResult<Uint8Array>>;
  delete<T>(path: string, options: BodyCallOptions & DecodeOption<T>): Promise<ExecutionResult<T>>;
}

type SendOptions<T> = BodyCallOptions & Partial<DecodeOption<T>>;

/**
 * HTTP client bound to one base host.
 *
 * Configuration is parsed and frozen at construction; every call builds its own descriptor,
 * so a single client can serve any number of concurrent calls.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({ host: 'https://api.example.com/v1' });
 * const result = await client.get('/users/42', { decode: asJson(User, 'User') });
 * if (result.ok) {
 *   console.log(result.value.name, result.signature);
 * } else {
 *   console.warn(describeFailure(result.error));
 * }
 * ```
 */
export class HttpClient implements HttpClientLike {
  readonly settings: ClientSettings;
  private readonly executor: RequestExecutor;
  private readonly cache?: HttpCache;

  constructor(config: HttpClientConfig) {
    const parsed = parseHost(config.host);
    const port = config.port ?? parsed.port;

    this.settings = Object.freeze({
      parsedHost: Object.freeze({ ...parsed, port }),
      defaultHeaders: Object.freeze({ ...(config.defaultHeaders ?? DEFAULT_HEADERS) }),
      defaultCachePolicy: config.defaultCachePolicy ?? 'useProtocolCachePolicy',
    });

    const transport = config.transport ?? fetchTransport;
    this.cache = config.cache;
    this.executor = new RequestExecutor({
      transport: config.cache ? createCachingTransport(transport, config.cache, { logger: config.logger }) : transport,
      codec: config.codec ?? jsonCodec,
      logger: config.logger,
    });
  }

  get parsedHost(): ParsedHost {
    return this.settings.parsedHost;
  }

  /**
   * Builds the descriptor for a call without sending it.
   */
  buildRequest(options: RequestOptions): Promise<PreparedRequest> {
    return this.executor.prepare(this.settings, options);
  }

  /**
   * Sends a descriptor produced by {@link buildRequest}. Without a decoder the body is returned as bytes.
   */
  execute(descriptor: RequestDescriptor, decoder?: undefined, signal?: AbortSignal): Promise<ExecutionResult<Uint8Array>>;
  execute<T>(descriptor: RequestDescriptor, decoder: ResponseDecoder<T>, signal?: AbortSignal): Promise<ExecutionResult<T>>;
  execute<T>(
    descriptor: RequestDescriptor,
    decoder?: ResponseDecoder<T>,
    signal?: AbortSignal,
  ): Promise<ExecutionResult<T | Uint8Array>> {
    const resolved: ResponseDecoder<T | Uint8Array> = decoder ?? asBytes();
    return this.executor.execute(descriptor, resolved, signal);
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

  /**
   * Empties the configured cache provider, if it supports clearing.
   */
  async clearCache(): Promise<void> {
    await this.cache?.clear?.();
  }

  private send<T>(method: HttpMethod, path: string, options: SendOptions<T>): Promise<ExecutionResult<T | Uint8Array>> {
    const { decode, headers, query, fragment, cachePolicy, signal, body } = options;
    const decoder: ResponseDecoder<T | Uint8Array> = decode ?? asBytes();
    return this.executor.run(this.settings, { method, path, headers, query, fragment, cachePolicy, signal, body }, decoder);
  }
}
