import type { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string>;

/**
 * How the transport should treat locally cached responses.
 * The core never interprets this value; it forwards it on every transport request.
 */
export type CachePolicy =
  | 'useProtocolCachePolicy'
  | 'reloadIgnoringCacheData'
  | 'returnCacheDataElseLoad'
  | 'returnCacheDataDontLoad';

export const CACHE_POLICIES = [
  'useProtocolCachePolicy',
  'reloadIgnoringCacheData',
  'returnCacheDataElseLoad',
  'returnCacheDataDontLoad',
] as const satisfies readonly CachePolicy[];

/**
 * Base host split into its parts.
 * `basePath` is either "" or starts with exactly one "/" and never ends with "/".
 */
export interface ParsedHost {
  readonly scheme: string;
  readonly host: string;
  readonly port?: number;
  readonly basePath: string;
}

/**
 * Fully resolved, immutable representation of one HTTP call before it is sent.
 * `path` already includes the client's base path.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly scheme: string;
  readonly host: string;
  readonly port?: number;
  readonly path: string;
  readonly headers: Readonly<HttpHeaders>;
  readonly query?: Readonly<QueryParams>;
  readonly fragment?: string;
  readonly body?: Uint8Array;
  readonly cachePolicy: CachePolicy;
}

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Request handed to the transport provider.
 * `signature` identifies the request and is what cache providers key on.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: Uint8Array;
  cachePolicy: CachePolicy;
  signature: string;
}

/**
 * Raw HTTP response returned by a transport provider.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

/**
 * Transport provider capability: connection, TLS, redirects and retries all live behind it.
 * Takes a transport request and abort signal, returns a raw HTTP response or rejects.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * Codec capability used to encode request bodies and decode structured payloads.
 * `decode` throws a `CodecParseError` describing where the payload did not fit the schema.
 */
export interface Codec {
  encode(value: unknown): Uint8Array | Promise<Uint8Array>;
  decode<S extends z.ZodTypeAny>(bytes: Uint8Array, schema: S): z.output<S>;
}

/**
 * Turns a successful response body into the caller's value. Throwing marks a decode failure.
 */
export interface ResponseDecoder<T> {
  readonly typeName: string;
  decode(body: Uint8Array, codec: Codec): T;
}

export interface HttpCacheEntry<T = unknown> {
  value: T;
  expiresAt: number; // epoch millis
}

export interface HttpCache {
  get<T = unknown>(key: string): Promise<HttpCacheEntry<T> | undefined>;
  set<T = unknown>(key: string, entry: HttpCacheEntry<T>): Promise<void>;
  delete?(key: string): Promise<void>;
  clear?(): Promise<void>;
}

export interface HttpClientConfig {
  /** Free-form base host, e.g. "api.example.com" or "http://localhost:8080/api/v1". */
  host: string;
  /** Overrides any port parsed from `host`. */
  port?: number;
  defaultHeaders?: HttpHeaders;
  defaultCachePolicy?: CachePolicy;
  transport?: HttpTransport;
  codec?: Codec;
  cache?: HttpCache;
  logger?: Logger;
}

export interface CallOptions {
  headers?: HttpHeaders;
  query?: QueryParams;
  fragment?: string;
  cachePolicy?: CachePolicy;
  signal?: AbortSignal;
}

export interface BodyCallOptions extends CallOptions {
  /** `Uint8Array` is sent as-is; any other defined value goes through the codec. */
  body?: unknown;
}

export interface DecodeOption<T> {
  decode: ResponseDecoder<T>;
}

export interface RequestOptions extends BodyCallOptions {
  method: HttpMethod;
  path: string;
}
