export * from './types';
export * from './result';
export * from './errors';
export { HttpClient, DEFAULT_HEADERS } from './HttpClient';
export type { HttpClientLike } from './HttpClient';
export { RequestExecutor } from './executor';
export type { ClientSettings, PreparedRequest, RequestExecutorDeps } from './executor';
export { ConsoleLogger, createDefaultHttpClient, createHttpClientFromEnv } from './factories';
export { loadClientConfigFromEnv } from './config';
export type { EnvClientConfig } from './config';
export { parseHost } from './hostParser';
export { composeUrl, joinPaths, formatAuthority } from './urlComposer';
export { mergeHeaders, findHeader } from './headers';
export { canonicalize, canonicalizeForSigning, hashBody, traceRequest } from './canonical';
export type { RequestTrace } from './canonical';
export { SIGNATURE_ALGORITHM, digestHex, sign } from './signature';
export { createRequestDescriptor } from './descriptor';
export type { RequestDescriptorInit } from './descriptor';
export { ROOT_FIELD_PATH, mapKeyPath, mapDecodeError } from './decodeErrors';
export { asBytes, asText, asJson } from './decoders';
export { JsonCodec, jsonCodec, parseErrorFromZod } from './codec/jsonCodec';
export { InMemoryHttpCache } from './cache/InMemoryHttpCache';
export type { InMemoryHttpCacheOptions } from './cache/InMemoryHttpCache';
export { createCachingTransport } from './cache/cachingTransport';
export type { CachingTransportOptions } from './cache/cachingTransport';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
