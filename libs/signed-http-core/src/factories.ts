import { loadClientConfigFromEnv } from './config';
import { HttpClient } from './HttpClient';
import type { HttpClientConfig, Logger, LoggerMeta } from './types';

/**
 * Console logger used by the default factories.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta);
  }
}

/**
 * Creates an HttpClient with the defaults most callers want.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Codec: JSON validated with zod
 * - Headers: `Accept` and `Content-Type` set to `application/json`
 * - Logger: console logger
 * - No cache provider
 *
 * @example
 * ```typescript
 * const client = createDefaultHttpClient({ host: 'localhost:8080/api' });
 * const result = await client.get('/health', { decode: asText() });
 * ```
 */
export function createDefaultHttpClient(config: HttpClientConfig): HttpClient {
  return new HttpClient({
    ...config,
    logger: config.logger ?? new ConsoleLogger(),
  });
}

/**
 * Factory function to create a client from `SIGNED_HTTP_*` environment variables.
 *
 * @param overrides - Config that takes precedence over the environment
 * @param env - Defaults to `process.env`
 */
export function createHttpClientFromEnv(
  overrides: Partial<HttpClientConfig> = {},
  env: Record<string, string | undefined> = process.env,
): HttpClient {
  return createDefaultHttpClient({
    ...loadClientConfigFromEnv(env),
    ...overrides,
  });
}
