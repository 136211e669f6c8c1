import { z } from 'zod';
import { ConfigError } from './errors';
import { CACHE_POLICIES } from './types';
import type { HttpClientConfig } from './types';

export type EnvClientConfig = Pick<HttpClientConfig, 'host' | 'port' | 'defaultHeaders' | 'defaultCachePolicy'>;

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const jsonObject = z.string().transform((raw, ctx): unknown => {
  try {
    return JSON.parse(raw);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    });
    return z.NEVER;
  }
});

const envSchema = z.object({
  SIGNED_HTTP_HOST: z.string({ required_error: 'required' }).trim().min(1, 'required'),
  SIGNED_HTTP_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).optional()),
  SIGNED_HTTP_CACHE_POLICY: z.preprocess(emptyToUndefined, z.enum(CACHE_POLICIES).optional()),
  SIGNED_HTTP_DEFAULT_HEADERS: z.preprocess(emptyToUndefined, jsonObject.pipe(z.record(z.string())).optional()),
});

/**
 * Reads client settings from environment variables.
 *
 * - `SIGNED_HTTP_HOST` (required): base host, e.g. `https://api.example.com/v1`
 * - `SIGNED_HTTP_PORT`: port override, 0-65535
 * - `SIGNED_HTTP_CACHE_POLICY`: one of the cache policy names
 * - `SIGNED_HTTP_DEFAULT_HEADERS`: JSON object of string header values
 *
 * Blank values count as unset.
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadClientConfigFromEnv(env: Record<string, string | undefined> = process.env): EnvClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    host: vars.SIGNED_HTTP_HOST,
    port: vars.SIGNED_HTTP_PORT,
    defaultHeaders: vars.SIGNED_HTTP_DEFAULT_HEADERS,
    defaultCachePolicy: vars.SIGNED_HTTP_CACHE_POLICY,
  };
}
