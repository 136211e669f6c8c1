import { z } from 'zod';
import type { RawHttpResponse } from './types';

/**
 * Shape a transport reply must have to count as an HTTP response. Status ranges are not
 * checked here; classifying them is the executor's job.
 */
export const rawHttpResponseSchema = z.object({
  status: z.number().int(),
  headers: z.record(z.string()),
  body: z.instanceof(Uint8Array),
});

export const isRawHttpResponse = (value: unknown): value is RawHttpResponse =>
  rawHttpResponseSchema.safeParse(value).success;
