import type { z } from 'zod';
import type { ResponseDecoder } from './types';

const bytesDecoder: ResponseDecoder<Uint8Array> = {
  typeName: 'Bytes',
  decode: (body) => body,
};

const textDecoder: ResponseDecoder<string> = {
  typeName: 'String',
  decode: (body) => new TextDecoder().decode(body),
};

/** Hands back the response body untouched. */
export function asBytes(): ResponseDecoder<Uint8Array> {
  return bytesDecoder;
}

/** Decodes the response body as UTF-8 text. */
export function asText(): ResponseDecoder<string> {
  return textDecoder;
}

/**
 * Parses the response body with the client's codec and validates it against `schema`.
 * `typeName` is reported in decoding failures; it defaults to the schema's description.
 *
 * @example
 * const Person = z.object({ name: z.string(), age: z.number() });
 * const result = await client.get('/people/1', { decode: asJson(Person, 'Person') });
 */
export function asJson<S extends z.ZodTypeAny>(schema: S, typeName?: string): ResponseDecoder<z.output<S>> {
  return {
    typeName: typeName ?? schema.description ?? 'Response',
    decode: (body, codec) => codec.decode(body, schema),
  };
}
