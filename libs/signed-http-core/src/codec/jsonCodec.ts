import type { z } from 'zod';
import { CodecEncodeError, CodecParseError } from '../errors';
import type { Codec } from '../types';

const pathOf = (path: ReadonlyArray<string | number>): string[] => path.map((segment) => String(segment));

/**
 * Classifies the first zod issue into one of the four parse error shapes.
 */
export function parseErrorFromZod(error: z.ZodError): CodecParseError {
  const issue = error.issues[0];
  if (!issue) {
    return new CodecParseError({ shape: 'dataCorrupted', message: error.message, cause: error });
  }

  const codingPath = pathOf(issue.path);

  if (issue.code === 'invalid_type') {
    if (issue.received === 'undefined' && codingPath.length > 0) {
      return new CodecParseError({
        shape: 'keyNotFound',
        message: `No value associated with key '${codingPath[codingPath.length - 1]}'`,
        codingPath: codingPath.slice(0, -1),
        key: codingPath[codingPath.length - 1],
        cause: error,
      });
    }
    if (issue.received === 'null' || issue.received === 'undefined') {
      return new CodecParseError({
        shape: 'valueNotFound',
        message: `Expected ${issue.expected} but found null`,
        codingPath,
        cause: error,
      });
    }
    return new CodecParseError({
      shape: 'typeMismatch',
      message: `Expected ${issue.expected} but found ${issue.received}`,
      codingPath,
      cause: error,
    });
  }

  return new CodecParseError({ shape: 'dataCorrupted', message: issue.message, codingPath, cause: error });
}

/**
 * JSON codec: UTF-8 JSON on the wire, zod schemas for the target type.
 */
export class JsonCodec implements Codec {
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  encode(value: unknown): Uint8Array {
    let text: string | undefined;
    try {
      text = JSON.stringify(value);
    } catch (error) {
      throw new CodecEncodeError(error instanceof Error ? error.message : 'Value could not be serialized', {
        cause: error,
      });
    }
    if (text === undefined) {
      throw new CodecEncodeError(`Value of type ${typeof value} has no JSON representation`);
    }
    return this.encoder.encode(text);
  }

  decode<S extends z.ZodTypeAny>(bytes: Uint8Array, schema: S): z.output<S> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.decoder.decode(bytes));
    } catch (error) {
      throw new CodecParseError({
        shape: 'dataCorrupted',
        message: `The given data was not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw parseErrorFromZod(result.error);
    }
    return result.data;
  }
}

export const jsonCodec: Codec = new JsonCodec();
