import { CodecParseError } from './errors';
import type { HttpFailureReason } from './result';

export const ROOT_FIELD_PATH = 'root';

/**
 * Extracts the dotted field path at which a payload failed to decode.
 *
 * A missing key reports the path down to and including the key itself. Type mismatches,
 * nulls and corrupted values report the path of the offending value. Anything that is not
 * a classified parse error maps to `"root"`.
 */
export function mapKeyPath(error: unknown): string {
  if (!(error instanceof CodecParseError)) {
    return ROOT_FIELD_PATH;
  }

  switch (error.shape) {
    case 'keyNotFound':
      return [...error.codingPath, ...(error.key === undefined ? [] : [error.key])].join('.');
    case 'typeMismatch':
    case 'valueNotFound':
    case 'dataCorrupted':
      return error.codingPath.join('.');
    default:
      return ROOT_FIELD_PATH;
  }
}

export function mapDecodeError(
  error: unknown,
  typeName: string,
): Extract<HttpFailureReason, { kind: 'decoding' }> {
  return { kind: 'decoding', typeName, fieldPath: mapKeyPath(error), cause: error };
}
