import { createHash } from 'crypto';

/**
 * Digest used for every signature and body hash. Changing it invalidates every stored signature.
 */
export const SIGNATURE_ALGORITHM = 'sha256';

export function digestHex(data: string | Uint8Array): string {
  return createHash(SIGNATURE_ALGORITHM).update(data).digest('hex');
}

/**
 * Signs a canonical request string.
 * An empty canonical string means no request was built, so it signs to "" rather than a digest.
 */
export function sign(canonical: string): string {
  if (canonical === '') {
    return '';
  }
  return digestHex(canonical);
}
