import { describe, expect, it } from 'vitest';
import { SIGNATURE_ALGORITHM, digestHex, sign } from '../signature';

describe('sign', () => {
  it('signs the empty canonical string as the empty string', () => {
    expect(sign('')).toBe('');
  });

  it('produces the lower-case hex sha256 digest of the input', () => {
    expect(SIGNATURE_ALGORITHM).toBe('sha256');
    expect(sign('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('is deterministic and sensitive to every character', () => {
    expect(sign('GET|https://example.com/')).toBe(sign('GET|https://example.com/'));
    expect(sign('GET|https://example.com/')).not.toBe(sign('GET|https://example.com/a'));
    expect(sign('abc')).toHaveLength(64);
  });
});

describe('digestHex', () => {
  it('hashes strings and their UTF-8 bytes identically', () => {
    expect(digestHex(new TextEncoder().encode('abc'))).toBe(digestHex('abc'));
  });
});
