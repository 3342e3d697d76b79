import { describe, it, expect } from 'vitest';

import { base64UrlDecode, base64UrlEncode } from '../../src/crypto/base64url.js';
import { isFieldCryptoError } from '../../src/crypto/errors.js';
import { captureError } from '../helpers/errors.js';

describe('base64url', () => {
  it('should use the URL-safe alphabet with padding', () => {
    expect(base64UrlEncode(Buffer.from([0xfb, 0xff]))).toBe('-_8=');
    expect(base64UrlEncode(Buffer.from('f'))).toBe('Zg==');
    expect(base64UrlEncode(Buffer.alloc(0))).toBe('');
  });

  it('should encode only the bytes of a Uint8Array view', () => {
    const backing = Buffer.from('xxfoo');

    expect(base64UrlEncode(backing.subarray(2))).toBe('Zm9v');
  });

  it('should decode padded base64url', () => {
    expect([...base64UrlDecode('-_8=')]).toEqual([0xfb, 0xff]);
    expect(base64UrlDecode('Zm9v').toString()).toBe('foo');
    expect(base64UrlDecode('').length).toBe(0);
  });

  it.each(['Zg', 'Zm9v+A==', 'Zm9/', 'Zm9v=', 'Z===', 'Zm 9v'])(
    'should reject %j with SERIALIZATION_ERROR',
    input => {
      const error = captureError(() => base64UrlDecode(input));

      expect(isFieldCryptoError(error, 'SERIALIZATION_ERROR')).toBe(true);
    }
  );
});
