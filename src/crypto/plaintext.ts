import { FieldCryptoError } from './errors.js';

// Matches a surrogate code unit that is not part of a valid pair
const LONE_SURROGATE = /\p{Surrogate}/u;

/**
 * UTF-8 bytes of `plaintext`. Strings holding a lone surrogate are rejected:
 * UTF-8 cannot represent them, and encoding would replace them with U+FFFD.
 */
export function plaintextBytes(plaintext: string): Buffer {
  if (LONE_SURROGATE.test(plaintext)) {
    throw new FieldCryptoError('Plaintext is not well-formed UTF-16', 'MALFORMED_PLAINTEXT');
  }
  return Buffer.from(plaintext, 'utf8');
}
