import type { BlindIndexHasher } from '../crypto/blind-index.js';
import { FieldCryptoError } from '../crypto/errors.js';
import type { FieldCipher } from '../crypto/field-cipher.js';

/**
 * Value written to a binary column for an encrypted field.
 */
export function toStorageValue(cipher: FieldCipher, plaintext: string): Buffer {
  if (plaintext === '') {
    return Buffer.alloc(0);
  }
  return cipher.encrypt(plaintext);
}

/**
 * Decrypts a value read back from a binary column. Anything other than a
 * byte sequence is rejected.
 */
export function fromStorageValue(cipher: FieldCipher, src: unknown): string {
  if (!(src instanceof Uint8Array)) {
    throw new FieldCryptoError(
      `Expected stored encrypted value to be bytes, got ${describe(src)}`,
      'SOURCE_TYPE_MISMATCH'
    );
  }

  if (src.length === 0) {
    return '';
  }
  return cipher.decrypt(src);
}

/**
 * Value written to a text column for a blind-indexed field.
 */
export function blindIndexStorageValue(hasher: BlindIndexHasher, plaintext: string): string {
  if (plaintext === '') {
    return '';
  }
  return hasher.encodeText(plaintext);
}

function describe(value: unknown): string {
  return typeof value === 'object' ? Object.prototype.toString.call(value) : typeof value;
}
