/**
 * JSON serialization for encrypted fields
 *
 * An encrypted field travels through JSON as a string literal holding the
 * padded base64url encoding of its ciphertext, e.g. "AK3f...==".
 */

import { z } from 'zod';

import { base64UrlDecode, base64UrlEncode } from '../crypto/base64url.js';
import { FieldCryptoError, isFieldCryptoError } from '../crypto/errors.js';
import type { FieldCipher } from '../crypto/field-cipher.js';

/**
 * Encrypts and returns the quoted JSON literal.
 */
export function serializeEncrypted(cipher: FieldCipher, plaintext: string): string {
  return JSON.stringify(base64UrlEncode(cipher.encrypt(plaintext)));
}

/**
 * Reverses `serializeEncrypted`. `text` must be a quoted JSON string literal.
 */
export function deserializeEncrypted(cipher: FieldCipher, text: string): string {
  if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) {
    throw new FieldCryptoError('Encrypted value must be a JSON string literal', 'SERIALIZATION_ERROR');
  }

  return cipher.decrypt(base64UrlDecode(text.slice(1, -1)));
}

/**
 * Plaintext wrapper that encrypts itself when passed through JSON.stringify.
 */
export class EncryptedString {
  constructor(
    readonly value: string,
    private readonly cipher: FieldCipher
  ) {}

  static fromJSON(cipher: FieldCipher, encoded: string): EncryptedString {
    return new EncryptedString(cipher.decrypt(base64UrlDecode(encoded)), cipher);
  }

  toJSON(): string {
    return base64UrlEncode(this.cipher.encrypt(this.value));
  }

  toString(): string {
    return '[EncryptedString]';
  }
}

/**
 * Zod schema for a JSON field holding an encrypted value; parses to the
 * plaintext. Decoding and authentication failures become validation issues.
 */
export function encryptedStringSchema(cipher: FieldCipher) {
  return z.string().transform((encoded, ctx) => {
    try {
      return cipher.decrypt(base64UrlDecode(encoded));
    } catch (error) {
      if (!isFieldCryptoError(error)) {
        throw error;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error.message,
        params: { code: error.code }
      });
      return z.NEVER;
    }
  });
}
