import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';

import {
  EncryptedString,
  deserializeEncrypted,
  encryptedStringSchema,
  serializeEncrypted
} from '../../src/adapters/json.js';
import { base64UrlEncode } from '../../src/crypto/base64url.js';
import { isFieldCryptoError } from '../../src/crypto/errors.js';
import { FieldCipher } from '../../src/crypto/field-cipher.js';
import { captureError } from '../helpers/errors.js';
import { createTestRegistry } from '../helpers/keys.js';

describe('JSON adapter', () => {
  let cipher: FieldCipher;

  beforeEach(() => {
    cipher = new FieldCipher(createTestRegistry(), { logger: { warn: vi.fn() } });
  });

  describe('serializeEncrypted/deserializeEncrypted', () => {
    it('should emit a quoted base64url literal', () => {
      const text = serializeEncrypted(cipher, 'Hello World');

      // 40 ciphertext bytes -> 56 base64 characters, plus quotes
      expect(text).toMatch(/^"[A-Za-z0-9_-]{54}=="$/);
      expect(deserializeEncrypted(cipher, text)).toBe('Hello World');
    });

    it('should round-trip the empty string as an empty literal', () => {
      const text = serializeEncrypted(cipher, '');

      expect(text).toBe('""');
      expect(deserializeEncrypted(cipher, text)).toBe('');
    });

    it('should read what JSON.stringify produced for the encoded value', () => {
      const encoded = base64UrlEncode(cipher.encrypt('from JSON'));

      expect(deserializeEncrypted(cipher, JSON.stringify(encoded))).toBe('from JSON');
    });

    it.each(['', '"', 'abc', '"abc', 'abc"'])('should reject unquoted input %j', input => {
      const error = captureError(() => deserializeEncrypted(cipher, input));

      expect(isFieldCryptoError(error, 'SERIALIZATION_ERROR')).toBe(true);
      expect(error).toHaveProperty('message', 'Encrypted value must be a JSON string literal');
    });

    it('should reject malformed base64 with SERIALIZATION_ERROR', () => {
      const error = captureError(() => deserializeEncrypted(cipher, '"not*base64"'));

      expect(isFieldCryptoError(error, 'SERIALIZATION_ERROR')).toBe(true);
    });

    it('should propagate decryption errors unchanged', () => {
      // Version byte 0x01 followed by padding
      const text = JSON.stringify(base64UrlEncode(Buffer.alloc(20, 1)));

      const error = captureError(() => deserializeEncrypted(cipher, text));

      expect(isFieldCryptoError(error, 'VERSION_MISMATCH')).toBe(true);
    });
  });

  describe('EncryptedString', () => {
    it('should encrypt itself inside JSON.stringify', () => {
      const document = { email: new EncryptedString('alice@example.com', cipher) };

      const json = JSON.stringify(document);
      const parsed: unknown = JSON.parse(json);
      const email = z.object({ email: z.string() }).parse(parsed).email;

      expect(json).not.toContain('alice@example.com');
      expect(EncryptedString.fromJSON(cipher, email).value).toBe('alice@example.com');
    });

    it('should not reveal the plaintext through toString', () => {
      expect(String(new EncryptedString('secret', cipher))).toBe('[EncryptedString]');
    });
  });

  describe('encryptedStringSchema', () => {
    const buildSchema = (fieldCipher: FieldCipher) =>
      z.object({
        id: z.string(),
        ssn: encryptedStringSchema(fieldCipher)
      });

    it('should decrypt the field while parsing', () => {
      const payload = { id: 'u1', ssn: base64UrlEncode(cipher.encrypt('123-45-6789')) };

      expect(buildSchema(cipher).parse(payload)).toEqual({ id: 'u1', ssn: '123-45-6789' });
    });

    it('should surface malformed input as a validation issue', () => {
      const result = buildSchema(cipher).safeParse({ id: 'u1', ssn: '%%%' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues).toHaveLength(1);
        expect(result.error.issues[0]?.path).toEqual(['ssn']);
        expect(result.error.issues[0]?.message).toBe('Malformed base64url input');
      }
    });

    it('should surface authentication failures as a validation issue', () => {
      const tampered = cipher.encrypt('123-45-6789');
      tampered[20] = tampered.readUInt8(20) ^ 0x01;

      const result = buildSchema(cipher).safeParse({ id: 'u1', ssn: base64UrlEncode(tampered) });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe('Ciphertext authentication failed');
      }
    });
  });
});
