import { describe, it, expect, beforeEach } from 'vitest';

import { BlindIndexHasher, BLIND_INDEX_DIGEST_LENGTH } from '../../src/crypto/blind-index.js';
import { isFieldCryptoError } from '../../src/crypto/errors.js';
import { KeyRegistry } from '../../src/crypto/key-registry.js';
import { captureError } from '../helpers/errors.js';
import { createTestRegistry } from '../helpers/keys.js';

// HMAC-SHA-512("Hello World") under "test-blind-index-key-for-lookups"
const HELLO_WORLD_DIGEST_HEX =
  '9be34c62032ce7da56feaef6c0711ff5949ee117c1eab34b5f5ff4cbd1158cb8' +
  '6442cf85c2c0d2a51c638e99cfe437274f431adc64571a9358df4793b96beb6d';
const HELLO_WORLD_DIGEST_TEXT =
  'm-NMYgMs59pW_q72wHEf9ZSe4RfB6rNLX1_0y9EVjLhkQs-FwsDSpRxjjpnP5DcnT0Ma3GRXGpNY30eTuWvrbQ==';

describe('BlindIndexHasher', () => {
  let hasher: BlindIndexHasher;

  beforeEach(() => {
    hasher = new BlindIndexHasher(createTestRegistry());
  });

  describe('hash', () => {
    it('should compute HMAC-SHA-512 under the blindIndex key', () => {
      const digest = hasher.hash('Hello World');

      expect(digest.length).toBe(BLIND_INDEX_DIGEST_LENGTH);
      expect(digest.toString('hex')).toBe(HELLO_WORLD_DIGEST_HEX);
    });

    it('should be deterministic', () => {
      expect(hasher.hash('123-45-6789').equals(hasher.hash('123-45-6789'))).toBe(true);
    });

    it('should differ for different plaintexts', () => {
      expect(hasher.hash('alice@example.com').equals(hasher.hash('bob@example.com'))).toBe(false);
    });

    it('should differ under a different key', () => {
      const other = new BlindIndexHasher(createTestRegistry(undefined, Buffer.alloc(64, 5)));

      expect(other.hash('Hello World').toString('hex')).not.toBe(HELLO_WORLD_DIGEST_HEX);
    });

    it('should map the empty string to an empty digest', () => {
      expect(hasher.hash('').length).toBe(0);
    });

    it('should fail with NO_SUCH_KEY when the blindIndex key is not registered', () => {
      const unkeyed = new BlindIndexHasher(new KeyRegistry());

      expect(isFieldCryptoError(captureError(() => unkeyed.hash('value')), 'NO_SUCH_KEY')).toBe(true);
    });

    it('should reject plaintext holding a lone surrogate', () => {
      const error = captureError(() => hasher.hash('\uD800'));

      expect(isFieldCryptoError(error, 'MALFORMED_PLAINTEXT')).toBe(true);
    });

    it('should not collapse distinct lone surrogates onto one index', () => {
      expect(isFieldCryptoError(captureError(() => hasher.encodeText('\uD800')), 'MALFORMED_PLAINTEXT')).toBe(true);
      expect(isFieldCryptoError(captureError(() => hasher.encodeText('\uDFFF')), 'MALFORMED_PLAINTEXT')).toBe(true);
    });

    it('should hash a surrogate pair as its UTF-8 encoding', () => {
      expect(hasher.hash('\uD83C\uDF0D').equals(hasher.hash('🌍'))).toBe(true);
    });

    it('should read the key named by the keyName option', () => {
      const registry = new KeyRegistry();
      registry.register('emails', Buffer.from('test-blind-index-key-for-lookups'));
      const custom = new BlindIndexHasher(registry, { keyName: 'emails' });

      expect(custom.hash('Hello World').toString('hex')).toBe(HELLO_WORLD_DIGEST_HEX);
    });
  });

  describe('encodeText', () => {
    it('should encode the digest as padded base64url', () => {
      const text = hasher.encodeText('Hello World');

      expect(text).toBe(HELLO_WORLD_DIGEST_TEXT);
      expect(text).toHaveLength(88);
      expect(text).toMatch(/^[A-Za-z0-9_-]{86}==$/);
    });

    it('should encode the empty string as empty text', () => {
      expect(hasher.encodeText('')).toBe('');
    });
  });

  describe('matches', () => {
    it('should accept the stored digest of the same plaintext', () => {
      expect(hasher.matches('Hello World', HELLO_WORLD_DIGEST_TEXT)).toBe(true);
    });

    it('should reject the digest of a different plaintext', () => {
      expect(hasher.matches('Hello world', HELLO_WORLD_DIGEST_TEXT)).toBe(false);
    });

    it('should reject malformed digest text', () => {
      expect(hasher.matches('Hello World', 'not base64!')).toBe(false);
    });

    it('should reject a digest of the wrong length', () => {
      expect(hasher.matches('Hello World', 'AAAA')).toBe(false);
    });
  });
});
