/**
 * Blind index hashing
 *
 * HMAC-SHA-512 of a plaintext under the key registered as "blindIndex".
 * Identical inputs always give identical digests, which is what makes
 * equality lookups over encrypted columns possible. It also means repeated
 * values are visible as repeated digests.
 *
 * Digests are one-way; there is no decrypt path. Store the encrypted value
 * alongside when the plaintext has to be recovered.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

import { base64UrlDecode, base64UrlEncode } from './base64url.js';
import { isFieldCryptoError } from './errors.js';
import { BLIND_INDEX_KEY_NAME, type KeyRegistry } from './key-registry.js';
import { plaintextBytes } from './plaintext.js';

export const BLIND_INDEX_DIGEST_LENGTH = 64;

export interface BlindIndexHasherOptions {
  /** Registry entry holding the HMAC key (default "blindIndex") */
  keyName?: string;
}

export class BlindIndexHasher {
  private readonly keyName: string;

  constructor(
    private readonly registry: KeyRegistry,
    options: BlindIndexHasherOptions = {}
  ) {
    this.keyName = options.keyName ?? BLIND_INDEX_KEY_NAME;
  }

  /**
   * Raw 64-byte digest. Empty input yields an empty buffer, meaning
   * "don't index".
   */
  hash(plaintext: string): Buffer {
    if (plaintext.length === 0) {
      return Buffer.alloc(0);
    }

    const bytes = plaintextBytes(plaintext);
    return createHmac('sha512', this.registry.lookup(this.keyName)).update(bytes).digest();
  }

  /** Digest as padded base64url text, or '' for empty input. */
  encodeText(plaintext: string): string {
    return base64UrlEncode(this.hash(plaintext));
  }

  /**
   * Compares a stored text digest against the digest of `plaintext` in
   * constant time.
   */
  matches(plaintext: string, digestText: string): boolean {
    let stored: Buffer;
    try {
      stored = base64UrlDecode(digestText);
    } catch (error) {
      if (isFieldCryptoError(error, 'SERIALIZATION_ERROR')) {
        return false;
      }
      throw error;
    }

    const computed = this.hash(plaintext);
    return stored.length === computed.length && timingSafeEqual(stored, computed);
  }
}
