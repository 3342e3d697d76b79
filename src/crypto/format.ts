/**
 * Versioned ciphertext formats
 *
 * Every encrypted field is laid out as:
 *
 *   [version:1][nonce:nonceLength][ciphertext || tag]
 *
 * Formats are keyed by their version byte. Adding a format means adding an
 * entry to CIPHER_FORMATS; the field cipher dispatches on byte 0.
 */

import { createCipheriv, createDecipheriv, type CipherGCMTypes } from 'node:crypto';

import { FieldCryptoError } from './errors.js';

export interface Aead {
  /** Returns ciphertext with the auth tag appended */
  seal(nonce: Buffer, plaintext: Buffer): Buffer;
  /** Verifies and decrypts ciphertext || tag; throws on any integrity failure */
  open(nonce: Buffer, sealed: Buffer): Buffer;
}

export interface CipherFormat {
  version: number;
  nonceLength: number;
  /** Binds a key to the format's AEAD; rejects keys of the wrong size */
  init(key: Buffer): Aead;
}

export const GCM_NONCE_LENGTH = 12; // 96 bits (recommended for GCM)
export const GCM_TAG_LENGTH = 16;

const GCM_ALGORITHMS: Record<number, CipherGCMTypes> = {
  16: 'aes-128-gcm',
  24: 'aes-192-gcm',
  32: 'aes-256-gcm'
};

function gcmAlgorithmFor(key: Buffer): CipherGCMTypes {
  const algorithm = GCM_ALGORITHMS[key.length];
  if (!algorithm) {
    throw new FieldCryptoError(
      `Invalid AES key size ${key.length}; expected 16, 24 or 32 bytes`,
      'INVALID_KEY'
    );
  }
  return algorithm;
}

/**
 * Version 0: AES-GCM, key size picks AES-128/192/256, no associated data.
 */
const aesGcmV0: CipherFormat = {
  version: 0x00,
  nonceLength: GCM_NONCE_LENGTH,
  init(key) {
    const algorithm = gcmAlgorithmFor(key);

    return {
      seal(nonce, plaintext) {
        const cipher = createCipheriv(algorithm, key, nonce, { authTagLength: GCM_TAG_LENGTH });
        return Buffer.concat([cipher.update(plaintext), cipher.final(), cipher.getAuthTag()]);
      },
      open(nonce, sealed) {
        if (sealed.length < GCM_TAG_LENGTH) {
          throw new Error('Sealed data shorter than auth tag');
        }

        const body = sealed.subarray(0, sealed.length - GCM_TAG_LENGTH);
        const authTag = sealed.subarray(sealed.length - GCM_TAG_LENGTH);

        const decipher = createDecipheriv(algorithm, key, nonce, { authTagLength: GCM_TAG_LENGTH });
        decipher.setAuthTag(authTag);

        return Buffer.concat([decipher.update(body), decipher.final()]);
      }
    };
  }
};

export const CIPHER_FORMATS: ReadonlyMap<number, CipherFormat> = new Map([
  [aesGcmV0.version, aesGcmV0]
]);

/** Format written by new encryptions */
export const CURRENT_FORMAT: CipherFormat = aesGcmV0;
