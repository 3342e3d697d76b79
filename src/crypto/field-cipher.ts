/**
 * Field-level authenticated encryption
 *
 * Encrypts individual string values (a column, a document field) under the
 * key registered as "encrypt". Output is self-describing: a version byte, the
 * random nonce, then the AEAD output. Empty strings map to empty buffers and
 * never touch the cipher.
 */

import { randomBytes } from 'node:crypto';
import type { Logger } from 'pino';

import { FieldCryptoError } from './errors.js';
import { CIPHER_FORMATS, CURRENT_FORMAT } from './format.js';
import { ENCRYPTION_KEY_NAME, type KeyRegistry } from './key-registry.js';
import { plaintextBytes } from './plaintext.js';
import { logger as defaultLogger } from '../lib/logger.js';

export interface FieldCipherOptions {
  /** Registry entry holding the AES key (default "encrypt") */
  keyName?: string;
  /** Receives diagnostics for rejected ciphertexts */
  logger?: Pick<Logger, 'warn'>;
}

export class FieldCipher {
  private readonly keyName: string;
  private readonly logger: Pick<Logger, 'warn'>;

  constructor(
    private readonly registry: KeyRegistry,
    options: FieldCipherOptions = {}
  ) {
    this.keyName = options.keyName ?? ENCRYPTION_KEY_NAME;
    this.logger = options.logger ?? defaultLogger.child({ module: 'field-cipher' });
  }

  encrypt(plaintext: string): Buffer {
    if (plaintext.length === 0) {
      return Buffer.alloc(0);
    }

    const bytes = plaintextBytes(plaintext);
    const aead = CURRENT_FORMAT.init(this.registry.lookup(this.keyName));
    const nonce = randomBytes(CURRENT_FORMAT.nonceLength);
    const sealed = aead.seal(nonce, bytes);

    return Buffer.concat([Buffer.of(CURRENT_FORMAT.version), nonce, sealed]);
  }

  decrypt(ciphertext: Uint8Array): string {
    if (ciphertext.length === 0) {
      return '';
    }

    const key = this.registry.lookup(this.keyName);
    const data = Buffer.from(ciphertext.buffer, ciphertext.byteOffset, ciphertext.byteLength);

    const version = data.readUInt8(0);
    const format = CIPHER_FORMATS.get(version);
    if (!format) {
      this.logger.warn(
        { version, supportedVersions: [...CIPHER_FORMATS.keys()] },
        'Ciphertext format version not supported'
      );
      throw new FieldCryptoError(`Unsupported ciphertext version ${version}`, 'VERSION_MISMATCH');
    }

    const headerLength = 1 + format.nonceLength;
    if (data.length < headerLength) {
      throw new FieldCryptoError(
        `Ciphertext too short: ${data.length} bytes, header needs ${headerLength}`,
        'SHORT_CIPHER'
      );
    }

    const aead = format.init(key);
    const nonce = data.subarray(1, headerLength);
    const sealed = data.subarray(headerLength);

    let plaintext: Buffer;
    try {
      plaintext = aead.open(nonce, sealed);
    } catch {
      // Wrong key, tampering and corruption all surface as the same error
      throw new FieldCryptoError('Ciphertext authentication failed', 'AUTHENTICATION_FAILURE');
    }

    return plaintext.toString('utf8');
  }
}
