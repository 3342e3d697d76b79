/**
 * Crypto module - field encryption, blind indexes and key registry
 */

export { FieldCryptoError, isFieldCryptoError, type FieldCryptoErrorCode } from './errors.js';
export {
  KeyRegistry,
  createKeyRegistry,
  ENCRYPTION_KEY_NAME,
  BLIND_INDEX_KEY_NAME
} from './key-registry.js';
export {
  CIPHER_FORMATS,
  CURRENT_FORMAT,
  GCM_NONCE_LENGTH,
  GCM_TAG_LENGTH,
  type Aead,
  type CipherFormat
} from './format.js';
export { FieldCipher, type FieldCipherOptions } from './field-cipher.js';
export {
  BlindIndexHasher,
  BLIND_INDEX_DIGEST_LENGTH,
  type BlindIndexHasherOptions
} from './blind-index.js';
export { base64UrlEncode, base64UrlDecode } from './base64url.js';
