import { FieldCryptoError } from './errors.js';

// URL-safe alphabet, '=' padded to a multiple of four characters
const PADDED_BASE64URL = /^(?:[A-Za-z0-9_-]{4})*(?:[A-Za-z0-9_-]{2}==|[A-Za-z0-9_-]{3}=)?$/;

/** Base64url encode bytes with padding. */
export function base64UrlEncode(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

/** Base64url decode a padded string; rejects anything outside the alphabet. */
export function base64UrlDecode(text: string): Buffer {
  if (!PADDED_BASE64URL.test(text)) {
    throw new FieldCryptoError('Malformed base64url input', 'SERIALIZATION_ERROR');
  }
  return Buffer.from(text, 'base64url');
}
