/**
 * Adapters - binding encrypted fields to storage columns and JSON documents
 */

export { toStorageValue, fromStorageValue, blindIndexStorageValue } from './storage.js';
export {
  serializeEncrypted,
  deserializeEncrypted,
  EncryptedString,
  encryptedStringSchema
} from './json.js';
