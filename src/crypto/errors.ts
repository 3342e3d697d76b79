export type FieldCryptoErrorCode =
  | 'SHORT_CIPHER'
  | 'VERSION_MISMATCH'
  | 'SOURCE_TYPE_MISMATCH'
  | 'NO_SUCH_KEY'
  | 'KEY_ALREADY_EXISTS'
  | 'AUTHENTICATION_FAILURE'
  | 'INVALID_KEY'
  | 'REGISTRY_SEALED'
  | 'SERIALIZATION_ERROR'
  | 'MALFORMED_PLAINTEXT';

/**
 * Errors thrown by the key registry, the field cipher, the blind index
 * hasher and the storage/serialization adapters.
 */
export class FieldCryptoError extends Error {
  constructor(
    message: string,
    public readonly code: FieldCryptoErrorCode
  ) {
    super(message);
    this.name = 'FieldCryptoError';
  }
}

export function isFieldCryptoError(
  error: unknown,
  code?: FieldCryptoErrorCode
): error is FieldCryptoError {
  return error instanceof FieldCryptoError && (code === undefined || error.code === code);
}
