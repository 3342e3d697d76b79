import { FieldCryptoError } from './errors.js';

/** Key name the field cipher reads. */
export const ENCRYPTION_KEY_NAME = 'encrypt';

/** Key name the blind index hasher reads. */
export const BLIND_INDEX_KEY_NAME = 'blindIndex';

/**
 * Named key store shared by the field cipher and the blind index hasher.
 *
 * Entries are append-only: a name can be registered once and is never
 * replaced or removed. Register everything at startup, then call `seal()`
 * before handing the registry to request-serving code.
 */
export class KeyRegistry {
  private readonly keys = new Map<string, Buffer>();
  private sealed = false;

  register(name: string, key: Uint8Array): void {
    if (this.sealed) {
      throw new FieldCryptoError(`Key registry is sealed; cannot register "${name}"`, 'REGISTRY_SEALED');
    }

    if (this.keys.has(name)) {
      throw new FieldCryptoError(`Key with name "${name}" already exists`, 'KEY_ALREADY_EXISTS');
    }

    // Copy so the caller cannot mutate registered material afterwards
    this.keys.set(name, Buffer.from(key));
  }

  lookup(name: string): Buffer {
    const key = this.keys.get(name);
    if (!key) {
      throw new FieldCryptoError(`No key registered under "${name}"`, 'NO_SUCH_KEY');
    }
    return Buffer.from(key);
  }

  has(name: string): boolean {
    return this.keys.has(name);
  }

  names(): string[] {
    return [...this.keys.keys()];
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}

/**
 * Build a registry from a name -> key record and seal it.
 */
export function createKeyRegistry(entries: Record<string, Uint8Array>): KeyRegistry {
  const registry = new KeyRegistry();

  for (const [name, key] of Object.entries(entries)) {
    registry.register(name, key);
  }

  return registry.seal();
}
