import type { AppEnvironment } from './env.js';
import { BLIND_INDEX_KEY_NAME, ENCRYPTION_KEY_NAME, KeyRegistry } from '../crypto/key-registry.js';

type KeyEnvironment = Pick<AppEnvironment, 'FIELD_ENCRYPTION_KEY_BASE64' | 'BLIND_INDEX_KEY_BASE64'>;

/**
 * Registers the field encryption and blind index keys found in the
 * environment, then seals the registry. A missing variable leaves that key
 * unregistered; operations needing it fail with NO_SUCH_KEY.
 */
export function buildKeyRegistryFromEnv(config: KeyEnvironment): KeyRegistry {
  const registry = new KeyRegistry();

  if (config.FIELD_ENCRYPTION_KEY_BASE64) {
    registry.register(ENCRYPTION_KEY_NAME, Buffer.from(config.FIELD_ENCRYPTION_KEY_BASE64, 'base64'));
  }

  if (config.BLIND_INDEX_KEY_BASE64) {
    registry.register(BLIND_INDEX_KEY_NAME, Buffer.from(config.BLIND_INDEX_KEY_BASE64, 'base64'));
  }

  return registry.seal();
}
