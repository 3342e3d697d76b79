export { env, parseEnv } from './env.js';
export type { AppEnvironment } from './env.js';
export { buildKeyRegistryFromEnv } from './keys.js';
