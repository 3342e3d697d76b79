import { buildKeyRegistryFromEnv, env } from './config/index.js';
import { BlindIndexHasher } from './crypto/blind-index.js';
import { FieldCipher } from './crypto/field-cipher.js';
import {
  checkDatabaseHealth,
  connectDatabase,
  initializeModels,
  MongooseProtectedRecordRepository
} from './database/index.js';
import { logger } from './lib/logger.js';
import { ProtectedRecordService } from './services/protected-records.js';

export * from './crypto/index.js';
export * from './adapters/index.js';
export { buildKeyRegistryFromEnv } from './config/index.js';
export {
  MongooseProtectedRecordRepository,
  type ProtectedRecordData,
  type ProtectedRecordRepository
} from './database/index.js';
export {
  ProtectedRecordService,
  type StoreProtectedRecordInput,
  type RevealedRecord
} from './services/protected-records.js';

export async function bootstrap(): Promise<ProtectedRecordService> {
  logger.info({ env: env.NODE_ENV }, 'Bootstrapping sealed fields service');

  try {
    // Keys are registered once, before anything can encrypt or hash
    const registry = buildKeyRegistryFromEnv(env);
    logger.info({ keys: registry.names() }, 'Key registry sealed');

    await connectDatabase();

    const isHealthy = await checkDatabaseHealth();
    if (!isHealthy) {
      throw new Error('Database health check failed');
    }

    await initializeModels();

    const service = new ProtectedRecordService(
      new FieldCipher(registry),
      new BlindIndexHasher(registry),
      new MongooseProtectedRecordRepository()
    );

    logger.info('Sealed fields service bootstrap completed successfully');
    return service;
  } catch (error) {
    logger.error({ error }, 'Bootstrap failed');
    throw error;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch(error => {
    logger.error(error, 'Fatal error during bootstrap');
    process.exitCode = 1;
  });
}
