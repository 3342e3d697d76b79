import { connectDatabase } from './connection.js';
import { logger } from '../lib/logger.js';
import { ProtectedRecordModel } from '../models/index.js';

/**
 * Initialize database models and create indexes
 */
export async function initializeModels(): Promise<void> {
  logger.info('Initializing database models and indexes...');

  try {
    await connectDatabase();
    await ProtectedRecordModel.createIndexes();

    logger.info('Database models and indexes initialized successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize database models');
    throw error;
  }
}
