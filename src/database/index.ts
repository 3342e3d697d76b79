export {
  connectDatabase,
  disconnectDatabase,
  getDatabaseClient,
  checkDatabaseHealth
} from './connection.js';
export {
  MongooseProtectedRecordRepository,
  type ProtectedRecordData,
  type ProtectedRecordRepository
} from './protected-record-repository.js';
export { initializeModels } from './models.js';
