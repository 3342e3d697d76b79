export { ProtectedRecordModel, type IProtectedRecord } from './ProtectedRecord.js';
