import { blindIndexStorageValue, fromStorageValue, toStorageValue } from '../adapters/storage.js';
import type { BlindIndexHasher } from '../crypto/blind-index.js';
import type { FieldCipher } from '../crypto/field-cipher.js';
import type {
  ProtectedRecordData,
  ProtectedRecordRepository
} from '../database/protected-record-repository.js';
import { logger } from '../lib/logger.js';

export interface StoreProtectedRecordInput {
  recordId: string;
  label: string;
  value: string;
}

export interface RevealedRecord {
  recordId: string;
  label: string;
  value: string;
}

/**
 * Protected Record Service
 * Stores values encrypted at rest next to a blind index so they can be
 * found again by exact match without decrypting the collection
 */
export class ProtectedRecordService {
  constructor(
    private readonly cipher: FieldCipher,
    private readonly hasher: BlindIndexHasher,
    private readonly repository: ProtectedRecordRepository
  ) {}

  async store(input: StoreProtectedRecordInput): Promise<void> {
    const { recordId, label, value } = input;

    try {
      await this.repository.insert({
        recordId,
        label,
        valueCiphertext: toStorageValue(this.cipher, value),
        valueIndex: blindIndexStorageValue(this.hasher, value)
      });

      logger.info({ recordId }, 'Protected record stored');
    } catch (error) {
      logger.error({ error, recordId }, 'Failed to store protected record');
      throw error;
    }
  }

  async reveal(recordId: string): Promise<RevealedRecord | null> {
    const record = await this.repository.findById(recordId);
    if (!record) {
      return null;
    }
    return this.decryptRecord(record);
  }

  /**
   * Exact-match lookup through the blind index. Empty values are never
   * indexed, so searching for '' returns nothing.
   */
  async findByValue(value: string): Promise<RevealedRecord[]> {
    if (value === '') {
      return [];
    }

    const records = await this.repository.findByIndex(blindIndexStorageValue(this.hasher, value));
    logger.debug({ matches: records.length }, 'Blind index lookup completed');

    return records.map(record => this.decryptRecord(record));
  }

  async erase(recordId: string): Promise<boolean> {
    const deleted = await this.repository.deleteById(recordId);

    if (deleted) {
      logger.info({ recordId }, 'Protected record erased');
    } else {
      logger.warn({ recordId }, 'Protected record not found for erasure');
    }

    return deleted;
  }

  private decryptRecord(record: ProtectedRecordData): RevealedRecord {
    try {
      return {
        recordId: record.recordId,
        label: record.label,
        value: fromStorageValue(this.cipher, record.valueCiphertext)
      };
    } catch (error) {
      logger.error({ error, recordId: record.recordId }, 'Failed to decrypt protected record');
      throw error;
    }
  }
}
