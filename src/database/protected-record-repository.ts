import type { Model } from 'mongoose';

import { ProtectedRecordModel, type IProtectedRecord } from '../models/index.js';

/**
 * Stored shape of a protected record: the value only ever appears as
 * ciphertext plus its blind index.
 */
export interface ProtectedRecordData {
  recordId: string;
  label: string;
  valueCiphertext: Buffer;
  valueIndex: string;
}

export interface ProtectedRecordRepository {
  insert(record: ProtectedRecordData): Promise<void>;
  findById(recordId: string): Promise<ProtectedRecordData | null>;
  /** All records whose blind index equals `valueIndex`, oldest first */
  findByIndex(valueIndex: string): Promise<ProtectedRecordData[]>;
  /** Returns false when no record matched */
  deleteById(recordId: string): Promise<boolean>;
}

export class MongooseProtectedRecordRepository implements ProtectedRecordRepository {
  constructor(private readonly model: Model<IProtectedRecord> = ProtectedRecordModel) {}

  async insert(record: ProtectedRecordData): Promise<void> {
    await this.model.create(record);
  }

  async findById(recordId: string): Promise<ProtectedRecordData | null> {
    const doc = await this.model.findOne({ recordId }).exec();
    return doc ? toRecordData(doc) : null;
  }

  async findByIndex(valueIndex: string): Promise<ProtectedRecordData[]> {
    const docs = await this.model.find({ valueIndex }).sort({ createdAt: 1 }).exec();
    return docs.map(toRecordData);
  }

  async deleteById(recordId: string): Promise<boolean> {
    const result = await this.model.deleteOne({ recordId }).exec();
    return result.deletedCount > 0;
  }
}

function toRecordData(doc: IProtectedRecord): ProtectedRecordData {
  return {
    recordId: doc.recordId,
    label: doc.label,
    valueCiphertext: doc.valueCiphertext,
    valueIndex: doc.valueIndex
  };
}
