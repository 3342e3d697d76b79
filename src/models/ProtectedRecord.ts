import { Schema, model, type Document } from 'mongoose';

export interface IProtectedRecord extends Document {
  recordId: string;
  label: string;
  /** Versioned AES-GCM ciphertext; empty for an empty value */
  valueCiphertext: Buffer;
  /** base64url HMAC-SHA-512 blind index; empty for an empty value */
  valueIndex: string;
  createdAt: Date;
  updatedAt: Date;
}

const ProtectedRecordSchema = new Schema<IProtectedRecord>(
  {
    recordId: {
      type: String,
      required: true,
      unique: true,
      index: true
    },
    label: {
      type: String,
      required: true,
      maxlength: 200
    },
    // Not `required`: mongoose treats a zero-length buffer or string as missing
    valueCiphertext: {
      type: Buffer,
      default: () => Buffer.alloc(0)
    },
    valueIndex: {
      type: String,
      default: ''
    }
  },
  {
    timestamps: true,
    collection: 'protected_records'
  }
);

ProtectedRecordSchema.index({ valueIndex: 1, createdAt: 1 });

export const ProtectedRecordModel = model<IProtectedRecord>('ProtectedRecord', ProtectedRecordSchema);
