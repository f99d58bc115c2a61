/**
 * MongoDB record store (mongoose). One document per record in `payment_requests`.
 */

import { Schema, isValidObjectId, type Connection, type HydratedDocument, type Model } from 'mongoose';
import type { InsertError, PaymentStore } from './store.js';
import {
  STATUS,
  STATUSES,
  canTransition,
  type DecisionPatch,
  type FinalStatus,
  type NewPaymentRecord,
  type PaymentRecord,
  type RecordSource,
  type Status,
} from './records.js';
import { PERIOD_UNITS, type PeriodUnit } from './period.js';
import { err, ok, type Result } from './result.js';

export interface PaymentRequestDoc {
  user_id: number;
  username: string;
  transaction_id: string;
  amount: number;
  period_count: number;
  period_unit: PeriodUnit;
  status: Status;
  source: RecordSource;
  created_at: Date;
  decided_at?: Date;
  decided_by?: number;
  expiry_at?: Date;
  screenshot_ref?: string;
  expiry_reminded_at?: Date;
}

const paymentRequestSchema = new Schema<PaymentRequestDoc>(
  {
    user_id: { type: Number, required: true },
    username: { type: String, default: '' },
    // Unique across every status: a transaction id is consumed once seen.
    transaction_id: { type: String, required: true, unique: true },
    amount: { type: Number, required: true, min: 1 },
    period_count: { type: Number, required: true, min: 1 },
    period_unit: { type: String, enum: [...PERIOD_UNITS], required: true },
    status: { type: String, enum: [...STATUSES], default: STATUS.PENDING },
    source: { type: String, enum: ['chat', 'form'], default: 'chat' },
    created_at: { type: Date, required: true, immutable: true },
    decided_at: { type: Date },
    decided_by: { type: Number },
    expiry_at: { type: Date },
    screenshot_ref: { type: String },
    expiry_reminded_at: { type: Date },
  },
  { versionKey: false }
);

paymentRequestSchema.index({ user_id: 1, status: 1 });
paymentRequestSchema.index({ status: 1, expiry_at: 1 });
// At most one pending record per user.
paymentRequestSchema.index(
  { user_id: 1 },
  { unique: true, name: 'one_pending_per_user', partialFilterExpression: { status: STATUS.PENDING } }
);

export function createPaymentRequestModel(connection: Connection): Model<PaymentRequestDoc> {
  return connection.model<PaymentRequestDoc>('PaymentRequest', paymentRequestSchema, 'payment_requests');
}

export function toRecord(doc: HydratedDocument<PaymentRequestDoc>): PaymentRecord {
  const record: PaymentRecord = {
    id: doc._id.toHexString(),
    user_id: doc.user_id,
    username: doc.username,
    transaction_id: doc.transaction_id,
    amount: doc.amount,
    period_count: doc.period_count,
    period_unit: doc.period_unit,
    status: doc.status,
    source: doc.source,
    created_at: doc.created_at,
  };
  if (doc.decided_at) record.decided_at = doc.decided_at;
  if (doc.decided_by !== undefined && doc.decided_by !== null) record.decided_by = doc.decided_by;
  if (doc.expiry_at) record.expiry_at = doc.expiry_at;
  if (doc.screenshot_ref) record.screenshot_ref = doc.screenshot_ref;
  if (doc.expiry_reminded_at) record.expiry_reminded_at = doc.expiry_reminded_at;
  return record;
}

/** Which unique index an E11000 error hit; null for any other error. */
export function duplicateKeyError(e: unknown): InsertError | null {
  if (typeof e !== 'object' || e === null || !('code' in e) || e.code !== 11000) return null;
  const pattern = 'keyPattern' in e ? e.keyPattern : undefined;
  const pendingIndex = typeof pattern === 'object' && pattern !== null && !('transaction_id' in pattern) && 'user_id' in pattern;
  return pendingIndex ? 'pending_exists' : 'duplicate_transaction';
}

export class MongoPaymentStore implements PaymentStore {
  constructor(private readonly model: Model<PaymentRequestDoc>) {}

  async insert(input: NewPaymentRecord): Promise<Result<PaymentRecord, InsertError>> {
    try {
      const doc = await this.model.create({ ...input, status: STATUS.PENDING });
      return ok(toRecord(doc));
    } catch (e) {
      const duplicate = duplicateKeyError(e);
      if (duplicate) return err(duplicate);
      throw e;
    }
  }

  async findById(id: string): Promise<PaymentRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model.findById(id);
    return doc ? toRecord(doc) : null;
  }

  async findByTransactionId(transactionId: string): Promise<PaymentRecord | null> {
    const doc = await this.model.findOne({ transaction_id: transactionId });
    return doc ? toRecord(doc) : null;
  }

  async findByUser(userId: number, status: Status): Promise<PaymentRecord[]> {
    const docs = await this.model.find({ user_id: userId, status }).sort({ created_at: -1, _id: -1 });
    return docs.map(toRecord);
  }

  async transition(id: string, to: FinalStatus, patch: DecisionPatch): Promise<PaymentRecord | null> {
    if (!isValidObjectId(id)) return null;
    const set: Partial<PaymentRequestDoc> = {
      status: to,
      decided_at: patch.decided_at,
      decided_by: patch.decided_by,
    };
    if (patch.expiry_at) set.expiry_at = patch.expiry_at;
    const from = STATUSES.filter((s) => canTransition(s, to));
    const doc = await this.model.findOneAndUpdate({ _id: id, status: { $in: from } }, { $set: set }, { new: true });
    return doc ? toRecord(doc) : null;
  }

  async attachScreenshot(id: string, ref: string): Promise<PaymentRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model.findOneAndUpdate(
      { _id: id, status: STATUS.PENDING },
      { $set: { screenshot_ref: ref } },
      { new: true }
    );
    return doc ? toRecord(doc) : null;
  }

  async findExpiringApproved(from: Date, until: Date): Promise<PaymentRecord[]> {
    const docs = await this.model.find({
      status: STATUS.APPROVED,
      expiry_reminded_at: { $exists: false },
      expiry_at: { $gt: from, $lte: until },
    });
    return docs.map(toRecord);
  }

  async markExpiryReminded(id: string, at: Date): Promise<boolean> {
    if (!isValidObjectId(id)) return false;
    const res = await this.model.updateOne(
      { _id: id, expiry_reminded_at: { $exists: false } },
      { $set: { expiry_reminded_at: at } }
    );
    return res.modifiedCount === 1;
  }
}
