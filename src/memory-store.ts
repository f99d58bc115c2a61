/**
 * In-process record store: used when no MongoDB URI is configured, and by tests.
 * Each method checks and writes without yielding, which makes `transition` atomic.
 */

import { randomBytes } from 'node:crypto';
import type { InsertError, PaymentStore } from './store.js';
import { STATUS, canTransition, type DecisionPatch, type FinalStatus, type NewPaymentRecord, type PaymentRecord, type Status } from './records.js';
import { err, ok, type Result } from './result.js';

export class InMemoryPaymentStore implements PaymentStore {
  private readonly records = new Map<string, PaymentRecord>();
  private readonly byTransaction = new Map<string, string>();

  async insert(input: NewPaymentRecord): Promise<Result<PaymentRecord, InsertError>> {
    if (this.byTransaction.has(input.transaction_id)) return err('duplicate_transaction');
    for (const r of this.records.values()) {
      if (r.user_id === input.user_id && r.status === STATUS.PENDING) return err('pending_exists');
    }
    const record: PaymentRecord = { ...input, id: randomBytes(12).toString('hex'), status: STATUS.PENDING };
    this.records.set(record.id, record);
    this.byTransaction.set(record.transaction_id, record.id);
    return ok(structuredClone(record));
  }

  async findById(id: string): Promise<PaymentRecord | null> {
    const r = this.records.get(id);
    return r ? structuredClone(r) : null;
  }

  async findByTransactionId(transactionId: string): Promise<PaymentRecord | null> {
    const id = this.byTransaction.get(transactionId);
    return id ? this.findById(id) : null;
  }

  async findByUser(userId: number, status: Status): Promise<PaymentRecord[]> {
    return [...this.records.values()]
      .filter((r) => r.user_id === userId && r.status === status)
      .reverse()
      .map((r) => structuredClone(r));
  }

  async transition(id: string, to: FinalStatus, patch: DecisionPatch): Promise<PaymentRecord | null> {
    const r = this.records.get(id);
    if (!r || !canTransition(r.status, to)) return null;
    const updated: PaymentRecord = { ...r, ...patch, status: to };
    this.records.set(id, updated);
    return structuredClone(updated);
  }

  async attachScreenshot(id: string, ref: string): Promise<PaymentRecord | null> {
    const r = this.records.get(id);
    if (!r || r.status !== STATUS.PENDING) return null;
    const updated: PaymentRecord = { ...r, screenshot_ref: ref };
    this.records.set(id, updated);
    return structuredClone(updated);
  }

  async findExpiringApproved(from: Date, until: Date): Promise<PaymentRecord[]> {
    return [...this.records.values()]
      .filter(
        (r) =>
          r.status === STATUS.APPROVED &&
          r.expiry_reminded_at === undefined &&
          r.expiry_at !== undefined &&
          r.expiry_at.getTime() > from.getTime() &&
          r.expiry_at.getTime() <= until.getTime()
      )
      .map((r) => structuredClone(r));
  }

  async markExpiryReminded(id: string, at: Date): Promise<boolean> {
    const r = this.records.get(id);
    if (!r || r.expiry_reminded_at !== undefined) return false;
    this.records.set(id, { ...r, expiry_reminded_at: at });
    return true;
  }
}
