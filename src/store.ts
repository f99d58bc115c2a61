/**
 * Record store port. Every status change goes through `transition`, which only
 * matches records that are still pending.
 */

import type { DecisionPatch, FinalStatus, NewPaymentRecord, PaymentRecord, Status } from './records.js';
import type { Result } from './result.js';

/**
 * `duplicate_transaction`: the transaction id was ever seen.
 * `pending_exists`: the user already has a pending record.
 */
export type InsertError = 'duplicate_transaction' | 'pending_exists';

export interface PaymentStore {
  insert(record: NewPaymentRecord): Promise<Result<PaymentRecord, InsertError>>;
  /** Null for unknown or malformed ids. */
  findById(id: string): Promise<PaymentRecord | null>;
  findByTransactionId(transactionId: string): Promise<PaymentRecord | null>;
  /** Newest first. */
  findByUser(userId: number, status: Status): Promise<PaymentRecord[]>;
  /**
   * Compare-and-set `pending -> to`. Returns the updated record, or null when
   * no pending record with this id exists.
   */
  transition(id: string, to: FinalStatus, patch: DecisionPatch): Promise<PaymentRecord | null>;
  /** Sets `screenshot_ref` on a pending record; null when not pending. */
  attachScreenshot(id: string, ref: string): Promise<PaymentRecord | null>;
  /** Approved records with `from < expiry_at <= until` that were not reminded yet. */
  findExpiringApproved(from: Date, until: Date): Promise<PaymentRecord[]>;
  /** True only for the call that set `expiry_reminded_at`. */
  markExpiryReminded(id: string, at: Date): Promise<boolean>;
}
