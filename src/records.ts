/**
 * Payment record model and its state machine.
 */

import type { PeriodUnit } from './period.js';

export const STATUS = {
  PENDING: 'pending',
  APPROVED: 'approved',
  REJECTED: 'rejected',
  CANCELLED: 'cancelled',
} as const;

export type Status = (typeof STATUS)[keyof typeof STATUS];

/** Statuses a record can leave `pending` for. None of them has an outgoing edge. */
export type FinalStatus = Exclude<Status, 'pending'>;

export const STATUSES: readonly Status[] = Object.values(STATUS);

const VALID_TRANSITIONS: Record<Status, readonly FinalStatus[]> = {
  [STATUS.PENDING]: [STATUS.APPROVED, STATUS.REJECTED, STATUS.CANCELLED],
  [STATUS.APPROVED]: [],
  [STATUS.REJECTED]: [],
  [STATUS.CANCELLED]: [],
};

export function canTransition(from: Status, to: Status): boolean {
  return VALID_TRANSITIONS[from].some((s) => s === to);
}

export type RecordSource = 'chat' | 'form';

export interface PaymentRecord {
  id: string;
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
  /** Admin id for approve/reject, submitter id for a cancellation. */
  decided_by?: number;
  expiry_at?: Date;
  /** Messaging-gateway file handle. */
  screenshot_ref?: string;
  expiry_reminded_at?: Date;
}

export type NewPaymentRecord = Pick<
  PaymentRecord,
  'user_id' | 'username' | 'transaction_id' | 'amount' | 'period_count' | 'period_unit' | 'source' | 'created_at'
>;

/** Fields written together with the status change. */
export interface DecisionPatch {
  decided_at: Date;
  decided_by: number;
  expiry_at?: Date;
}

/** Approved and not yet expired. An approval whose expiry is not written yet counts as active. */
export function isActiveApproval(record: PaymentRecord, now: Date): boolean {
  if (record.status !== STATUS.APPROVED) return false;
  return record.expiry_at === undefined || record.expiry_at.getTime() > now.getTime();
}
