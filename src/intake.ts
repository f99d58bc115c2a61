/**
 * Intake: turns claims into pending records, enforces transaction-id
 * uniqueness and asks before touching the submitter's existing records.
 */

import { parseClaim, type Claim } from './claim.js';
import type { ServiceContext } from './context.js';
import { errorMeta } from './logger.js';
import { adminSummary, evidenceCaption, logCancelled } from './messages.js';
import { STATUS, isActiveApproval, type PaymentRecord } from './records.js';
import { err, ok, type Result } from './result.js';

export type ConflictKind = 'pending' | 'approved';

/** Answers to the conflict questions, given up front or after a `conflict` outcome. */
export interface SubmitChoice {
  pending?: 'replace' | 'keep';
  /** Id of the pending record the `pending` answer was given for. */
  pendingFor?: string;
  approved?: 'continue' | 'abort';
}

export type SubmitOutcome =
  | { type: 'created'; record: PaymentRecord; replaced: PaymentRecord[]; adminNotified: boolean }
  | { type: 'conflict'; conflict: ConflictKind; existing: PaymentRecord }
  | { type: 'kept_existing'; existing: PaymentRecord }
  | { type: 'aborted'; existing: PaymentRecord };

export type IntakeError =
  | { kind: 'invalid_claim'; issues: string[] }
  | { kind: 'duplicate_transaction'; transactionId: string }
  | { kind: 'pending_exists'; existing: PaymentRecord }
  | { kind: 'approved_exists'; existing: PaymentRecord }
  | { kind: 'store_unavailable' };

export type CancelError =
  | { kind: 'not_found' }
  | { kind: 'already_decided'; record: PaymentRecord }
  | { kind: 'store_unavailable' };

export type AttachOutcome =
  | { type: 'attached'; record: PaymentRecord; evidenceForwarded: boolean }
  | { type: 'uncorrelated'; forwarded: boolean };

export type AttachError =
  | { kind: 'no_claim' }
  | { kind: 'not_found' }
  | { kind: 'already_decided'; record: PaymentRecord }
  | { kind: 'store_unavailable' };

export interface Attachment {
  user_id: number;
  username: string;
  image_ref: string;
  /** Record id taken from the bot message the submitter replied to. */
  reply_record_id?: string | null;
}

export class IntakeController {
  constructor(private readonly ctx: ServiceContext) {}

  async submit(input: unknown, choice: SubmitChoice = {}): Promise<Result<SubmitOutcome, IntakeError>> {
    const parsed = parseClaim(input);
    if (!parsed.ok) return err({ kind: 'invalid_claim', issues: parsed.error });
    try {
      return await this.admit(parsed.value, choice);
    } catch (e) {
      this.ctx.logger.error('Submit failed', { user_id: parsed.value.user_id, ...errorMeta(e) });
      return err({ kind: 'store_unavailable' });
    }
  }

  private async admit(claim: Claim, choice: SubmitChoice): Promise<Result<SubmitOutcome, IntakeError>> {
    const { store, logger } = this.ctx;
    const policy = this.ctx.config.policy;

    if (await store.findByTransactionId(claim.transaction_id)) {
      logger.info('Duplicate transaction id', { user_id: claim.user_id, transaction_id: claim.transaction_id });
      return err({ kind: 'duplicate_transaction', transactionId: claim.transaction_id });
    }

    // Both questions are settled before anything is written.
    const pending = await store.findByUser(claim.user_id, STATUS.PENDING);
    if (pending.length > 0) {
      const existing = pending[0];
      if (policy.pendingConflict === 'block') return err({ kind: 'pending_exists', existing });
      // An answer given about another record is asked again.
      const answered = choice.pending !== undefined && (choice.pendingFor === undefined || choice.pendingFor === existing.id);
      if (!answered) return ok({ type: 'conflict', conflict: 'pending', existing });
      if (choice.pending === 'keep') return ok({ type: 'kept_existing', existing });
    }

    if (policy.approvedConflict !== 'allow') {
      const now = this.ctx.now();
      const active = (await store.findByUser(claim.user_id, STATUS.APPROVED)).find((r) => isActiveApproval(r, now));
      if (active) {
        if (policy.approvedConflict === 'block') return err({ kind: 'approved_exists', existing: active });
        if (!choice.approved) return ok({ type: 'conflict', conflict: 'approved', existing: active });
        if (choice.approved === 'abort') return ok({ type: 'aborted', existing: active });
      }
    }

    const replaced: PaymentRecord[] = [];
    for (const old of pending) {
      const cancelled = await this.cancelRecord(old, claim.user_id, true);
      if (cancelled) replaced.push(cancelled);
    }

    const inserted = await store.insert({
      user_id: claim.user_id,
      username: claim.username,
      transaction_id: claim.transaction_id,
      amount: claim.amount,
      period_count: claim.period_count,
      period_unit: claim.period_unit,
      source: claim.source,
      created_at: this.ctx.now(),
    });
    if (!inserted.ok) {
      // Lost a race with a concurrent submission.
      if (inserted.error === 'duplicate_transaction') {
        return err({ kind: 'duplicate_transaction', transactionId: claim.transaction_id });
      }
      const existing = (await store.findByUser(claim.user_id, STATUS.PENDING))[0];
      if (!existing) throw new Error(`pending record of user ${claim.user_id} vanished during insert`);
      logger.info('Concurrent pending submission', { user_id: claim.user_id, existing_id: existing.id });
      if (policy.pendingConflict === 'block') return err({ kind: 'pending_exists', existing });
      return ok({ type: 'conflict', conflict: 'pending', existing });
    }
    const record = inserted.value;
    this.ctx.sessions.rememberRecord(record.user_id, record.id);
    logger.info('Payment request created', {
      record_id: record.id,
      user_id: record.user_id,
      source: record.source,
      replaced: replaced.map((r) => r.id),
    });

    let adminNotified = true;
    try {
      await this.ctx.gateway.notifyAdmin(record, adminSummary(record));
    } catch (e) {
      adminNotified = false;
      logger.error('Admin notification failed', { record_id: record.id, ...errorMeta(e) });
    }
    return ok({ type: 'created', record, replaced, adminNotified });
  }

  /** Submitter withdraws a pending record; without an id, their newest one. */
  async cancel(userId: number, recordId?: string): Promise<Result<PaymentRecord, CancelError>> {
    try {
      const target = recordId
        ? await this.ctx.store.findById(recordId)
        : (await this.ctx.store.findByUser(userId, STATUS.PENDING))[0];
      if (!target || target.user_id !== userId) return err({ kind: 'not_found' });
      if (target.status !== STATUS.PENDING) return err({ kind: 'already_decided', record: target });
      const cancelled = await this.cancelRecord(target, userId, false);
      if (!cancelled) {
        const current = (await this.ctx.store.findById(target.id)) ?? target;
        return err({ kind: 'already_decided', record: current });
      }
      return ok(cancelled);
    } catch (e) {
      this.ctx.logger.error('Cancel failed', { user_id: userId, record_id: recordId, ...errorMeta(e) });
      return err({ kind: 'store_unavailable' });
    }
  }

  private async cancelRecord(record: PaymentRecord, by: number, replaced: boolean): Promise<PaymentRecord | null> {
    const cancelled = await this.ctx.store.transition(record.id, STATUS.CANCELLED, {
      decided_at: this.ctx.now(),
      decided_by: by,
    });
    if (!cancelled) {
      this.ctx.logger.info('Cancel skipped, record already decided', { record_id: record.id });
      return null;
    }
    this.ctx.sessions.forgetRecord(record.user_id, record.id);
    this.ctx.logger.info('Payment request cancelled', { record_id: record.id, user_id: record.user_id, replaced });
    await this.ctx.gateway.notifyLog(logCancelled(cancelled, replaced));
    return cancelled;
  }

  /** Links a screenshot to the submitter's in-flight record and shows it to the admins. */
  async attach(a: Attachment): Promise<Result<AttachOutcome, AttachError>> {
    const { store, gateway, logger } = this.ctx;
    const recordId = a.reply_record_id ?? this.ctx.sessions.recordFor(a.user_id);

    if (!recordId) {
      if (this.ctx.config.policy.uncorrelatedScreenshots === 'reject') return err({ kind: 'no_claim' });
      try {
        await gateway.forwardEvidence(a.image_ref, evidenceCaption(null, a.username, a.user_id));
        return ok({ type: 'uncorrelated', forwarded: true });
      } catch (e) {
        logger.error('Forward uncorrelated screenshot failed', { user_id: a.user_id, ...errorMeta(e) });
        return ok({ type: 'uncorrelated', forwarded: false });
      }
    }

    let record: PaymentRecord;
    try {
      const found = await store.findById(recordId);
      if (!found || found.user_id !== a.user_id) return err({ kind: 'not_found' });
      const updated = await store.attachScreenshot(found.id, a.image_ref);
      if (!updated) return err({ kind: 'already_decided', record: (await store.findById(found.id)) ?? found });
      record = updated;
    } catch (e) {
      logger.error('Attach screenshot failed', { user_id: a.user_id, record_id: recordId, ...errorMeta(e) });
      return err({ kind: 'store_unavailable' });
    }

    logger.info('Screenshot attached', { record_id: record.id, user_id: record.user_id });
    try {
      await gateway.forwardEvidence(a.image_ref, evidenceCaption(record, a.username, a.user_id));
      return ok({ type: 'attached', record, evidenceForwarded: true });
    } catch (e) {
      logger.error('Forward screenshot failed', { record_id: record.id, ...errorMeta(e) });
      return ok({ type: 'attached', record, evidenceForwarded: false });
    }
  }
}
