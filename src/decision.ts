/**
 * Decision engine: resolves one pending record to approved or rejected,
 * exactly once, and tells the submitter and the log channel.
 */

import type { DecisionAction } from './callback-data.js';
import { isAdmin } from './config.js';
import type { ServiceContext } from './context.js';
import { errorMeta } from './logger.js';
import { logDecision, outcomeMessage } from './messages.js';
import { computeExpiry } from './period.js';
import { STATUS, type DecisionPatch, type PaymentRecord } from './records.js';
import { err, ok, type Result } from './result.js';

export type DecideError =
  | { kind: 'unauthorized' }
  | { kind: 'not_found' }
  | { kind: 'already_decided'; record: PaymentRecord }
  | { kind: 'store_unavailable' };

export interface Decided {
  record: PaymentRecord;
  /** False when the submitter could not be reached; the decision stands regardless. */
  submitterNotified: boolean;
}

export interface Admin {
  id: number;
  /** Display name for the log channel. */
  name?: string;
}

export class DecisionEngine {
  constructor(private readonly ctx: ServiceContext) {}

  async decide(recordId: string, action: DecisionAction, admin: Admin): Promise<Result<Decided, DecideError>> {
    const { store, logger } = this.ctx;
    const log = logger.child({ record_id: recordId, admin_id: admin.id, action });

    if (!isAdmin(this.ctx.config, admin.id)) {
      log.warn('Decision from non-admin ignored');
      return err({ kind: 'unauthorized' });
    }

    let record: PaymentRecord;
    try {
      const found = await store.findById(recordId);
      if (!found) {
        log.warn('Decision on unknown record');
        return err({ kind: 'not_found' });
      }
      if (found.status !== STATUS.PENDING) return err({ kind: 'already_decided', record: found });

      const now = this.ctx.now();
      const patch: DecisionPatch = { decided_at: now, decided_by: admin.id };
      if (action === 'approve') patch.expiry_at = computeExpiry(now, found.period_count, found.period_unit);

      const updated = await store.transition(
        found.id,
        action === 'approve' ? STATUS.APPROVED : STATUS.REJECTED,
        patch
      );
      if (!updated) {
        log.info('Decision lost the race, record already decided');
        return err({ kind: 'already_decided', record: (await store.findById(found.id)) ?? found });
      }
      record = updated;
    } catch (e) {
      log.error('Decision failed', errorMeta(e));
      return err({ kind: 'store_unavailable' });
    }
    log.info('Payment request decided', { status: record.status, user_id: record.user_id });

    let submitterNotified = true;
    try {
      await this.ctx.gateway.notifySubmitter(record.user_id, outcomeMessage(record));
    } catch (e) {
      submitterNotified = false;
      log.error('Submitter notification failed', { user_id: record.user_id, ...errorMeta(e) });
    }

    try {
      // The stored username may be stale by now.
      const current = await this.ctx.gateway.lookupUsername(record.user_id);
      await this.ctx.gateway.notifyLog(logDecision(record, admin.name ?? `ID: ${admin.id}`, current ?? record.username));
    } catch (e) {
      log.warn('Decision log entry failed', errorMeta(e));
    }

    return ok({ record, submitterNotified });
  }
}
