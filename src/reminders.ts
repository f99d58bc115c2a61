/**
 * Expiry reminders: each approval gets at most one notice before it runs out.
 */

import type { ServiceContext } from './context.js';
import { errorMeta } from './logger.js';
import { expiryReminder } from './messages.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReminderRun {
  sent: number;
  failed: number;
}

export async function sendExpiryReminders(ctx: ServiceContext, horizonDays: number): Promise<ReminderRun> {
  const now = ctx.now();
  const until = new Date(now.getTime() + horizonDays * DAY_MS);
  const due = await ctx.store.findExpiringApproved(now, until);
  const run: ReminderRun = { sent: 0, failed: 0 };
  for (const r of due) {
    // Marked before sending: at most one reminder per record.
    if (!(await ctx.store.markExpiryReminded(r.id, now))) continue;
    try {
      await ctx.gateway.notifySubmitter(r.user_id, expiryReminder(r));
      run.sent++;
    } catch (e) {
      run.failed++;
      ctx.logger.warn('Expiry reminder failed', { record_id: r.id, user_id: r.user_id, ...errorMeta(e) });
    }
  }
  if (due.length > 0) ctx.logger.info('Expiry reminders sent', { ...run });
  return run;
}
