/**
 * Per-submitter short-lived state: the record a screenshot should attach to,
 * and a claim held back while the submitter answers a conflict question.
 * Advisory only; a restart loses it and the submitter resubmits.
 */

import { TtlCache } from './cache.js';
import type { ClaimInput } from './claim.js';
import type { ConflictKind, SubmitChoice } from './intake.js';

export interface HeldClaim {
  claim: ClaimInput;
  conflict: ConflictKind;
  existing_id: string;
  /** Answers already given, e.g. `replace` before the approved-record question. */
  choice: SubmitChoice;
}

const MAX_SESSIONS = 10_000;

export class SubmitterSessions {
  private readonly inFlight: TtlCache<number, string>;
  private readonly held: TtlCache<number, HeldClaim>;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.inFlight = new TtlCache(ttlMs, MAX_SESSIONS, now);
    this.held = new TtlCache(ttlMs, MAX_SESSIONS, now);
  }

  rememberRecord(userId: number, recordId: string): void {
    this.inFlight.set(userId, recordId);
  }

  recordFor(userId: number): string | undefined {
    return this.inFlight.get(userId);
  }

  forgetRecord(userId: number, recordId: string): void {
    if (this.inFlight.get(userId) === recordId) this.inFlight.delete(userId);
  }

  holdClaim(userId: number, held: HeldClaim): void {
    this.held.set(userId, held);
  }

  /** Returns and removes the held claim, so each answer is used once. */
  takeClaim(userId: number): HeldClaim | undefined {
    const h = this.held.get(userId);
    if (h) this.held.delete(userId);
    return h;
  }

  prune(): number {
    return this.inFlight.prune() + this.held.prune();
  }
}
