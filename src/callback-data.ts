/**
 * Inline button payloads. Telegram limits callback data to 64 bytes.
 */

import { InlineKeyboard } from 'grammy';
import type { ConflictKind, SubmitChoice } from './intake.js';
import type { HeldClaim } from './sessions.js';

export type DecisionAction = 'approve' | 'reject';
export type ChoiceAnswer = 'replace' | 'keep' | 'continue' | 'abort';

export type CallbackPayload =
  | { type: 'decision'; action: DecisionAction; recordId: string }
  | { type: 'choice'; answer: ChoiceAnswer };

const DECISION_RE = /^(approve|reject)_([a-f0-9]{24})$/;
const CHOICE_RE = /^choice_(replace|keep|continue|abort)$/;

export function parseCallbackData(data: string): CallbackPayload | null {
  const decision = DECISION_RE.exec(data);
  if (decision) {
    const action: DecisionAction = decision[1] === 'approve' ? 'approve' : 'reject';
    return { type: 'decision', action, recordId: decision[2] };
  }
  const choice = CHOICE_RE.exec(data);
  if (choice) {
    const answer = (['replace', 'keep', 'continue', 'abort'] as const).find((a) => a === choice[1]);
    if (answer) return { type: 'choice', answer };
  }
  return null;
}

export function decisionKeyboard(recordId: string): InlineKeyboard {
  return new InlineKeyboard().text('✅ Approve', `approve_${recordId}`).text('❌ Reject', `reject_${recordId}`);
}

export function choiceKeyboard(conflict: ConflictKind): InlineKeyboard {
  return conflict === 'pending'
    ? new InlineKeyboard().text('Replace', 'choice_replace').text('Keep old', 'choice_keep')
    : new InlineKeyboard().text('Continue', 'choice_continue').text('Abort', 'choice_abort');
}

/**
 * Folds a button answer into the choices already given for a held claim.
 * Null when the answer belongs to the other question.
 */
export function applyAnswer(held: HeldClaim, answer: ChoiceAnswer): SubmitChoice | null {
  if (answer === 'replace' || answer === 'keep') {
    return held.conflict === 'pending' ? { ...held.choice, pending: answer, pendingFor: held.existing_id } : null;
  }
  return held.conflict === 'approved' ? { ...held.choice, approved: answer } : null;
}
