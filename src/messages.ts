/**
 * Plain-text message templates.
 */

import { formatPeriod } from './period.js';
import { STATUS, type PaymentRecord, type Status } from './records.js';
import type { ConflictKind } from './intake.js';

const REQUEST_ID_RE = /Request ID: ([a-f0-9]{24})/;

export function formatDate(d: Date): string {
  return `${d.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

/** Record id from one of the bot's own messages, used to correlate replies. */
export function extractRequestId(text: string | undefined): string | null {
  return text?.match(REQUEST_ID_RE)?.[1] ?? null;
}

function claimLines(r: PaymentRecord): string[] {
  return [
    `Transaction ID: ${r.transaction_id}`,
    `Amount: ${r.amount}`,
    `Period: ${formatPeriod(r.period_count, r.period_unit)}`,
  ];
}

function mention(username: string, userId: number): string {
  return username ? `@${username} (ID: ${userId})` : `ID: ${userId}`;
}

export const START_TEXT = [
  'Hi! Send your payment details in this format:',
  '',
  '✅ I have successfully completed the payment.',
  '📱 Telegram Username: @YourUsername',
  '💳 Transaction ID: YourTransactionID',
  '💰 Amount Paid: ₹100',
  '⏳ Time Period: 30 Days',
  '',
  '📸 Then reply to my confirmation with the payment screenshot.',
  'Send /cancel to withdraw a pending request.',
].join('\n');

export const ADMIN_START_TEXT =
  'Admin mode. New payment requests arrive here with Approve and Reject buttons.';

export function adminSummary(r: PaymentRecord): string {
  return [
    'New payment request',
    '',
    `User: ${mention(r.username, r.user_id)}`,
    ...claimLines(r),
    `Source: ${r.source}`,
    `Request ID: ${r.id}`,
  ].join('\n');
}

export function submissionReceived(r: PaymentRecord): string {
  return [
    'Your payment request was sent to the admin for approval.',
    '',
    ...claimLines(r),
    `Request ID: ${r.id}`,
    '',
    'Reply to this message with your payment screenshot if you have one.',
  ].join('\n');
}

export function approvalMessage(r: PaymentRecord): string {
  const lines = ['Your payment request has been APPROVED!', '', ...claimLines(r)];
  if (r.expiry_at) lines.push(`Expires on: ${formatDate(r.expiry_at)}`);
  lines.push('', 'Thank you for your payment!');
  return lines.join('\n');
}

export function rejectionMessage(r: PaymentRecord): string {
  return [
    'Your payment request has been REJECTED.',
    '',
    ...claimLines(r),
    '',
    'Please check your details, or contact support if you believe this is an error.',
  ].join('\n');
}

export function outcomeMessage(r: PaymentRecord): string {
  return r.status === STATUS.APPROVED ? approvalMessage(r) : rejectionMessage(r);
}

export function cancelledMessage(r: PaymentRecord): string {
  return `Your pending request ${r.transaction_id} was cancelled.`;
}

export function logDecision(r: PaymentRecord, adminName: string, submitterName: string): string {
  const lines = [
    `Payment ${r.status.toUpperCase()}`,
    '',
    `User: ${mention(submitterName, r.user_id)}`,
    ...claimLines(r),
  ];
  if (r.expiry_at) lines.push(`Expires: ${formatDate(r.expiry_at)}`);
  lines.push(`By: ${adminName}`, `Request ID: ${r.id}`);
  return lines.join('\n');
}

export function logCancelled(r: PaymentRecord, replaced: boolean): string {
  return [
    replaced ? 'Payment request replaced by the submitter' : 'Payment request cancelled by the submitter',
    '',
    `User: ${mention(r.username, r.user_id)}`,
    ...claimLines(r),
    `Request ID: ${r.id}`,
  ].join('\n');
}

/** Appended to the admin's copy of the request once it is resolved. */
export function decisionStamp(status: Status, adminName: string, at: Date): string {
  return `Status: ${status.toUpperCase()}\nBy: ${adminName}\nAt: ${formatDate(at)}`;
}

export function alreadyDecidedText(r: PaymentRecord): string {
  return `Already ${r.status}${r.decided_at ? ` at ${formatDate(r.decided_at)}` : ''}.`;
}

export function conflictQuestion(conflict: ConflictKind, existing: PaymentRecord): string {
  if (conflict === 'pending') {
    return [
      'You already have a pending request:',
      '',
      ...claimLines(existing),
      '',
      'Replace it with the new one, or keep the old one and discard the new submission?',
    ].join('\n');
  }
  const until = existing.expiry_at ? ` until ${formatDate(existing.expiry_at)}` : '';
  return [
    `You already have an approved payment valid${until}:`,
    '',
    ...claimLines(existing),
    '',
    'Submit the new payment anyway?',
  ].join('\n');
}

export function evidenceCaption(r: PaymentRecord | null, username: string, userId: number): string {
  if (!r) return `Screenshot from ${mention(username, userId)} (not linked to any request)`;
  return [`Screenshot from ${mention(username, userId)}`, ...claimLines(r), `Request ID: ${r.id}`].join('\n');
}

export function expiryReminder(r: PaymentRecord): string {
  return [
    `Your payment period ends on ${r.expiry_at ? formatDate(r.expiry_at) : 'soon'}.`,
    '',
    `Transaction ID: ${r.transaction_id}`,
    '',
    'Send new payment details to renew.',
  ].join('\n');
}
