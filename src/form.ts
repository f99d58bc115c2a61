/**
 * External web form: POST /claims feeds the same intake as the chat.
 */

import { timingSafeEqual } from 'node:crypto';
import express, { type Router } from 'express';
import { z } from 'zod';
import { formatIssues } from './claim.js';
import type { IntakeController, IntakeError, SubmitOutcome } from './intake.js';
import { errorMeta, type Logger } from './logger.js';

/** A JSON number, or a string of digits as sent by urlencoded-style forms. */
const numeric = z.union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)]);

const formSchema = z.object({
  user_id: numeric,
  username: z.string().optional(),
  transaction_id: z.string(),
  amount: numeric,
  period_count: numeric,
  period_unit: z.string(),
  on_pending: z.enum(['replace', 'keep']).optional(),
  on_approved: z.enum(['continue', 'abort']).optional(),
});

export interface FormResponse {
  status: number;
  body: Record<string, unknown>;
}

function secretMatches(given: string | undefined, expected: string): boolean {
  if (given === undefined) return false;
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function outcomeResponse(outcome: SubmitOutcome): FormResponse {
  switch (outcome.type) {
    case 'created':
      return {
        status: 201,
        body: {
          record_id: outcome.record.id,
          status: outcome.record.status,
          replaced: outcome.replaced.map((r) => r.id),
          admin_notified: outcome.adminNotified,
        },
      };
    case 'conflict':
      return { status: 409, body: { error: 'conflict', conflict: outcome.conflict, record_id: outcome.existing.id } };
    case 'kept_existing':
    case 'aborted':
      return { status: 200, body: { outcome: outcome.type, record_id: outcome.existing.id } };
  }
}

function errorResponse(error: IntakeError): FormResponse {
  switch (error.kind) {
    case 'invalid_claim':
      return { status: 400, body: { error: error.kind, issues: error.issues } };
    case 'duplicate_transaction':
      return { status: 409, body: { error: error.kind, transaction_id: error.transactionId } };
    case 'pending_exists':
    case 'approved_exists':
      return { status: 409, body: { error: error.kind, record_id: error.existing.id } };
    case 'store_unavailable':
      return { status: 503, body: { error: error.kind } };
  }
}

export async function handleFormSubmission(
  intake: IntakeController,
  body: unknown,
  givenSecret: string | undefined,
  expectedSecret: string
): Promise<FormResponse> {
  if (!secretMatches(givenSecret, expectedSecret)) {
    return { status: 401, body: { error: 'unauthorized' } };
  }
  const parsed = formSchema.safeParse(body);
  if (!parsed.success) {
    return { status: 400, body: { error: 'invalid_claim', issues: formatIssues(parsed.error) } };
  }
  const { on_pending, on_approved, ...claim } = parsed.data;
  const result = await intake.submit({ ...claim, source: 'form' }, { pending: on_pending, approved: on_approved });
  return result.ok ? outcomeResponse(result.value) : errorResponse(result.error);
}

export function createFormRouter(intake: IntakeController, secret: string, logger: Logger): Router {
  const router = express.Router();
  router.post('/claims', async (req, res) => {
    try {
      const { status, body } = await handleFormSubmission(intake, req.body, req.get('x-form-secret'), secret);
      res.status(status).json(body);
    } catch (e) {
      logger.error('Form submission error', errorMeta(e));
      res.status(500).json({ error: 'internal_error' });
    }
  });
  return router;
}
