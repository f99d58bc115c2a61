/**
 * Claim: the structured submission asserting a payment was made.
 */

import { z } from 'zod';
import { normalizePeriodUnit } from './period.js';
import { err, ok, type Result } from './result.js';

export const claimSchema = z.object({
  user_id: z.number().int(),
  username: z.string().trim().default(''),
  transaction_id: z.string().trim().min(1, 'must not be empty'),
  amount: z.number().int('must be a whole number').positive('must be positive'),
  period_count: z.number().int('must be a whole number').positive('must be positive'),
  period_unit: z.string().transform((raw, ctx) => {
    const unit = normalizePeriodUnit(raw);
    if (!unit) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown unit "${raw}" (day, month or year)` });
      return z.NEVER;
    }
    return unit;
  }),
  source: z.enum(['chat', 'form']).default('chat'),
});

export type ClaimInput = z.input<typeof claimSchema>;
export type Claim = z.output<typeof claimSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}

export function parseClaim(input: unknown): Result<Claim, string[]> {
  const parsed = claimSchema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(formatIssues(parsed.error));
}
