import { describe, it, expect, beforeEach, vi } from 'vitest';
import { handleFormSubmission } from '../../src/form.js';
import { IntakeController } from '../../src/intake.js';
import { testContext } from './helpers.js';

const SECRET = 'test-secret';

const body = {
  user_id: '42',
  username: 'alice',
  transaction_id: 'F1',
  amount: '250',
  period_count: '1',
  period_unit: 'month',
};

describe('handleFormSubmission', () => {
  let t: ReturnType<typeof testContext>;
  let intake: IntakeController;

  beforeEach(() => {
    t = testContext();
    intake = new IntakeController(t.ctx);
  });

  it('rejects a missing or wrong secret', async () => {
    expect(await handleFormSubmission(intake, body, undefined, SECRET)).toEqual({
      status: 401,
      body: { error: 'unauthorized' },
    });
    expect(await handleFormSubmission(intake, body, 'wrong', SECRET)).toEqual({
      status: 401,
      body: { error: 'unauthorized' },
    });
    expect(await t.store.findByTransactionId('F1')).toBeNull();
  });

  it('creates a form-sourced record', async () => {
    const res = await handleFormSubmission(intake, body, SECRET, SECRET);
    const stored = await t.store.findByTransactionId('F1');

    expect(stored).toMatchObject({ user_id: 42, amount: 250, period_unit: 'month', source: 'form', status: 'pending' });
    expect(res).toEqual({
      status: 201,
      body: { record_id: stored?.id, status: 'pending', replaced: [], admin_notified: true },
    });
  });

  it('reports shape and claim errors as 400', async () => {
    const withoutId = { user_id: '42', amount: '250', period_count: '1', period_unit: 'month' };
    expect(await handleFormSubmission(intake, withoutId, SECRET, SECRET)).toEqual({
      status: 400,
      body: { error: 'invalid_claim', issues: ['transaction_id: Required'] },
    });
    expect(await handleFormSubmission(intake, { ...body, amount: '0' }, SECRET, SECRET)).toEqual({
      status: 400,
      body: { error: 'invalid_claim', issues: ['amount: must be positive'] },
    });
  });

  it('maps conflicts, answers and duplicates', async () => {
    await handleFormSubmission(intake, body, SECRET, SECRET);
    const first = await t.store.findByTransactionId('F1');

    const second = { ...body, transaction_id: 'F2' };
    expect(await handleFormSubmission(intake, second, SECRET, SECRET)).toEqual({
      status: 409,
      body: { error: 'conflict', conflict: 'pending', record_id: first?.id },
    });
    expect(await handleFormSubmission(intake, { ...second, on_pending: 'keep' }, SECRET, SECRET)).toEqual({
      status: 200,
      body: { outcome: 'kept_existing', record_id: first?.id },
    });
    expect(await handleFormSubmission(intake, body, SECRET, SECRET)).toEqual({
      status: 409,
      body: { error: 'duplicate_transaction', transaction_id: 'F1' },
    });
  });

  it.each([
    [{ user_id: null, amount: true }, ['user_id', 'amount']],
    [{ amount: '' }, ['amount']],
    [{ period_count: '12abc' }, ['period_count']],
    [{ user_id: false }, ['user_id']],
  ])('rejects non-numeric field values %o', async (overrides, fields) => {
    const res = await handleFormSubmission(intake, { ...body, ...overrides }, SECRET, SECRET);
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('invalid_claim');
    expect(res.body.issues).toEqual(fields.map((f) => expect.stringMatching(new RegExp(`^${f}: `))));
    expect(await t.store.findByTransactionId('F1')).toBeNull();
  });

  it('answers 503 when the store is down', async () => {
    vi.spyOn(t.store, 'findByTransactionId').mockRejectedValueOnce(new Error('connection refused'));
    expect(await handleFormSubmission(intake, body, SECRET, SECRET)).toEqual({
      status: 503,
      body: { error: 'store_unavailable' },
    });
  });
});
