import { describe, it, expect } from 'vitest';
import { applyAnswer, choiceKeyboard, decisionKeyboard, parseCallbackData } from '../../src/callback-data.js';

const ID = '65a1f0c2e4b0a1b2c3d4e5f6';

describe('parseCallbackData', () => {
  it('parses decision buttons', () => {
    expect(parseCallbackData(`approve_${ID}`)).toEqual({ type: 'decision', action: 'approve', recordId: ID });
    expect(parseCallbackData(`reject_${ID}`)).toEqual({ type: 'decision', action: 'reject', recordId: ID });
  });

  it('parses choice buttons', () => {
    expect(parseCallbackData('choice_keep')).toEqual({ type: 'choice', answer: 'keep' });
    expect(parseCallbackData('choice_continue')).toEqual({ type: 'choice', answer: 'continue' });
  });

  it.each(['approve_123', `delete_${ID}`, 'choice_maybe', ''])('ignores %j', (data) => {
    expect(parseCallbackData(data)).toBeNull();
  });
});

describe('keyboards', () => {
  it('binds both decision buttons to the record', () => {
    expect(decisionKeyboard(ID).inline_keyboard).toEqual([
      [
        { text: '✅ Approve', callback_data: `approve_${ID}` },
        { text: '❌ Reject', callback_data: `reject_${ID}` },
      ],
    ]);
  });

  it('offers the answers for each conflict', () => {
    expect(choiceKeyboard('pending').inline_keyboard[0].map((b) => b.text)).toEqual(['Replace', 'Keep old']);
    expect(choiceKeyboard('approved').inline_keyboard[0].map((b) => b.text)).toEqual(['Continue', 'Abort']);
  });

  it('keeps earlier answers when folding in a new one', () => {
    const claim = { user_id: 1, transaction_id: 'TX2', amount: 1, period_count: 1, period_unit: 'day' };
    expect(
      applyAnswer({ claim, conflict: 'approved', existing_id: 'r1', choice: { pending: 'replace', pendingFor: 'r0' } }, 'continue')
    ).toEqual({ pending: 'replace', pendingFor: 'r0', approved: 'continue' });
    expect(applyAnswer({ claim, conflict: 'pending', existing_id: 'r0', choice: {} }, 'keep')).toEqual({
      pending: 'keep',
      pendingFor: 'r0',
    });
  });

  it('refuses an answer to the other question', () => {
    const claim = { user_id: 1, transaction_id: 'TX2', amount: 1, period_count: 1, period_unit: 'day' };
    expect(applyAnswer({ claim, conflict: 'pending', existing_id: 'r0', choice: {} }, 'continue')).toBeNull();
    expect(applyAnswer({ claim, conflict: 'approved', existing_id: 'r1', choice: {} }, 'replace')).toBeNull();
  });
});
