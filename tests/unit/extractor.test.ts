import { describe, it, expect } from 'vitest';
import { extractClaim, usernameMatches } from '../../src/extractor.js';

const TEMPLATE = [
  '✅ I have successfully completed the payment.',
  '📱 Telegram Username: @alice_01',
  '💳 Transaction ID: T12345',
  '💰 Amount Paid: ₹100',
  '⏳ Time Period: 30 Days',
].join('\n');

describe('extractClaim', () => {
  it('reads the submission template', () => {
    expect(extractClaim(TEMPLATE)).toEqual({
      username: 'alice_01',
      transaction_id: 'T12345',
      amount: 100,
      period_count: 30,
      period_unit: 'Days',
    });
  });

  it('accepts plain labels in any case', () => {
    const text = 'telegram username: bob\ntransaction id: abc-9\namount: $ 250\nperiod: 1month';
    expect(extractClaim(text)).toEqual({
      username: 'bob',
      transaction_id: 'abc-9',
      amount: 250,
      period_count: 1,
      period_unit: 'month',
    });
  });

  it('returns null when a field is missing', () => {
    expect(extractClaim(TEMPLATE.replace('💰 Amount Paid: ₹100', ''))).toBeNull();
    expect(extractClaim('hello')).toBeNull();
  });
});

describe('usernameMatches', () => {
  it('compares case-insensitively', () => {
    expect(usernameMatches('Alice', 'alice')).toBe(true);
    expect(usernameMatches('alice', 'bob')).toBe(false);
  });

  it('fails when the sender has no username', () => {
    expect(usernameMatches('alice', undefined)).toBe(false);
  });
});
