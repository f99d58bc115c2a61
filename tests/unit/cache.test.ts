import { describe, it, expect } from 'vitest';
import { TtlCache } from '../../src/cache.js';
import { SubmitterSessions } from '../../src/sessions.js';

describe('TtlCache', () => {
  it('expires entries after the ttl', () => {
    let now = 0;
    const cache = new TtlCache<string, number>(1000, 10, () => now);
    cache.set('a', 1);
    now = 1000;
    expect(cache.get('a')).toBe(1);
    now = 1001;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('evicts the oldest entry when full', () => {
    const cache = new TtlCache<string, number>(1000, 2, () => 0);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 3);
    cache.set('c', 4);
    expect(cache.has('b')).toBe(false);
    expect(cache.get('a')).toBe(3);
    expect(cache.get('c')).toBe(4);
  });

  it('prunes expired entries', () => {
    let now = 0;
    const cache = new TtlCache<string, number>(100, 10, () => now);
    cache.set('a', 1);
    now = 50;
    cache.set('b', 2);
    now = 120;
    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
  });
});

describe('SubmitterSessions', () => {
  it('forgets a record only when it is the remembered one', () => {
    const sessions = new SubmitterSessions(1000, () => 0);
    sessions.rememberRecord(1, 'r2');
    sessions.forgetRecord(1, 'r1');
    expect(sessions.recordFor(1)).toBe('r2');
    sessions.forgetRecord(1, 'r2');
    expect(sessions.recordFor(1)).toBeUndefined();
  });

  it('hands out a held claim once', () => {
    const sessions = new SubmitterSessions(1000, () => 0);
    const held = {
      claim: { user_id: 1, transaction_id: 'TX1', amount: 1, period_count: 1, period_unit: 'day' },
      conflict: 'pending' as const,
      existing_id: 'r1',
      choice: {},
    };
    sessions.holdClaim(1, held);
    expect(sessions.takeClaim(1)).toEqual(held);
    expect(sessions.takeClaim(1)).toBeUndefined();
  });

  it('drops held claims after the ttl', () => {
    let now = 0;
    const sessions = new SubmitterSessions(1000, () => now);
    sessions.rememberRecord(1, 'r1');
    sessions.holdClaim(2, {
      claim: { user_id: 2, transaction_id: 'TX2', amount: 1, period_count: 1, period_unit: 'day' },
      conflict: 'approved',
      existing_id: 'r0',
      choice: {},
    });
    now = 2000;
    expect(sessions.prune()).toBe(2);
    expect(sessions.takeClaim(2)).toBeUndefined();
  });
});
