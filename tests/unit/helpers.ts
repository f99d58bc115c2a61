import { vi } from 'vitest';
import { loadConfig, type AppConfig } from '../../src/config.js';
import type { ServiceContext } from '../../src/context.js';
import type { MessagingGateway } from '../../src/gateway.js';
import type { Logger } from '../../src/logger.js';
import { InMemoryPaymentStore } from '../../src/memory-store.js';
import type { NewPaymentRecord, PaymentRecord } from '../../src/records.js';
import { SubmitterSessions } from '../../src/sessions.js';

export const ADMIN_ID = 900;
export const USER_ID = 42;
export const T0 = new Date('2026-01-01T00:00:00.000Z');

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ BOT_TOKEN: 'test-token', ADMIN_CHAT_ID: String(ADMIN_ID), ...env });
}

export function silentLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

export function fakeGateway() {
  return {
    notifyAdmin: vi.fn<(record: PaymentRecord, summary: string) => Promise<void>>().mockResolvedValue(undefined),
    notifySubmitter: vi.fn<(userId: number, summary: string) => Promise<void>>().mockResolvedValue(undefined),
    notifyLog: vi.fn<(summary: string) => Promise<void>>().mockResolvedValue(undefined),
    forwardEvidence: vi.fn<(imageRef: string, caption: string) => Promise<void>>().mockResolvedValue(undefined),
    lookupUsername: vi.fn<(userId: number) => Promise<string | null>>().mockResolvedValue(null),
  } satisfies MessagingGateway;
}

export class TestClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export function testContext(env: Record<string, string> = {}) {
  const clock = new TestClock();
  const config = testConfig(env);
  const store = new InMemoryPaymentStore();
  const gateway = fakeGateway();
  const ctx: ServiceContext = {
    config,
    store,
    gateway,
    sessions: new SubmitterSessions(config.claimTtlMs, () => clock.now().getTime()),
    logger: silentLogger(),
    now: clock.now,
  };
  return { ctx, clock, store, gateway };
}

export function claim(overrides: Record<string, unknown> = {}) {
  return {
    user_id: USER_ID,
    username: 'alice',
    transaction_id: 'TX1',
    amount: 100,
    period_count: 30,
    period_unit: 'days',
    ...overrides,
  };
}

/** Inserts a pending record straight into the store. */
export async function insertPending(
  store: InMemoryPaymentStore,
  overrides: Partial<NewPaymentRecord> = {}
): Promise<PaymentRecord> {
  const result = await store.insert({
    user_id: USER_ID,
    username: 'alice',
    transaction_id: 'TX1',
    amount: 100,
    period_count: 30,
    period_unit: 'day',
    source: 'chat',
    created_at: T0,
    ...overrides,
  });
  if (!result.ok) throw new Error(`insert failed: ${result.error}`);
  return result.value;
}
