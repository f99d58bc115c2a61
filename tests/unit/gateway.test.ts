import { describe, it, expect } from 'vitest';
import { Api, GrammyError } from 'grammy';
import { TelegramGateway } from '../../src/gateway.js';
import type { PaymentRecord } from '../../src/records.js';
import { T0, silentLogger } from './helpers.js';

const record: PaymentRecord = {
  id: '65a1f0c2e4b0a1b2c3d4e5f6',
  user_id: 42,
  username: 'alice',
  transaction_id: 'TX1',
  amount: 100,
  period_count: 30,
  period_unit: 'day',
  status: 'pending',
  source: 'chat',
  created_at: T0,
};

/** Api whose every call fails with 403, recording method and chat id. */
function refusingApi() {
  const calls: Array<{ method: string; chatId: unknown }> = [];
  const api = new Api('test-token');
  api.config.use(async (_prev, method, payload) => {
    calls.push({ method, chatId: typeof payload === 'object' && payload !== null && 'chat_id' in payload ? payload.chat_id : undefined });
    return { ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' };
  });
  return { api, calls };
}

describe('TelegramGateway', () => {
  it('tries every admin and fails only when none was reached', async () => {
    const { api, calls } = refusingApi();
    const gateway = new TelegramGateway(api, { adminIds: [900, 901] }, silentLogger());

    await expect(gateway.notifyAdmin(record, 'summary')).rejects.toBeInstanceOf(GrammyError);
    expect(calls).toEqual([
      { method: 'sendMessage', chatId: 900 },
      { method: 'sendMessage', chatId: 901 },
    ]);
  });

  it('never throws from the log channel', async () => {
    const { api, calls } = refusingApi();
    const gateway = new TelegramGateway(api, { adminIds: [900], logChannelId: -100123 }, silentLogger());

    await expect(gateway.notifyLog('entry')).resolves.toBeUndefined();
    expect(calls).toEqual([{ method: 'sendMessage', chatId: -100123 }]);
  });

  it('skips the log channel when none is configured', async () => {
    const { api, calls } = refusingApi();
    const gateway = new TelegramGateway(api, { adminIds: [900] }, silentLogger());

    await gateway.notifyLog('entry');
    expect(calls).toEqual([]);
  });

  it('returns null for an unknown username', async () => {
    const { api, calls } = refusingApi();
    const gateway = new TelegramGateway(api, { adminIds: [900] }, silentLogger());

    expect(await gateway.lookupUsername(42)).toBeNull();
    expect(calls).toEqual([{ method: 'getChat', chatId: 42 }]);
  });

  it('forwards evidence as a photo', async () => {
    const { api, calls } = refusingApi();
    const gateway = new TelegramGateway(api, { adminIds: [900] }, silentLogger());

    await expect(gateway.forwardEvidence('file-1', 'caption')).rejects.toBeInstanceOf(GrammyError);
    expect(calls).toEqual([{ method: 'sendPhoto', chatId: 900 }]);
  });
});
