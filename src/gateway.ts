/**
 * Messaging gateway port and its Telegram implementation.
 */

import type { Api } from 'grammy';
import { decisionKeyboard } from './callback-data.js';
import { errorMeta, type Logger } from './logger.js';
import type { PaymentRecord } from './records.js';

export interface MessagingGateway {
  /** Sends the summary with Approve/Reject buttons bound to `record.id` to every admin chat. */
  notifyAdmin(record: PaymentRecord, summary: string): Promise<void>;
  notifySubmitter(userId: number, summary: string): Promise<void>;
  /** Best effort; never throws. */
  notifyLog(summary: string): Promise<void>;
  /** Sends an image held by the platform to every admin chat. */
  forwardEvidence(imageRef: string, caption: string): Promise<void>;
  /** Current username, or null when unknown. */
  lookupUsername(userId: number): Promise<string | null>;
}

export interface TelegramGatewayOptions {
  adminIds: number[];
  logChannelId?: number;
}

export class TelegramGateway implements MessagingGateway {
  constructor(
    private readonly api: Api,
    private readonly options: TelegramGatewayOptions,
    private readonly logger: Logger
  ) {}

  async notifyAdmin(record: PaymentRecord, summary: string): Promise<void> {
    await this.toAdmins('notifyAdmin', (chatId) =>
      this.api.sendMessage(chatId, summary, { reply_markup: decisionKeyboard(record.id) })
    );
  }

  async notifySubmitter(userId: number, summary: string): Promise<void> {
    await this.api.sendMessage(userId, summary);
  }

  async notifyLog(summary: string): Promise<void> {
    const chatId = this.options.logChannelId;
    if (chatId === undefined) return;
    try {
      await this.api.sendMessage(chatId, summary);
    } catch (e) {
      this.logger.warn('Send to log channel failed', errorMeta(e));
    }
  }

  async forwardEvidence(imageRef: string, caption: string): Promise<void> {
    await this.toAdmins('forwardEvidence', (chatId) => this.api.sendPhoto(chatId, imageRef, { caption }));
  }

  async lookupUsername(userId: number): Promise<string | null> {
    try {
      const chat = await this.api.getChat(userId);
      return 'username' in chat && typeof chat.username === 'string' ? chat.username : null;
    } catch (e) {
      this.logger.debug('getChat failed', { userId, ...errorMeta(e) });
      return null;
    }
  }

  /** Fails only when no admin chat received the message. */
  private async toAdmins(what: string, send: (chatId: number) => Promise<unknown>): Promise<void> {
    let delivered = 0;
    let lastError: unknown;
    for (const chatId of this.options.adminIds) {
      try {
        await send(chatId);
        delivered++;
      } catch (e) {
        lastError = e;
        this.logger.error('Send to admin failed', { what, adminChatId: chatId, ...errorMeta(e) });
      }
    }
    if (delivered === 0 && this.options.adminIds.length > 0) {
      throw lastError instanceof Error ? lastError : new Error(`${what}: no admin chat reachable`);
    }
  }
}
