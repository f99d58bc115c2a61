/**
 * Telegram bot: submissions, screenshots, admin decisions and conflict answers.
 */

import type { Bot, Context } from 'grammy';
import { TtlCache } from './cache.js';
import { applyAnswer, choiceKeyboard, parseCallbackData } from './callback-data.js';
import type { ClaimInput } from './claim.js';
import { isAdmin } from './config.js';
import type { ServiceContext } from './context.js';
import type { DecisionEngine } from './decision.js';
import { extractClaim, usernameMatches } from './extractor.js';
import type { IntakeController, IntakeError, SubmitChoice } from './intake.js';
import { errorMeta } from './logger.js';
import {
  ADMIN_START_TEXT,
  START_TEXT,
  alreadyDecidedText,
  cancelledMessage,
  conflictQuestion,
  decisionStamp,
  extractRequestId,
  submissionReceived,
} from './messages.js';

const PROCESSED_TTL_MS = 24 * 60 * 60 * 1000;
const PROCESSED_MAX_SIZE = 10_000;

const REPLY_GENERIC_FAILURE = '❌ Something went wrong. Please try again later.';
const REPLY_UNPARSED =
  "I couldn't understand your message. Please use the payment format, or send a screenshot. Type /start for instructions.";
const REPLY_SEND_CLAIM_FIRST = 'Please send your payment details first, then the screenshot.';
const REPLY_TEXT_ONLY = 'Please send your payment details as text, or the payment screenshot as a photo.';

function intakeErrorText(error: IntakeError): string {
  switch (error.kind) {
    case 'invalid_claim':
      return `Some details look wrong:\n${error.issues.map((i) => `- ${i}`).join('\n')}`;
    case 'duplicate_transaction':
      return `⚠️ Transaction ID ${error.transactionId} has already been submitted and cannot be used again.`;
    case 'pending_exists':
      return 'You already have a pending request. Wait for the admin, or send /cancel first.';
    case 'approved_exists':
      return 'You already have an active approved payment.';
    case 'store_unavailable':
      return REPLY_GENERIC_FAILURE;
  }
}

function displayName(from: { id: number; username?: string }): string {
  return from.username ? `@${from.username} (ID: ${from.id})` : `ID: ${from.id}`;
}

export interface BotServices {
  ctx: ServiceContext;
  intake: IntakeController;
  decisions: DecisionEngine;
}

/** Installs the update handlers on a bot whose `api` already backs `services.gateway`. */
export function registerHandlers(bot: Bot, { ctx: services, intake, decisions }: BotServices): Bot {
  const { config, logger, sessions } = services;
  const processedUpdates = new TtlCache<number, true>(PROCESSED_TTL_MS, PROCESSED_MAX_SIZE);

  async function submitAndReply(ctx: Context, userId: number, claim: ClaimInput, choice: SubmitChoice): Promise<void> {
    const result = await intake.submit(claim, choice);
    if (!result.ok) {
      await ctx.reply(intakeErrorText(result.error));
      return;
    }
    const outcome = result.value;
    switch (outcome.type) {
      case 'created':
        await ctx.reply(submissionReceived(outcome.record));
        return;
      case 'conflict':
        sessions.holdClaim(userId, { claim, conflict: outcome.conflict, existing_id: outcome.existing.id, choice });
        await ctx.reply(conflictQuestion(outcome.conflict, outcome.existing), {
          reply_markup: choiceKeyboard(outcome.conflict),
        });
        return;
      case 'kept_existing':
        await ctx.reply('Kept your existing request. The new submission was discarded.');
        return;
      case 'aborted':
        await ctx.reply('Submission aborted.');
        return;
    }
  }

  bot.use(async (ctx, next) => {
    const updateId = ctx.update.update_id;
    if (processedUpdates.has(updateId)) {
      logger.info('Update skipped (already processed)', { updateId });
      return;
    }
    processedUpdates.set(updateId, true);
    await next();
  });

  bot.on('callback_query:data', async (ctx) => {
    let answered = false;
    const safeAnswer = async (text?: string) => {
      if (answered) return;
      try {
        await ctx.answerCallbackQuery(text ? { text } : {});
        answered = true;
      } catch (e) {
        logger.error('answerCallbackQuery failed', errorMeta(e));
      }
    };
    try {
      const data = ctx.callbackQuery.data;
      const from = ctx.callbackQuery.from;
      logger.info('Callback received', { data, fromId: from.id });
      const payload = parseCallbackData(data);
      if (!payload) {
        await safeAnswer('Unknown button.');
        return;
      }

      if (payload.type === 'choice') {
        const held = sessions.takeClaim(from.id);
        if (!held) {
          await safeAnswer('This question has expired. Please send your details again.');
          return;
        }
        const choice = applyAnswer(held, payload.answer);
        if (!choice) {
          sessions.holdClaim(from.id, held);
          await safeAnswer('That button belongs to an earlier question.');
          return;
        }
        await safeAnswer();
        await submitAndReply(ctx, from.id, held.claim, choice);
        try {
          await ctx.editMessageReplyMarkup({ reply_markup: { inline_keyboard: [] } });
        } catch (e) {
          logger.warn('Removing choice buttons failed', errorMeta(e));
        }
        return;
      }

      const adminName = displayName(from);
      const result = await decisions.decide(payload.recordId, payload.action, { id: from.id, name: adminName });
      if (!result.ok) {
        const error = result.error;
        if (error.kind === 'unauthorized') await safeAnswer('Only the admin can approve or reject.');
        else if (error.kind === 'not_found') await safeAnswer('Payment request not found.');
        else if (error.kind === 'already_decided') await safeAnswer(alreadyDecidedText(error.record));
        else await safeAnswer('Error, please try again.');
        return;
      }

      const { record, submitterNotified } = result.value;
      await safeAnswer(`Payment ${record.status}`);
      const msg = ctx.callbackQuery.message;
      if (msg && 'text' in msg && msg.text) {
        let stamp = decisionStamp(record.status, adminName, record.decided_at ?? services.now());
        if (!submitterNotified) stamp += '\n⚠️ The submitter could not be notified.';
        await ctx.editMessageText(`${msg.text}\n\n${stamp}`, { reply_markup: { inline_keyboard: [] } });
      }
    } catch (e) {
      logger.error('Callback error', errorMeta(e));
      await safeAnswer('Error, please try again.');
    } finally {
      await safeAnswer();
    }
  });

  bot.on('message:text', async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    const text = ctx.message.text.trim();

    if (text === '/start') {
      await ctx.reply(isAdmin(config, from.id) ? ADMIN_START_TEXT : START_TEXT);
      return;
    }

    if (text === '/cancel') {
      const result = await intake.cancel(from.id);
      if (result.ok) await ctx.reply(cancelledMessage(result.value));
      else if (result.error.kind === 'not_found') await ctx.reply('You have no pending request.');
      else if (result.error.kind === 'already_decided') await ctx.reply(alreadyDecidedText(result.error.record));
      else await ctx.reply(REPLY_GENERIC_FAILURE);
      return;
    }

    const extracted = extractClaim(text);
    if (!extracted) {
      await ctx.reply(REPLY_UNPARSED);
      return;
    }
    if (!usernameMatches(extracted.username, from.username)) {
      await ctx.reply(
        `⚠️ The Telegram Username in your message (@${extracted.username}) does not match your current username (${
          from.username ? `@${from.username}` : 'none'
        }). Please make sure they match.`
      );
      return;
    }

    try {
      await submitAndReply(ctx, from.id, { ...extracted, user_id: from.id, source: 'chat' }, {});
    } catch (e) {
      logger.error('Submission reply failed', { userId: from.id, ...errorMeta(e) });
      await ctx.reply(REPLY_GENERIC_FAILURE);
    }
  });

  bot.on('message:photo', async (ctx) => {
    const from = ctx.from;
    if (!from) return;
    const photo = ctx.message.photo;
    const fileId = photo[photo.length - 1].file_id;
    const replyTo = ctx.message.reply_to_message;
    const replyRecordId = replyTo && replyTo.from?.id === ctx.me.id ? extractRequestId(replyTo.text) : null;

    const result = await intake.attach({
      user_id: from.id,
      username: from.username ?? '',
      image_ref: fileId,
      reply_record_id: replyRecordId,
    });
    if (!result.ok) {
      const error = result.error;
      if (error.kind === 'no_claim') await ctx.reply(REPLY_SEND_CLAIM_FIRST);
      else if (error.kind === 'not_found') await ctx.reply('That payment request was not found.');
      else if (error.kind === 'already_decided') await ctx.reply(alreadyDecidedText(error.record));
      else await ctx.reply(REPLY_GENERIC_FAILURE);
      return;
    }
    const outcome = result.value;
    if (outcome.type === 'attached') {
      await ctx.reply(
        outcome.evidenceForwarded
          ? '📸 Screenshot received and attached to your request. Admins will check it.'
          : '📸 Screenshot saved, but forwarding it to the admin failed. Please try again.'
      );
    } else {
      await ctx.reply(
        outcome.forwarded
          ? `📸 Screenshot received, but it is not linked to a request. ${REPLY_SEND_CLAIM_FIRST}`
          : '❌ There was an issue forwarding your screenshot to the admin. Please try again.'
      );
    }
  });

  bot.on(['message:sticker', 'message:animation', 'message:video', 'message:audio', 'message:voice', 'message:document'], async (ctx) => {
    await ctx.reply(REPLY_TEXT_ONLY);
  });

  bot.catch((err) => {
    logger.error('Bot error', { error: err.message, stack: err.stack, updateId: err.ctx.update.update_id });
  });

  return bot;
}
