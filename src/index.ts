/**
 * Bootstrap: config, record store, webhook or long-poll, HTTP server, cron jobs.
 */

import dotenv from 'dotenv';
import express from 'express';
import cron from 'node-cron';
import { Bot, webhookCallback } from 'grammy';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger, errorMeta, type Logger } from './logger.js';
import { connectDatabase } from './db.js';
import { InMemoryPaymentStore } from './memory-store.js';
import { MongoPaymentStore, createPaymentRequestModel } from './mongo-store.js';
import type { PaymentStore } from './store.js';
import { SubmitterSessions } from './sessions.js';
import { IntakeController } from './intake.js';
import { DecisionEngine } from './decision.js';
import { TelegramGateway } from './gateway.js';
import { registerHandlers } from './bot.js';
import { createFormRouter } from './form.js';
import { sendExpiryReminders } from './reminders.js';
import type { ServiceContext } from './context.js';

async function openStore(config: AppConfig, logger: Logger): Promise<PaymentStore> {
  if (!config.mongo.uri) {
    logger.warn('MONGO_URI not set, records are kept in memory and lost on restart');
    return new InMemoryPaymentStore();
  }
  const connection = await connectDatabase(config.mongo.uri, config.mongo.dbName, logger);
  const model = createPaymentRequestModel(connection);
  await model.syncIndexes();
  return new MongoPaymentStore(model);
}

function startCron(ctx: ServiceContext): void {
  const { config, logger } = ctx;
  cron.schedule('*/5 * * * *', () => {
    const removed = ctx.sessions.prune();
    if (removed > 0) logger.debug('Sessions pruned', { removed });
  });
  if (config.expiryReminderDays > 0) {
    cron.schedule(
      '0 10 * * *',
      async () => {
        try {
          await sendExpiryReminders(ctx, config.expiryReminderDays);
        } catch (e) {
          logger.error('Expiry reminder job error', errorMeta(e));
        }
      },
      { timezone: config.cronTimezone }
    );
  }
  logger.info('Cron: session prune every 5 min, expiry reminders daily at 10:00', {
    timezone: config.cronTimezone,
    reminderDays: config.expiryReminderDays,
  });
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const store = await openStore(config, logger);

  const bot = new Bot(config.telegram.token);
  const ctx: ServiceContext = {
    config,
    store,
    logger,
    sessions: new SubmitterSessions(config.claimTtlMs),
    gateway: new TelegramGateway(
      bot.api,
      { adminIds: config.telegram.adminIds, logChannelId: config.telegram.logChannelId },
      logger
    ),
    now: () => new Date(),
  };
  const intake = new IntakeController(ctx);
  const decisions = new DecisionEngine(ctx);
  registerHandlers(bot, { ctx, intake, decisions });

  const app = express();
  app.use(express.json());

  if (config.http.formSecret) {
    app.use(createFormRouter(intake, config.http.formSecret, logger));
  }

  if (config.telegram.mode === 'webhook') {
    app.post(
      '/webhook',
      webhookCallback(bot, 'express', config.telegram.webhookSecret ? { secretToken: config.telegram.webhookSecret } : undefined)
    );
  }

  app.listen(config.http.port, () => {
    logger.info('HTTP server listening', { port: config.http.port, mode: config.telegram.mode });
  });
  startCron(ctx);

  if (config.telegram.mode !== 'webhook') {
    bot
      .start({
        onStart: (info) => logger.info('Bot started', { username: info.username }),
      })
      .catch((e) => {
        logger.error('Polling stopped', errorMeta(e));
        process.exit(1);
      });
  }
}

main().catch((e) => {
  createLogger('error').error('Fatal', errorMeta(e));
  process.exit(1);
});
