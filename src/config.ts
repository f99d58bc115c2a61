/**
 * Central config: environment variables validated into an explicit AppConfig.
 */

import { z } from 'zod';
import type { LogLevel } from './logger.js';

const idList = z
  .string()
  .default('')
  .transform((s) =>
    s
      .split(',')
      .map((part) => Number(part.trim()))
      .filter((n) => Number.isInteger(n) && n !== 0)
  );

const optionalString = z
  .string()
  .optional()
  .transform((s) => (s && s.trim() !== '' ? s.trim() : undefined));

const envSchema = z.object({
  BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
  TELEGRAM_MODE: z.enum(['webhook', 'long_poll']).default('long_poll'),
  WEBHOOK_SECRET: optionalString,
  /** One or more Telegram user IDs, comma-separated (e.g. "123,456"). */
  ADMIN_CHAT_ID: idList.refine((ids) => ids.length > 0, 'ADMIN_CHAT_ID must name at least one admin'),
  LOG_CHANNEL_ID: optionalString.pipe(z.coerce.number().int().optional()),
  MONGO_URI: optionalString,
  MONGO_DB_NAME: z.string().default('payment_approvals'),
  PORT: z.coerce.number().int().positive().default(3000),
  FORM_SECRET: optionalString,
  PENDING_CONFLICT_POLICY: z.enum(['ask', 'block']).default('ask'),
  APPROVED_CONFLICT_POLICY: z.enum(['warn', 'block', 'allow']).default('warn'),
  UNCORRELATED_SCREENSHOTS: z.enum(['forward', 'reject']).default('forward'),
  CLAIM_TTL_MINUTES: z.coerce.number().positive().default(10),
  EXPIRY_REMINDER_DAYS: z.coerce.number().int().min(0).default(3),
  CRON_TIMEZONE: z.string().default('UTC'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type PendingConflictPolicy = 'ask' | 'block';
export type ApprovedConflictPolicy = 'warn' | 'block' | 'allow';

export interface AppConfig {
  telegram: {
    token: string;
    mode: 'webhook' | 'long_poll';
    webhookSecret?: string;
    adminIds: number[];
    logChannelId?: number;
  };
  mongo: {
    uri?: string;
    dbName: string;
  };
  http: {
    port: number;
    formSecret?: string;
  };
  policy: {
    pendingConflict: PendingConflictPolicy;
    approvedConflict: ApprovedConflictPolicy;
    uncorrelatedScreenshots: 'forward' | 'reject';
  };
  claimTtlMs: number;
  expiryReminderDays: number;
  cronTimezone: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const env = parsed.data;
  return {
    telegram: {
      token: env.BOT_TOKEN,
      mode: env.TELEGRAM_MODE,
      webhookSecret: env.WEBHOOK_SECRET,
      adminIds: env.ADMIN_CHAT_ID,
      logChannelId: env.LOG_CHANNEL_ID,
    },
    mongo: {
      uri: env.MONGO_URI,
      dbName: env.MONGO_DB_NAME,
    },
    http: {
      port: env.PORT,
      formSecret: env.FORM_SECRET,
    },
    policy: {
      pendingConflict: env.PENDING_CONFLICT_POLICY,
      approvedConflict: env.APPROVED_CONFLICT_POLICY,
      uncorrelatedScreenshots: env.UNCORRELATED_SCREENSHOTS,
    },
    claimTtlMs: env.CLAIM_TTL_MINUTES * 60 * 1000,
    expiryReminderDays: env.EXPIRY_REMINDER_DAYS,
    cronTimezone: env.CRON_TIMEZONE,
    logLevel: env.LOG_LEVEL,
  };
}

/** True if userId is one of the configured admins. */
export function isAdmin(config: Pick<AppConfig, 'telegram'>, userId: number): boolean {
  return config.telegram.adminIds.includes(userId);
}
