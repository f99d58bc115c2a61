/**
 * Services shared by the intake and decision components, built once at startup.
 */

import type { AppConfig } from './config.js';
import type { MessagingGateway } from './gateway.js';
import type { Logger } from './logger.js';
import type { SubmitterSessions } from './sessions.js';
import type { PaymentStore } from './store.js';

export interface ServiceContext {
  config: AppConfig;
  store: PaymentStore;
  gateway: MessagingGateway;
  sessions: SubmitterSessions;
  logger: Logger;
  now: () => Date;
}
