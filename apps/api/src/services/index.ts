/**
 * Service Registry
 *
 * Builds every store and collaborator from the validated configuration.
 * Tests pass an in-memory database and a fake mail transport.
 */

import { Mailer, type MailTransport } from '@gatehouse/auth';
import { createStores, type EventJournal, type TokenService, type UserService } from '@gatehouse/core';
import { createDatabase, type DatabaseHandle } from '@gatehouse/database';
import { createLogger, type Logger } from '@gatehouse/observability';
import { Broadcaster } from '@gatehouse/sse';
import type { AppConfig } from '../config.js';

export interface Services {
  config: AppConfig;
  logger: Logger;
  users: UserService;
  tokens: TokenService;
  journal: EventJournal;
  mailer: Mailer;
  broadcaster: Broadcaster;
  /** Close SSE streams, then the database */
  close: () => Promise<void>;
}

export interface ServiceOverrides {
  database?: DatabaseHandle;
  mailTransport?: MailTransport;
  logger?: Logger;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel, name: config.appName });
  const database = overrides.database ?? createDatabase(config.databasePath);

  const stores = createStores(database.db, {
    sessionTtlSeconds: config.sessionTtlSeconds,
    logger,
  });

  const mailer = new Mailer(config.smtp, { transport: overrides.mailTransport, logger });

  const broadcaster = new Broadcaster({
    queueCapacity: config.sse.queueCapacity,
    overflow: config.sse.overflow,
    logger,
  });
  for (const event of config.sse.events) {
    broadcaster.registerEvent(event);
  }
  broadcaster.run();

  return {
    config,
    logger,
    ...stores,
    mailer,
    broadcaster,
    close: async () => {
      await broadcaster.close();
      database.close();
    },
  };
}
