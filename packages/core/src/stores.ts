import type { AuthDatabase } from '@gatehouse/database';
import type { Logger } from '@gatehouse/observability';
import { EventJournal } from './events/event-journal.js';
import { EventRepository } from './events/event-repository.js';
import { TokenRepository } from './tokens/token-repository.js';
import { TokenService } from './tokens/token-service.js';
import { UserRepository } from './users/user-repository.js';
import { UserService } from './users/user-service.js';

export interface StoreOptions {
  sessionTtlSeconds?: number;
  logger: Logger;
}

export interface Stores {
  users: UserService;
  tokens: TokenService;
  journal: EventJournal;
}

/**
 * Wire repositories and services over one database handle
 */
export function createStores(db: AuthDatabase, options: StoreOptions): Stores {
  const userRepository = new UserRepository(db);
  const tokenRepository = new TokenRepository(db);
  const eventRepository = new EventRepository(db);

  return {
    users: new UserService(userRepository, tokenRepository, eventRepository),
    tokens: new TokenService(tokenRepository, { sessionTtlSeconds: options.sessionTtlSeconds }),
    journal: new EventJournal(eventRepository, options.logger),
  };
}
