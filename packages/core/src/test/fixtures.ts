import { createDatabase } from '@gatehouse/database';
import { createLogger } from '@gatehouse/observability';
import { EventJournal } from '../events/event-journal.js';
import { EventRepository } from '../events/event-repository.js';
import { TokenRepository } from '../tokens/token-repository.js';
import { TokenService } from '../tokens/token-service.js';
import { UserRepository } from '../users/user-repository.js';
import { UserService } from '../users/user-service.js';
import type { RegisterUserParams } from '../users/user-types.js';

/**
 * Fresh in-memory database with every repository and service wired up
 */
export function createTestContext(options: { sessionTtlSeconds?: number } = {}) {
  const handle = createDatabase(':memory:');
  const logger = createLogger({ level: 'silent' });
  const userRepo = new UserRepository(handle.db);
  const tokenRepo = new TokenRepository(handle.db);
  const eventRepo = new EventRepository(handle.db);

  return {
    db: handle.db,
    close: handle.close,
    logger,
    userRepo,
    tokenRepo,
    eventRepo,
    users: new UserService(userRepo, tokenRepo, eventRepo),
    tokens: new TokenService(tokenRepo, options),
    journal: new EventJournal(eventRepo, logger),
  };
}

export type TestContext = ReturnType<typeof createTestContext>;

export const alice: RegisterUserParams = {
  username: 'alice',
  fullName: 'Alice A',
  email: 'alice@example.com',
  password: 'pw',
};
