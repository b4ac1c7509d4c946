/**
 * User Service
 *
 * Identity store: registration, authentication, confirmation and session
 * resolution. Usernames and emails are compared case-sensitively; callers
 * trim input before it gets here.
 */

import { hashPassword, hashTokenValue, verifyPassword } from '@gatehouse/auth';
import type { UserRow } from '@gatehouse/database';
import type { EventRepository } from '../events/event-repository.js';
import type { TokenRepository } from '../tokens/token-repository.js';
import {
  UserAlreadyConfirmedError,
  UserNotFoundError,
  UserSessionExpiredError,
  UserSessionNotFoundError,
} from './user-errors.js';
import type { UserRepository } from './user-repository.js';
import type { LastLogin, RegisterUserParams, SessionUser, User } from './user-types.js';

export function toUser(row: UserRow): User {
  return {
    username: row.username,
    fullName: row.fullName,
    email: row.email,
    isAdmin: row.admin,
    confirmed: row.confirmed,
    created: row.created,
  };
}

export class UserService {
  constructor(
    private userRepo: UserRepository,
    private tokenRepo: TokenRepository,
    private eventRepo: EventRepository
  ) {}

  /**
   * Hash the password and insert the user
   *
   * Duplicate usernames or emails fail with the storage error; callers
   * check existence first to show a form message.
   */
  async register(params: RegisterUserParams): Promise<void> {
    const hashedPassword = await hashPassword(params.password);
    await this.userRepo.create({
      username: params.username,
      fullName: params.fullName,
      email: params.email,
      hashedPassword,
    });
  }

  async existsByUsername(username: string): Promise<boolean> {
    return this.userRepo.existsByUsername(username);
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.userRepo.existsByEmail(email);
  }

  /**
   * @throws {UserNotFoundError} If the username is unknown
   * @throws {IncorrectPasswordError} If the password does not match
   */
  async authenticate(username: string, password: string): Promise<void> {
    const hashedPassword = await this.userRepo.findPasswordHash(username);
    if (hashedPassword === null) {
      throw new UserNotFoundError(username);
    }
    await verifyPassword(hashedPassword, password);
  }

  async userByName(username: string): Promise<User> {
    const row = await this.userRepo.findByUsername(username);
    if (!row) {
      throw new UserNotFoundError(username);
    }
    return toUser(row);
  }

  /**
   * Resolve a session token value to its user, with last-login details.
   * An expired session row is removed before failing.
   */
  async userBySessionToken(value: string): Promise<SessionUser> {
    const hashedValue = hashTokenValue(value);
    const session = await this.userRepo.findBySessionHash(hashedValue);
    if (!session) {
      throw new UserSessionNotFoundError();
    }

    if (session.expires.getTime() <= Date.now()) {
      await this.tokenRepo.delete('session', hashedValue);
      throw new UserSessionExpiredError();
    }

    const user = toUser(session.user);
    return { ...user, lastLogin: await this.lastLogin(user.username) };
  }

  async usernameByEmail(email: string): Promise<string> {
    const username = await this.userRepo.findUsernameByEmail(email);
    if (username === null) {
      throw new UserNotFoundError(email);
    }
    return username;
  }

  /**
   * @throws {UserAlreadyConfirmedError} If the flag is already set
   * @throws {UserNotFoundError} If no such user
   */
  async confirmUser(username: string): Promise<void> {
    const changed = await this.userRepo.markConfirmed(username);
    if (changed > 0) {
      return;
    }
    if (await this.userRepo.existsByUsername(username)) {
      throw new UserAlreadyConfirmedError(username);
    }
    throw new UserNotFoundError(username);
  }

  async updatePassword(username: string, password: string): Promise<void> {
    const hashedPassword = await hashPassword(password);
    const changed = await this.userRepo.updatePasswordHash(username, hashedPassword);
    if (changed === 0) {
      throw new UserNotFoundError(username);
    }
  }

  /**
   * The login before the current one, or empty values if there is none
   */
  async lastLogin(username: string): Promise<LastLogin> {
    const record = await this.eventRepo.findPreviousLogin(username);
    if (!record) {
      return { time: null, result: '' };
    }
    return { time: record.created, result: record.success ? 'success' : 'failure' };
  }

  async listUsers(): Promise<User[]> {
    const rows = await this.userRepo.list();
    return rows.map(toUser);
  }
}
