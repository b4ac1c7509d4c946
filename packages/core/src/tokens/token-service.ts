/**
 * Token Service
 *
 * Issues, resolves and revokes opaque tokens. Only SHA-256 hashes are
 * persisted; expiry is an absolute timestamp checked against wall time.
 */

import { TOKEN_KIND_DEFAULTS, generateTokenValue, hashTokenValue, tokenLifetimeMs } from '@gatehouse/auth';
import type { TokenKind } from '@gatehouse/types';
import { UserNotFoundError } from '../users/user-errors.js';
import type { TokenRepository } from './token-repository.js';
import { InvalidTokenSizeError, TokenNotFoundError, tokenExpiredError } from './token-errors.js';
import type { IssuedToken, TokenServiceOptions } from './token-types.js';

export class TokenService {
  constructor(
    private tokenRepo: TokenRepository,
    private options: TokenServiceOptions = {}
  ) {}

  /**
   * Create a token of `size` random bytes valid for `durationMs`.
   *
   * An empty username is a successful no-op returning an empty value, so
   * flows that must not reveal whether an account exists take the same path.
   *
   * @throws {InvalidTokenSizeError} If size is not a positive integer
   * @throws {UserNotFoundError} If the owner does not exist
   */
  async create(kind: TokenKind, username: string, size: number, durationMs: number): Promise<IssuedToken> {
    if (!Number.isInteger(size) || size <= 0) {
      throw new InvalidTokenSizeError(size);
    }

    const expires = new Date(Date.now() + durationMs);
    if (!username) {
      return { value: '', expires };
    }

    const value = generateTokenValue(size);
    const inserted = await this.tokenRepo.insertForUser({
      kind,
      hashedValue: hashTokenValue(value),
      expires,
      username,
    });
    if (!inserted) {
      throw new UserNotFoundError(username);
    }

    return { value, expires };
  }

  /**
   * Create a token with the kind's default size and lifetime
   */
  async issue(kind: TokenKind, username: string): Promise<IssuedToken> {
    const { size } = TOKEN_KIND_DEFAULTS[kind];
    return this.create(kind, username, size, tokenLifetimeMs(kind, this.options.sessionTtlSeconds));
  }

  /**
   * Resolve a token to its owner. Expired tokens are deleted on detection.
   *
   * @throws {UserNotFoundError} If no token matches
   * @throws {TokenExpiredError} Kind-specific subclass when expired
   */
  async lookupUsername(kind: TokenKind, value: string): Promise<string> {
    const hashedValue = hashTokenValue(value);
    const owner = await this.tokenRepo.findOwner(kind, hashedValue);
    if (!owner) {
      throw new UserNotFoundError(`${kind} token`);
    }

    if (owner.expires.getTime() <= Date.now()) {
      await this.tokenRepo.delete(kind, hashedValue);
      throw tokenExpiredError(kind);
    }

    return owner.username;
  }

  /**
   * Delete exactly one token
   *
   * @throws {TokenNotFoundError} If nothing matched
   */
  async remove(kind: TokenKind, value: string): Promise<void> {
    const deleted = await this.tokenRepo.delete(kind, hashTokenValue(value));
    if (deleted === 0) {
      throw new TokenNotFoundError(kind);
    }
  }
}
