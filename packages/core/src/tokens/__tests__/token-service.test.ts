/**
 * Token Service Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { hashTokenValue } from '@gatehouse/auth';
import { tokens } from '@gatehouse/database';
import { alice, createTestContext, type TestContext } from '../../test/fixtures.js';
import { UserNotFoundError } from '../../users/user-errors.js';
import {
  ConfirmTokenExpiredError,
  InvalidTokenSizeError,
  ResetTokenExpiredError,
  TokenNotFoundError,
} from '../token-errors.js';

const START = new Date('2026-05-01T12:00:00Z');

describe('TokenService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    ctx = createTestContext({ sessionTtlSeconds: 3600 });
    await ctx.users.register(alice);
  });

  afterEach(() => {
    vi.useRealTimers();
    ctx.close();
  });

  const tokenRows = () => ctx.db.select().from(tokens).all();

  describe('create', () => {
    it('persists only the hash of the value', async () => {
      const token = await ctx.tokens.create('reset', 'alice', 12, 60_000);

      expect(tokenRows()).toEqual([
        {
          hashedValue: hashTokenValue(token.value),
          kind: 'reset',
          expires: new Date(START.getTime() + 60_000),
          username: 'alice',
        },
      ]);
      expect(token.expires).toEqual(new Date(START.getTime() + 60_000));
    });

    it('fails for an unknown user and stores nothing', async () => {
      await expect(ctx.tokens.create('reset', 'bob', 12, 60_000)).rejects.toBeInstanceOf(UserNotFoundError);
      expect(tokenRows()).toHaveLength(0);
    });

    it('is a no-op for an empty username', async () => {
      const token = await ctx.tokens.create('reset', '', 12, 60_000);

      expect(token.value).toBe('');
      expect(tokenRows()).toHaveLength(0);
    });

    it.each([0, -4])('rejects size %i', async (size) => {
      await expect(ctx.tokens.create('session', 'alice', size, 60_000)).rejects.toBeInstanceOf(InvalidTokenSizeError);
    });
  });

  describe('issue', () => {
    it('uses 12 bytes and five minutes for reset tokens', async () => {
      const token = await ctx.tokens.issue('reset', 'alice');

      expect(token.value).toHaveLength(16);
      expect(token.expires).toEqual(new Date(START.getTime() + 5 * 60 * 1000));
    });

    it('uses 32 bytes and the configured lifetime for sessions', async () => {
      const token = await ctx.tokens.issue('session', 'alice');

      expect(token.value).toHaveLength(43);
      expect(token.expires).toEqual(new Date(START.getTime() + 3600 * 1000));
    });
  });

  describe('lookupUsername', () => {
    it('returns the owner of a live token', async () => {
      const token = await ctx.tokens.issue('confirm', 'alice');

      await expect(ctx.tokens.lookupUsername('confirm', token.value)).resolves.toBe('alice');
    });

    it('keys tokens by kind', async () => {
      const token = await ctx.tokens.issue('confirm', 'alice');

      await expect(ctx.tokens.lookupUsername('reset', token.value)).rejects.toBeInstanceOf(UserNotFoundError);
    });

    it('fails for an unknown token', async () => {
      await expect(ctx.tokens.lookupUsername('reset', 'unknown')).rejects.toBeInstanceOf(UserNotFoundError);
    });

    it('deletes an expired reset token at the expiry instant', async () => {
      const token = await ctx.tokens.issue('reset', 'alice');
      vi.setSystemTime(token.expires);

      await expect(ctx.tokens.lookupUsername('reset', token.value)).rejects.toBeInstanceOf(ResetTokenExpiredError);
      expect(tokenRows()).toHaveLength(0);
    });

    it('deletes an expired confirm token', async () => {
      const token = await ctx.tokens.issue('confirm', 'alice');
      vi.setSystemTime(new Date(token.expires.getTime() + 1));

      await expect(ctx.tokens.lookupUsername('confirm', token.value)).rejects.toBeInstanceOf(
        ConfirmTokenExpiredError
      );
      expect(tokenRows()).toHaveLength(0);
    });

    it('still resolves one millisecond before expiry', async () => {
      const token = await ctx.tokens.issue('reset', 'alice');
      vi.setSystemTime(new Date(token.expires.getTime() - 1));

      await expect(ctx.tokens.lookupUsername('reset', token.value)).resolves.toBe('alice');
    });
  });

  describe('remove', () => {
    it('removes once and then reports the token missing', async () => {
      const token = await ctx.tokens.issue('reset', 'alice');
      await ctx.tokens.lookupUsername('reset', token.value);

      await ctx.tokens.remove('reset', token.value);

      expect(tokenRows()).toHaveLength(0);
      await expect(ctx.tokens.remove('reset', token.value)).rejects.toBeInstanceOf(TokenNotFoundError);
    });

    it('only removes the matching kind', async () => {
      const session = await ctx.tokens.issue('session', 'alice');
      await ctx.tokens.issue('reset', 'alice');

      await expect(ctx.tokens.remove('reset', session.value)).rejects.toBeInstanceOf(TokenNotFoundError);
      expect(tokenRows().map((row) => row.kind).sort()).toEqual(['reset', 'session']);
    });
  });
});
