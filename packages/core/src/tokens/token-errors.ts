/**
 * Token Domain Errors
 *
 * Thrown by the token store; route handlers map them to form messages
 */

import type { TokenKind } from '@gatehouse/types';

export class TokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenError';
  }
}

export class TokenNotFoundError extends TokenError {
  constructor(kind: TokenKind) {
    super(`No ${kind} token matched`);
    this.name = 'TokenNotFoundError';
  }
}

export class InvalidTokenSizeError extends TokenError {
  constructor(size: number) {
    super(`Token size must be a positive integer, got ${size}`);
    this.name = 'InvalidTokenSizeError';
  }
}

export class TokenExpiredError extends TokenError {
  constructor(readonly kind: TokenKind) {
    super(`The ${kind} token has expired`);
    this.name = 'TokenExpiredError';
  }
}

export class ResetTokenExpiredError extends TokenExpiredError {
  constructor() {
    super('reset');
    this.name = 'ResetTokenExpiredError';
  }
}

export class ConfirmTokenExpiredError extends TokenExpiredError {
  constructor() {
    super('confirm');
    this.name = 'ConfirmTokenExpiredError';
  }
}

export class SessionTokenExpiredError extends TokenExpiredError {
  constructor() {
    super('session');
    this.name = 'SessionTokenExpiredError';
  }
}

export function tokenExpiredError(kind: TokenKind): TokenExpiredError {
  switch (kind) {
    case 'reset':
      return new ResetTokenExpiredError();
    case 'confirm':
      return new ConfirmTokenExpiredError();
    case 'session':
      return new SessionTokenExpiredError();
  }
}
