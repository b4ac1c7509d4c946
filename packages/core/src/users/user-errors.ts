/**
 * User Domain Errors
 *
 * Thrown by the identity store; route handlers decide between a form
 * message and a 500.
 */

export class UserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UserError';
  }
}

export class UserNotFoundError extends UserError {
  constructor(subject = 'user') {
    super(`User not found for ${subject}`);
    this.name = 'UserNotFoundError';
  }
}

export class UserSessionNotFoundError extends UserError {
  constructor() {
    super('User session not found');
    this.name = 'UserSessionNotFoundError';
  }
}

export class UserSessionExpiredError extends UserError {
  constructor() {
    super('User session expired');
    this.name = 'UserSessionExpiredError';
  }
}

export class UserAlreadyConfirmedError extends UserError {
  constructor(username: string) {
    super(`User already confirmed: ${username}`);
    this.name = 'UserAlreadyConfirmedError';
  }
}
