export class PasswordError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class IncorrectPasswordError extends PasswordError {
  constructor(message = 'Incorrect password', options?: ErrorOptions) {
    super(message, options);
  }
}

export class MalformedPasswordHashError extends PasswordError {
  constructor(message = 'Stored password hash is malformed', options?: ErrorOptions) {
    super(message, options);
  }
}

export class MailerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigError extends MailerError {
  constructor(message = 'SMTP configuration requires host, port, username and password', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidFromError extends MailerError {
  constructor(from: string, options?: ErrorOptions) {
    super(`Invalid from address: ${from}`, options);
  }
}

export class NoRecipientsError extends MailerError {
  constructor(message = 'At least one recipient is required', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidRecipientError extends MailerError {
  constructor(recipient: string, options?: ErrorOptions) {
    super(`Invalid recipient address: ${recipient}`, options);
  }
}

export class SendFailedError extends MailerError {
  constructor(message = 'Failed to send email', options?: ErrorOptions) {
    super(message, options);
  }
}
