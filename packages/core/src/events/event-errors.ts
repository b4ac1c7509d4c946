/**
 * Event Journal Errors
 */

export class EventJournalError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EventJournalError';
  }
}

/** The journal was built without a store. */
export class EventStoreUnavailableError extends EventJournalError {
  constructor() {
    super('Event store is not configured');
    this.name = 'EventStoreUnavailableError';
  }
}

export class WriteEventFailedError extends EventJournalError {
  constructor(eventName: string, cause: unknown) {
    super(`Failed to write ${eventName} event`, { cause });
    this.name = 'WriteEventFailedError';
  }
}
