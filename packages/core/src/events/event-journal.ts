/**
 * Event Journal
 *
 * Audit log of authentication decisions. Writes are awaited but callers
 * treat failures as non-fatal: log and continue.
 */

import type { Logger } from '@gatehouse/observability';
import type { EventName } from '@gatehouse/types';
import type { EventRepository } from './event-repository.js';
import { EventStoreUnavailableError, WriteEventFailedError } from './event-errors.js';
import type { AuthEvent } from './event-types.js';

export class EventJournal {
  constructor(
    private eventRepo: EventRepository | null,
    private logger: Logger
  ) {}

  /**
   * Append an event
   *
   * @throws {EventStoreUnavailableError} If the journal has no store
   * @throws {WriteEventFailedError} If the insert fails
   */
  async write(name: EventName, success: boolean, username: string, message: string): Promise<void> {
    if (!this.eventRepo) {
      throw new EventStoreUnavailableError();
    }

    try {
      await this.eventRepo.insert({ name, success, username, message });
    } catch (error) {
      throw new WriteEventFailedError(name, error);
    }

    const level = success ? 'info' : 'warn';
    this.logger[level]({ event: name, success, username }, message);
  }

  /**
   * Write an event, logging instead of throwing on failure
   */
  async record(name: EventName, success: boolean, username: string, message: string): Promise<void> {
    try {
      await this.write(name, success, username, message);
    } catch (error) {
      this.logger.error({ err: error, event: name, username }, 'Failed to journal event');
    }
  }

  async list(): Promise<AuthEvent[]> {
    if (!this.eventRepo) {
      throw new EventStoreUnavailableError();
    }
    return this.eventRepo.list();
  }
}
