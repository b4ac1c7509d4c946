export { EventRepository } from './event-repository.js';
export { EventJournal } from './event-journal.js';
export * from './event-errors.js';
export * from './event-types.js';
