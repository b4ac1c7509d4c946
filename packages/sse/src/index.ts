export { Broadcaster, Subscriber, DEFAULT_QUEUE_CAPACITY } from './broadcaster.js';
export type { BroadcasterOptions, OverflowPolicy } from './broadcaster.js';
export { BoundedQueue } from './bounded-queue.js';
export { formatMessage } from './message.js';
export type { Message } from './message.js';
export * from './errors.js';
