import { logger as defaultLogger, type Logger } from '@gatehouse/observability';
import { BoundedQueue } from './bounded-queue.js';
import { BroadcasterClosedError, EventNotRegisteredError } from './errors.js';
import type { Message } from './message.js';

export const DEFAULT_QUEUE_CAPACITY = 10;

/**
 * What to do when a subscriber's queue is full:
 * - block: wait until it has room (a slow subscriber stalls fan-out)
 * - disconnect: drop the subscriber and close its queue
 */
export type OverflowPolicy = 'block' | 'disconnect';

export interface BroadcasterOptions {
  queueCapacity?: number;
  overflow?: OverflowPolicy;
  logger?: Logger;
}

export class Subscriber implements AsyncIterable<Message> {
  readonly queue: BoundedQueue<Message>;

  constructor(
    readonly id: string,
    readonly event: string,
    capacity: number
  ) {
    this.queue = new BoundedQueue(capacity);
  }

  [Symbol.asyncIterator](): AsyncIterator<Message, undefined> {
    return this.queue[Symbol.asyncIterator]();
  }
}

interface PublishCommand {
  message: Message;
  resolve: () => void;
}

/**
 * Fans published messages out to the subscribers of each event.
 *
 * Publishes go through one inbox drained by a single loop, so fan-outs never
 * overlap and every subscriber sees messages in publish order. Subscribe and
 * unsubscribe mutate the subscriber map directly; the loop skips anyone
 * removed while it was waiting.
 */
export class Broadcaster {
  private readonly events = new Set<string>();
  private readonly subscribers = new Map<string, Set<Subscriber>>();
  private readonly inbox = new BoundedQueue<PublishCommand>(Number.POSITIVE_INFINITY);
  private readonly queueCapacity: number;
  private readonly overflow: OverflowPolicy;
  private readonly logger: Logger;
  private loop: Promise<void> | null = null;

  constructor(options: BroadcasterOptions = {}) {
    this.queueCapacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    this.overflow = options.overflow ?? 'block';
    this.logger = options.logger ?? defaultLogger;
  }

  registerEvent(name: string): void {
    this.events.add(name);
  }

  isRegistered(name: string): boolean {
    return this.events.has(name);
  }

  /**
   * @throws {EventNotRegisteredError} If the event was never registered
   */
  subscribe(id: string, event: string): Subscriber {
    if (!this.events.has(event)) {
      throw new EventNotRegisteredError(event);
    }
    if (this.inbox.isClosed) {
      throw new BroadcasterClosedError();
    }

    const subscriber = new Subscriber(id, event, this.queueCapacity);
    let subscribers = this.subscribers.get(event);
    if (!subscribers) {
      subscribers = new Set();
      this.subscribers.set(event, subscribers);
    }
    subscribers.add(subscriber);
    this.logger.debug({ subscriber: id, event }, 'SSE subscriber added');
    return subscriber;
  }

  unsubscribe(event: string, subscriber: Subscriber): void {
    const subscribers = this.subscribers.get(event);
    if (subscribers?.delete(subscriber)) {
      this.logger.debug({ subscriber: subscriber.id, event }, 'SSE subscriber removed');
    }
    subscriber.queue.close();
  }

  subscriberCount(event: string): number {
    return this.subscribers.get(event)?.size ?? 0;
  }

  totalSubscribers(): number {
    let total = 0;
    for (const subscribers of this.subscribers.values()) {
      total += subscribers.size;
    }
    return total;
  }

  /**
   * Resolves once every current subscriber of the event accepted the message.
   *
   * @throws {EventNotRegisteredError} If the event was never registered
   * @throws {BroadcasterClosedError} After close()
   */
  async publish(message: Message): Promise<void> {
    if (!this.events.has(message.event)) {
      throw new EventNotRegisteredError(message.event);
    }

    let resolve: () => void = () => {};
    const delivered = new Promise<void>((done) => {
      resolve = done;
    });
    if (!this.inbox.tryPush({ message, resolve })) {
      throw new BroadcasterClosedError();
    }
    await delivered;
  }

  /**
   * Start draining the inbox. Calling it again is a no-op.
   */
  run(): void {
    if (!this.loop) {
      this.loop = this.drain();
    }
  }

  /**
   * Stop accepting publishes, close every subscriber queue and wait for the
   * loop to finish what was already queued.
   */
  async close(): Promise<void> {
    this.inbox.close();
    for (const [event, subscribers] of this.subscribers) {
      for (const subscriber of subscribers) {
        this.unsubscribe(event, subscriber);
      }
    }
    this.subscribers.clear();
    if (this.loop) {
      await this.loop;
    } else {
      // never started: release queued publishers
      for await (const command of this.inbox) {
        command.resolve();
      }
    }
  }

  private async drain(): Promise<void> {
    for await (const command of this.inbox) {
      await this.fanOut(command.message);
      command.resolve();
    }
  }

  private async fanOut(message: Message): Promise<void> {
    const subscribers = this.subscribers.get(message.event);
    if (!subscribers || subscribers.size === 0) {
      return;
    }

    const deliveries: Array<Promise<boolean>> = [];
    for (const subscriber of [...subscribers]) {
      if (this.overflow === 'disconnect') {
        if (!subscriber.queue.tryPush(message)) {
          this.logger.warn({ subscriber: subscriber.id, event: message.event }, 'SSE subscriber too slow, disconnecting');
          this.unsubscribe(message.event, subscriber);
        }
      } else {
        deliveries.push(subscriber.queue.push(message));
      }
    }
    await Promise.all(deliveries);
  }
}
