export class BroadcastError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EventNotRegisteredError extends BroadcastError {
  constructor(readonly event: string) {
    super(`Event not registered: ${JSON.stringify(event)}`);
  }
}

export class BroadcasterClosedError extends BroadcastError {
  constructor() {
    super('Broadcaster is closed');
  }
}
