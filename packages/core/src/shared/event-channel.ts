/**
 * Buffered async-iterable channel.
 *
 * Producers `push` synchronously; each consumer drains events in order with
 * `for await`. Closing ends iteration once the buffer is drained.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  push(event: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Events buffered but not yet consumed.
   */
  drain(): T[] {
    return this.buffer.splice(0);
  }

  next(): Promise<IteratorResult<T>> {
    const event = this.buffer.shift();
    if (event !== undefined) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

/**
 * Fan-out of events to any number of channels.
 */
export class EventHub<T> {
  private channels = new Set<EventChannel<T>>();

  subscribe(): EventChannel<T> {
    const channel = new EventChannel<T>();
    this.channels.add(channel);
    return channel;
  }

  unsubscribe(channel: EventChannel<T>): void {
    channel.close();
    this.channels.delete(channel);
  }

  publish(event: T): void {
    for (const channel of this.channels) {
      if (channel.isClosed) {
        this.channels.delete(channel);
      } else {
        channel.push(event);
      }
    }
  }

  closeAll(): void {
    for (const channel of this.channels) channel.close();
    this.channels.clear();
  }
}
