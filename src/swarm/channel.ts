/**
 * Bounded multi-producer, single-consumer channel.
 *
 * Each producer holds its own Sender (via clone()). The receiver sees the
 * end of the stream once every sender has been closed and the buffer is
 * drained. Values arrive in the order they were sent, which for the swarm
 * is completion order.
 *
 * @example
 * ```typescript
 * const [tx, rx] = createChannel<number>(4);
 * for (const n of [1, 2, 3]) {
 *   const worker = tx.clone();
 *   void produce(n).then((v) => worker.send(v)).finally(() => worker.close());
 * }
 * tx.close(); // no more producers, not "all done"
 * for await (const value of rx) console.log(value);
 * ```
 */

export interface Sender<T> {
  /**
   * Deliver a value, waiting for buffer space if the channel is full.
   * Resolves false when the receiver is gone and the value was dropped.
   */
  send(value: T): Promise<boolean>;
  /** New handle that keeps the channel open until it is closed too */
  clone(): Sender<T>;
  /** Release this handle. Idempotent. */
  close(): void;
  readonly closed: boolean;
}

export interface Receiver<T> extends AsyncIterable<T> {
  recv(): Promise<IteratorResult<T, void>>;
  /** Stop receiving: buffered values are dropped and pending sends resolve false */
  close(): void;
}

// =============================================================================
// SHARED STATE
// =============================================================================

type RecvWaiter<T> = (result: IteratorResult<T, void>) => void;

class ChannelState<T> {
  readonly buffer: T[] = [];
  readonly recvWaiters: RecvWaiter<T>[] = [];
  readonly sendWaiters: (() => void)[] = [];
  senders = 0;
  receiverClosed = false;

  constructor(readonly capacity: number) {}

  get exhausted(): boolean {
    return this.receiverClosed || (this.senders === 0 && this.buffer.length === 0);
  }

  finishReceivers(): void {
    for (const waiter of this.recvWaiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  wakeSenders(all: boolean): void {
    const woken = all ? this.sendWaiters.splice(0) : this.sendWaiters.splice(0, 1);
    for (const wake of woken) wake();
  }
}

// =============================================================================
// SENDER
// =============================================================================

class ChannelSender<T> implements Sender<T> {
  private isClosed = false;

  constructor(private readonly state: ChannelState<T>) {
    state.senders++;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async send(value: T): Promise<boolean> {
    if (this.isClosed) {
      throw new Error("Cannot send on a closed sender");
    }

    const state = this.state;
    for (;;) {
      if (state.receiverClosed) return false;

      const waiter = state.recvWaiters.shift();
      if (waiter) {
        waiter({ done: false, value });
        return true;
      }

      if (state.buffer.length < state.capacity) {
        state.buffer.push(value);
        return true;
      }

      await new Promise<void>((resolve) => state.sendWaiters.push(resolve));
    }
  }

  clone(): Sender<T> {
    if (this.isClosed) {
      throw new Error("Cannot clone a closed sender");
    }
    return new ChannelSender(this.state);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.state.senders--;
    if (this.state.senders === 0) {
      this.state.finishReceivers();
    }
  }
}

// =============================================================================
// RECEIVER
// =============================================================================

class ChannelReceiver<T> implements Receiver<T> {
  constructor(private readonly state: ChannelState<T>) {}

  recv(): Promise<IteratorResult<T, void>> {
    const state = this.state;

    if (!state.receiverClosed && state.buffer.length > 0) {
      const [value] = state.buffer.splice(0, 1);
      state.wakeSenders(false);
      return Promise.resolve<IteratorResult<T, void>>({ done: false, value });
    }

    if (state.exhausted) {
      return Promise.resolve<IteratorResult<T, void>>({ done: true, value: undefined });
    }

    return new Promise((resolve) => state.recvWaiters.push(resolve));
  }

  close(): void {
    const state = this.state;
    if (state.receiverClosed) return;
    state.receiverClosed = true;
    state.buffer.length = 0;
    state.wakeSenders(true);
    state.finishReceivers();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.recv();
      if (result.done) return;
      yield result.value;
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Create a channel holding at most `capacity` undelivered values.
 * Returns the first sender and the single receiver.
 */
export function createChannel<T>(capacity: number): [Sender<T>, Receiver<T>] {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Channel capacity must be an integer >= 1, got ${capacity}`);
  }
  const state = new ChannelState<T>(capacity);
  return [new ChannelSender(state), new ChannelReceiver(state)];
}
