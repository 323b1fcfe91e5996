import { ChannelClosedError, ReceiveTimeoutError } from './errors.js';

/**
 * Message-passing primitives for the live update engine
 *
 * Every loop in the engine (change feed consumer, topic router, fan-out
 * workers) owns its state and talks to the others only through these
 * channels:
 *
 * - `BoundedChannel`: fixed capacity, `send` suspends while full
 * - `UnboundedChannel`: `send` never suspends and reports a gone receiver
 * - `OneShot`: a single value handed back to exactly one waiter
 * - `select`: wait on several receivers at once
 */

export type Received<T> = { done: false; value: T } | { done: true };

export interface Sender<T> {
  /**
   * @param signal Aborting it withdraws a sender still waiting for room
   */
  send(value: T, signal?: AbortSignal): Promise<void>;
}

export interface Receiver<T> {
  readonly closed: boolean;

  /**
   * Take a buffered value without waiting
   * @returns `null` when the channel is open but empty
   */
  tryReceive(): Received<T> | null;

  receive(): Promise<Received<T>>;

  /**
   * Register a listener fired whenever a value is buffered or the channel closes
   * @returns Function removing the listener
   */
  onReadable(listener: () => void): () => void;
}

abstract class ChannelBase<T> implements Receiver<T> {
  protected readonly buffer: Array<{ value: T }> = [];
  private readonly readableListeners = new Set<() => void>();
  private isClosed = false;

  constructor(public readonly name: string) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.buffer.length;
  }

  tryReceive(): Received<T> | null {
    const entry = this.buffer.shift();
    if (entry) {
      this.afterTake();
      return { done: false, value: entry.value };
    }
    return this.isClosed ? { done: true } : null;
  }

  receive(): Promise<Received<T>> {
    const ready = this.tryReceive();
    if (ready) {
      return Promise.resolve(ready);
    }

    return new Promise((resolve) => {
      const off = this.onReadable(() => {
        const next = this.tryReceive();
        if (next) {
          off();
          resolve(next);
        }
      });
    });
  }

  onReadable(listener: () => void): () => void {
    this.readableListeners.add(listener);
    return () => {
      this.readableListeners.delete(listener);
    };
  }

  /**
   * Stop accepting values. Values already buffered stay receivable.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.onClose();
    this.notifyReadable();
  }

  protected push(value: T): void {
    this.buffer.push({ value });
    this.notifyReadable();
  }

  protected afterTake(): void {}

  protected onClose(): void {}

  private notifyReadable(): void {
    for (const listener of Array.from(this.readableListeners)) {
      listener();
    }
  }
}

/**
 * Channel holding at most `capacity` values; senders wait for room.
 */
export class BoundedChannel<T> extends ChannelBase<T> implements Sender<T> {
  private readonly waitingSenders: Array<() => void> = [];

  constructor(
    name: string,
    public readonly capacity: number,
  ) {
    super(name);
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * @throws ChannelClosedError when the channel is closed before the value is accepted
   * @throws The signal's abort reason when it aborts while waiting for room
   */
  async send(value: T, signal?: AbortSignal): Promise<void> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      await this.waitForRoom(signal);
    }
    if (this.closed) {
      throw new ChannelClosedError(this.name);
    }
    this.push(value);
  }

  private waitForRoom(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        const index = this.waitingSenders.indexOf(wake);
        if (index !== -1) this.waitingSenders.splice(index, 1);
        reject(signal?.reason);
      };
      const wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      this.waitingSenders.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  protected override afterTake(): void {
    this.waitingSenders.shift()?.();
  }

  protected override onClose(): void {
    for (const wake of this.waitingSenders.splice(0)) {
      wake();
    }
  }
}

/**
 * Channel without a capacity limit. Either side may close it; the reader
 * closing it is how a writer learns that nobody is listening any more.
 */
export class UnboundedChannel<T> extends ChannelBase<T> implements AsyncIterable<T> {
  /**
   * @returns `false` when the channel is closed and the value was dropped
   */
  send(value: T): boolean {
    if (this.closed) {
      return false;
    }
    this.push(value);
    return true;
  }

  /**
   * Iterating consumes the channel; leaving the loop early closes it.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      for (;;) {
        const next = await this.receive();
        if (next.done) return;
        yield next.value;
      }
    } finally {
      this.close();
    }
  }
}

type OneShotState<T> =
  | { status: 'pending' }
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: Error }
  | { status: 'abandoned' };

/**
 * Single-use slot: the sending side settles it at most once, the receiving
 * side waits for it at most once and may give up.
 */
export class OneShot<T> {
  private state: OneShotState<T> = { status: 'pending' };
  private waiter: { resolve: (value: T) => void; reject: (error: Error) => void } | null = null;
  private pending: Promise<T> | null = null;

  /** `true` once the receiving side stopped waiting */
  get abandoned(): boolean {
    return this.state.status === 'abandoned';
  }

  get settled(): boolean {
    return this.state.status === 'fulfilled' || this.state.status === 'rejected';
  }

  /**
   * @returns `false` when the slot was already settled or the receiver is gone
   */
  resolve(value: T): boolean {
    if (this.state.status !== 'pending') {
      return false;
    }
    this.state = { status: 'fulfilled', value };
    this.waiter?.resolve(value);
    this.waiter = null;
    return true;
  }

  reject(error: Error): boolean {
    if (this.state.status !== 'pending') {
      return false;
    }
    this.state = { status: 'rejected', error };
    this.waiter?.reject(error);
    this.waiter = null;
    return true;
  }

  /**
   * Settle the slot as dropped: the sender will never answer
   */
  drop(name = 'oneshot'): boolean {
    return this.reject(new ChannelClosedError(name));
  }

  abandon(): void {
    if (this.state.status === 'pending') {
      this.state = { status: 'abandoned' };
    }
  }

  /**
   * Wait for the value
   *
   * @param timeoutMs Give up after this long; the slot is then abandoned
   * @throws ReceiveTimeoutError on timeout, or the error the sender rejected with
   */
  receive(timeoutMs?: number): Promise<T> {
    if (this.pending) {
      return this.pending;
    }

    const state = this.state;
    if (state.status === 'fulfilled') {
      this.pending = Promise.resolve(state.value);
    } else if (state.status === 'rejected') {
      this.pending = Promise.reject(state.error);
    } else if (state.status === 'abandoned') {
      this.pending = Promise.reject(new ChannelClosedError('oneshot'));
    } else {
      this.pending = new Promise<T>((resolve, reject) => {
        const timer =
          timeoutMs === undefined
            ? undefined
            : setTimeout(() => {
                this.abandon();
                this.waiter = null;
                reject(new ReceiveTimeoutError(timeoutMs));
              }, timeoutMs);

        this.waiter = {
          resolve: (value) => {
            clearTimeout(timer);
            resolve(value);
          },
          reject: (error) => {
            clearTimeout(timer);
            reject(error);
          },
        };
      });
    }

    return this.pending;
  }
}

/**
 * A receiver whose values are mapped into a common message type, so that
 * one `select` can wait on receivers of different value types.
 */
export interface Lane<M> {
  tryTake(): Received<M> | null;
  onReadable(listener: () => void): () => void;
}

export function lane<T, M>(receiver: Receiver<T>, wrap: (value: T) => M): Lane<M> {
  return {
    tryTake() {
      const next = receiver.tryReceive();
      if (next === null || next.done) {
        return next;
      }
      return { done: false, value: wrap(next.value) };
    },
    onReadable: (listener) => receiver.onReadable(listener),
  };
}

export type Selected<M> =
  | { kind: 'message'; message: M }
  | { kind: 'timeout' }
  | { kind: 'closed' };

export interface SelectOptions {
  /** Resolve with `{ kind: 'timeout' }` when nothing is ready after this long */
  timeoutMs?: number;
}

let rotation = 0;

/**
 * Wait until one of the lanes has a value
 *
 * Lanes are polled starting from a rotating offset so a busy lane cannot
 * starve the others. Resolves `closed` once every lane is closed and drained.
 */
export function select<M>(lanes: ReadonlyArray<Lane<M>>, options: SelectOptions = {}): Promise<Selected<M>> {
  if (lanes.length === 0) {
    return Promise.resolve({ kind: 'closed' });
  }

  const offset = rotation++ % lanes.length;

  const poll = (): Selected<M> | null => {
    let closedLanes = 0;
    for (let i = 0; i < lanes.length; i++) {
      const next = lanes[(offset + i) % lanes.length].tryTake();
      if (next === null) continue;
      if (next.done) {
        closedLanes++;
        continue;
      }
      return { kind: 'message', message: next.value };
    }
    return closedLanes === lanes.length ? { kind: 'closed' } : null;
  };

  const immediate = poll();
  if (immediate) {
    return Promise.resolve(immediate);
  }

  return new Promise((resolve) => {
    let settled = false;
    let unsubscribers: Array<() => void> = [];
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (outcome: Selected<M>) => {
      if (settled) return;
      settled = true;
      unsubscribers.forEach((off) => off());
      clearTimeout(timer);
      resolve(outcome);
    };

    const check = () => {
      const outcome = poll();
      if (outcome) finish(outcome);
    };

    unsubscribers = lanes.map((entry) => entry.onReadable(check));
    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => finish({ kind: 'timeout' }), options.timeoutMs);
    }
  });
}
