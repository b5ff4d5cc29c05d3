/**
 * Something a single consumer can wait on: a channel with data, a closed
 * channel, or a pending tick.
 */
export interface Selectable {
  readonly ready: boolean;
  /**
   * Registers a one-shot listener fired (never synchronously from this call)
   * the next time the source becomes ready. Returns a canceller.
   */
  onReady(listener: () => void): () => void;
}

export type Received<T> = { ok: true; value: T } | { ok: false };

export class ChannelClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChannelClosedError";
  }
}

class ReadyListeners {
  private readonly listeners = new Set<() => void>();

  add(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  fire(): void {
    if (this.listeners.size === 0) return;
    const pending = [...this.listeners];
    this.listeners.clear();
    for (const listener of pending) {
      listener();
    }
  }
}

/**
 * Bounded FIFO with one consumer. Producers never wait: `trySend` either
 * enqueues or reports the channel full.
 */
export class Channel<T> implements Selectable {
  private readonly items: T[] = [];
  private readonly listeners = new ReadyListeners();
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!(capacity >= 0)) {
      throw new RangeError(`channel capacity must be >= 0, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get ready(): boolean {
    return this.items.length > 0 || this.isClosed;
  }

  onReady(listener: () => void): () => void {
    return this.listeners.add(listener);
  }

  trySend(value: T): boolean {
    if (this.isClosed) {
      throw new ChannelClosedError("send on closed channel");
    }
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(value);
    this.listeners.fire();
    return true;
  }

  /** `undefined` while the channel is open and empty. */
  tryReceive(): Received<T> | undefined {
    if (this.items.length === 0) {
      return this.isClosed ? { ok: false } : undefined;
    }
    const value = this.items[0];
    this.items.shift();
    return { ok: true, value };
  }

  close(): void {
    if (this.isClosed) {
      throw new ChannelClosedError("close of closed channel");
    }
    this.isClosed = true;
    this.listeners.fire();
  }
}

/**
 * Periodic readiness source. Ticks that arrive while one is already pending
 * are coalesced, so a slow consumer sees at most one.
 */
export class Ticker implements Selectable {
  private readonly listeners = new ReadyListeners();
  private readonly timer: NodeJS.Timeout;
  private pending = false;

  constructor(readonly periodMs: number) {
    this.timer = setInterval(() => {
      this.pending = true;
      this.listeners.fire();
    }, periodMs);
    this.timer.unref();
  }

  get ready(): boolean {
    return this.pending;
  }

  onReady(listener: () => void): () => void {
    return this.listeners.add(listener);
  }

  take(): boolean {
    const had = this.pending;
    this.pending = false;
    return had;
  }

  stop(): void {
    clearInterval(this.timer);
    this.pending = false;
  }
}

/**
 * Waits until any source is ready and resolves with its index. Sources are
 * checked in argument order, so earlier sources win ties.
 */
export function select(sources: readonly Selectable[]): Promise<number> {
  const index = sources.findIndex((source) => source.ready);
  if (index >= 0) {
    return Promise.resolve(index);
  }

  return new Promise<number>((resolve) => {
    const cancels: Array<() => void> = [];
    const settle = (fired: number): void => {
      for (const cancel of cancels) cancel();
      const first = sources.findIndex((source) => source.ready);
      resolve(first >= 0 ? first : fired);
    };
    sources.forEach((source, i) => {
      cancels.push(source.onReady(() => settle(i)));
    });
  });
}
