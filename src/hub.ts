import { Channel, select } from "./channel";
import { ensureLogger, type LoggerLike } from "./logger";
import { binaryMessage, textMessage, type Message } from "./message";
import type { Subscriber } from "./subscriber";

export const BROADCAST_BUFFER = 256;

export class HubEncodeError extends Error {
  constructor(hubName: string, cause: unknown) {
    super(`[${hubName}] broadcast value could not be encoded as JSON`, { cause });
    this.name = "HubEncodeError";
  }
}

export interface HubOptions {
  logger?: LoggerLike;
}

export interface HubDescription {
  name: string;
  clients: number;
  running: boolean;
}

type HubState = "idle" | "running" | "stopped";

/**
 * Fan-out for one topic. The dispatcher loop started by `run()` is the only
 * code that mutates the subscriber set or closes a subscriber's queue;
 * everything else reaches it through the register, unregister and broadcast
 * channels.
 */
export class Hub {
  private readonly subscribers = new Set<Subscriber>();
  private readonly registrations = new Channel<Subscriber>(Infinity);
  private readonly departures = new Channel<Subscriber>(Infinity);
  private readonly outbox = new Channel<Message>(BROADCAST_BUFFER);
  private readonly done = new Channel<never>(0);
  private readonly log: LoggerLike;
  private state: HubState = "idle";

  constructor(
    readonly name: string,
    options: HubOptions = {}
  ) {
    this.log = ensureLogger(options.logger);
  }

  /**
   * Serves the hub until `stop()`. A hub stopped before it ever ran resolves
   * at once.
   */
  async run(): Promise<void> {
    if (this.state === "running") {
      throw new Error(`[${this.name}] hub is already running`);
    }
    if (this.state === "stopped") return;
    this.state = "running";
    this.log.debug({}, `[${this.name}] hub started`);

    // Checked in this order on every turn: stop, register, unregister, broadcast.
    const sources = [this.done, this.registrations, this.departures, this.outbox];
    for (;;) {
      const index = await select(sources);
      // stop() may land between the wakeup and this turn
      if (index === 0 || this.done.ready) break;

      if (index === 1) {
        const next = this.registrations.tryReceive();
        if (next?.ok) this.add(next.value);
      } else if (index === 2) {
        const next = this.departures.tryReceive();
        if (next?.ok) this.remove(next.value);
      } else {
        const next = this.outbox.tryReceive();
        if (next?.ok) this.fanOut(next.value);
      }
    }

    this.shutdown();
  }

  /**
   * Closes every subscriber queue and drops pending broadcasts. Later
   * broadcasts are ignored.
   */
  stop(): void {
    if (this.state === "stopped") return;
    const wasRunning = this.state === "running";
    this.state = "stopped";
    if (wasRunning) {
      this.done.close();
    } else {
      this.shutdown();
    }
  }

  register(subscriber: Subscriber): void {
    if (this.state === "stopped") {
      subscriber.closeQueue();
      return;
    }
    this.registrations.trySend(subscriber);
  }

  unregister(subscriber: Subscriber): void {
    if (this.state === "stopped") return;
    this.departures.trySend(subscriber);
  }

  /** Never waits: when the broadcast queue is full the message is dropped. */
  broadcast(message: Message): void {
    if (this.state === "stopped") return;
    if (!this.outbox.trySend(message)) {
      this.log.warn(
        { capacity: BROADCAST_BUFFER },
        `[${this.name}] broadcast queue full, dropping message`
      );
    }
  }

  /** @throws {HubEncodeError} when `value` has no JSON encoding; nothing is queued. */
  broadcastJSON(value: unknown): void {
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(value);
    } catch (error) {
      throw new HubEncodeError(this.name, error);
    }
    if (encoded === undefined) {
      throw new HubEncodeError(
        this.name,
        new TypeError(`${typeof value} has no JSON representation`)
      );
    }
    this.broadcast(textMessage(encoded));
  }

  broadcastBinary(data: Buffer): void {
    this.broadcast(binaryMessage(data));
  }

  clientCount(): number {
    return this.subscribers.size;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  describe(): HubDescription {
    return {
      name: this.name,
      clients: this.clientCount(),
      running: this.isRunning()
    };
  }

  private add(subscriber: Subscriber): void {
    if (this.subscribers.has(subscriber)) return;
    this.subscribers.add(subscriber);
    this.log.info({}, `[${this.name}] client connected (${this.subscribers.size} total)`);
  }

  private remove(subscriber: Subscriber): void {
    // Already gone when an earlier broadcast evicted it.
    if (!this.subscribers.delete(subscriber)) return;
    subscriber.closeQueue();
    this.log.info(
      {},
      `[${this.name}] client disconnected (${this.subscribers.size} remaining)`
    );
  }

  private fanOut(message: Message): void {
    for (const subscriber of this.subscribers) {
      if (subscriber.offer(message)) continue;
      this.subscribers.delete(subscriber);
      subscriber.closeQueue();
      this.log.warn(
        { pending: subscriber.pending },
        `[${this.name}] dropped slow client (${this.subscribers.size} remaining)`
      );
    }
  }

  private shutdown(): void {
    for (const subscriber of this.subscribers) {
      subscriber.closeQueue();
    }
    const clients = this.subscribers.size;
    this.subscribers.clear();

    // Never added to the set, so their queues are still open.
    for (;;) {
      const next = this.registrations.tryReceive();
      if (!next?.ok) break;
      next.value.closeQueue();
    }
    while (this.departures.tryReceive()?.ok) {
      // nothing left to remove
    }
    let discarded = 0;
    while (this.outbox.tryReceive()?.ok) {
      discarded += 1;
    }

    this.log.info({ clients, discarded }, `[${this.name}] hub stopped`);
  }
}
