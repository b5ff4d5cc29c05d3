import type { RawData } from "ws";

import { Channel, select, Ticker } from "./channel";
import { ensureLogger, type LoggerLike } from "./logger";
import type { Message } from "./message";

export const WRITE_WAIT_MS = 10_000;
export const PONG_WAIT_MS = 60_000;
// must stay below PONG_WAIT_MS
export const PING_PERIOD_MS = (PONG_WAIT_MS * 9) / 10;
export const MAX_MESSAGE_SIZE = 512 * 1024;
export const SEND_BUFFER = 256;

const CLOSE_NORMAL = 1000;

/**
 * The slice of a `ws` WebSocket a subscriber drives. A socket from
 * `WebSocketServer` satisfies it as-is.
 */
export interface SubscriberConnection {
  send(data: Buffer, options: { binary: boolean }, cb: (err?: Error) => void): void;
  ping(data?: Buffer, mask?: boolean, cb?: (err?: Error) => void): void;
  close(code?: number, data?: string | Buffer): void;
  terminate(): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "pong", listener: (data: Buffer) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface SubscriberHub {
  readonly name: string;
  register(subscriber: Subscriber): void;
  unregister(subscriber: Subscriber): void;
}

export interface SubscriberOptions {
  logger?: LoggerLike;
}

export class WriteTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`write did not complete within ${timeoutMs}ms`);
    this.name = "WriteTimeoutError";
  }
}

function rawByteLength(data: RawData): number {
  if (Array.isArray(data)) {
    return data.reduce((total, chunk) => total + chunk.length, 0);
  }
  return data.byteLength;
}

function withWriteDeadline(write: (done: (err?: Error) => void) => void): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => reject(new WriteTimeoutError(WRITE_WAIT_MS)), WRITE_WAIT_MS);
    const done = (err?: Error): void => {
      clearTimeout(timer);
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    };
    try {
      write(done);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
    }
  });
}

/**
 * One connected peer. The read pump is the only reader of the socket and the
 * write pump the only writer; the hub owns the outbound queue's lifetime.
 */
export class Subscriber {
  private readonly queue = new Channel<Message>(SEND_BUFFER);
  private readonly log: LoggerLike;
  private started = false;

  constructor(
    private readonly hub: SubscriberHub,
    private readonly connection: SubscriberConnection,
    options: SubscriberOptions = {}
  ) {
    this.log = ensureLogger(options.logger);
  }

  /** Messages waiting for the write pump. */
  get pending(): number {
    return this.queue.length;
  }

  get removed(): boolean {
    return this.queue.closed;
  }

  /**
   * Registers with the hub and serves the connection. Resolves once both
   * pumps have exited.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new Error(`[${this.hub.name}] subscriber is already running`);
    }
    this.started = true;

    const reading = this.readPump();
    this.hub.register(this);
    const writing = this.writePump();
    await Promise.all([reading, writing]);
  }

  /**
   * Non-blocking enqueue used by the hub dispatcher. `false` means the
   * queue is full.
   */
  offer(message: Message): boolean {
    return this.queue.trySend(message);
  }

  /** Called by the hub dispatcher, once, when this subscriber leaves the set. */
  closeQueue(): void {
    this.queue.close();
  }

  private readPump(): Promise<void> {
    const reason = new Promise<string>((resolve) => {
      let deadline: NodeJS.Timeout | undefined;
      let finished = false;

      const finish = (why: string): void => {
        if (finished) return;
        finished = true;
        clearTimeout(deadline);
        resolve(why);
      };

      const extendDeadline = (): void => {
        clearTimeout(deadline);
        deadline = setTimeout(
          () => finish(`no pong within ${PONG_WAIT_MS}ms`),
          PONG_WAIT_MS
        );
      };

      this.connection.on("pong", () => {
        if (!finished) extendDeadline();
      });
      // Inbound payloads are discarded; reading only detects liveness.
      this.connection.on("message", (data) => {
        const size = rawByteLength(data);
        if (size > MAX_MESSAGE_SIZE) {
          finish(`inbound message of ${size} bytes exceeds ${MAX_MESSAGE_SIZE}`);
        }
      });
      this.connection.on("close", (code) => finish(`closed by peer (${code})`));
      this.connection.on("error", (err) => finish(err.message));

      extendDeadline();
    });

    return reason.then((why) => {
      this.log.debug({ reason: why }, `[${this.hub.name}] read pump stopped`);
      this.hub.unregister(this);
      this.connection.terminate();
    });
  }

  private async writePump(): Promise<void> {
    const ticker = new Ticker(PING_PERIOD_MS);
    try {
      for (;;) {
        const index = await select([ticker, this.queue]);

        if (index === 0) {
          ticker.take();
          await withWriteDeadline((done) => this.connection.ping(undefined, false, done));
          continue;
        }

        if (this.queue.closed) {
          // Removed by the hub: anything still buffered is not delivered.
          this.connection.close(CLOSE_NORMAL);
          return;
        }

        const next = this.queue.tryReceive();
        if (!next?.ok) continue;
        const message = next.value;
        await withWriteDeadline((done) =>
          this.connection.send(message.data, { binary: message.kind === "binary" }, done)
        );
      }
    } catch (error) {
      this.log.debug({ err: error }, `[${this.hub.name}] write pump failed`);
      this.connection.terminate();
    } finally {
      ticker.stop();
    }
  }
}
