import { Hub, HubEncodeError, type HubDescription } from "./hub";
import { clockTime, ensureLogger, type LoggerLike } from "./logger";
import { RingBuffer } from "./ring-buffer";
import {
  initialDashboardState,
  type ConversationEntry,
  type ConversationRole,
  type DashboardHooks,
  type DashboardState,
  type LogEntry,
  type LogType
} from "./types";

export const LOG_HISTORY = 500;
export const CONVERSATION_HISTORY = 100;

export type HubTopic = "status" | "logs" | "camera";

export interface DashboardOptions {
  logger?: LoggerLike;
  hooks?: DashboardHooks;
  now?: () => Date;
}

/**
 * Robot-facing state behind the dashboard. Producers call the mutators;
 * each one updates its own buffer and hands a copy to the matching hub.
 */
export class Dashboard {
  readonly hubs: Readonly<Record<HubTopic, Hub>>;
  /** Fixed at construction; the HTTP routes are built from them. */
  readonly hooks: DashboardHooks;

  private state: DashboardState = initialDashboardState();
  private readonly logs = new RingBuffer<LogEntry>(LOG_HISTORY);
  private readonly conversation = new RingBuffer<ConversationEntry>(CONVERSATION_HISTORY);
  private readonly log: LoggerLike;
  private readonly now: () => Date;
  private running: Promise<void[]> | null = null;

  constructor(options: DashboardOptions = {}) {
    this.log = ensureLogger(options.logger);
    this.hooks = options.hooks ?? {};
    this.now = options.now ?? (() => new Date());
    this.hubs = {
      status: new Hub("status", { logger: this.log }),
      logs: new Hub("logs", { logger: this.log }),
      camera: new Hub("camera", { logger: this.log })
    };
  }

  start(): void {
    if (this.running) return;
    this.running = Promise.all(
      Object.values(this.hubs).map((hub) =>
        hub.run().catch((error: unknown) => {
          this.log.error({ err: error }, `[${hub.name}] hub loop failed`);
        })
      )
    );
  }

  /** Stops every hub and waits for their loops to wind down. */
  async stop(): Promise<void> {
    for (const hub of Object.values(this.hubs)) {
      hub.stop();
    }
    await this.running;
  }

  describeHubs(): HubDescription[] {
    return Object.values(this.hubs).map((hub) => hub.describe());
  }

  getState(): DashboardState {
    return { ...this.state };
  }

  getLogs(): LogEntry[] {
    return this.logs.toArray();
  }

  getConversation(): ConversationEntry[] {
    return this.conversation.toArray();
  }

  updateState(update: (state: DashboardState) => void): DashboardState {
    const next = { ...this.state };
    update(next);
    this.state = next;
    this.publish("status", next);
    return { ...next };
  }

  addLog(type: LogType, message: string): LogEntry {
    const entry: LogEntry = { time: clockTime(this.now()), type, message };
    this.logs.push(entry);
    this.publish("logs", entry);
    return entry;
  }

  addConversation(role: ConversationRole, message: string): ConversationEntry {
    const entry: ConversationEntry = { time: clockTime(this.now()), role, message };
    this.conversation.push(entry);
    return entry;
  }

  sendCameraFrame(jpeg: Buffer): void {
    this.hubs.camera.broadcastBinary(jpeg);
  }

  /** Frames a new status subscriber gets before it joins the hub. */
  statusPreamble(): string[] {
    return [JSON.stringify(this.state)];
  }

  /** Buffered log history, oldest first, one frame per entry. */
  logsPreamble(): string[] {
    return this.logs.toArray().map((entry) => JSON.stringify(entry));
  }

  private publish(topic: HubTopic, value: unknown): void {
    try {
      this.hubs[topic].broadcastJSON(value);
    } catch (error) {
      if (!(error instanceof HubEncodeError)) throw error;
      this.log.error({ err: error }, `[${topic}] update not broadcast`);
    }
  }
}
