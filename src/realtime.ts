import type { IncomingMessage, Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";

import { WebSocketServer, type WebSocket } from "ws";

import type { Dashboard, HubTopic } from "./dashboard";
import { ensureLogger, type LoggerLike } from "./logger";
import { MAX_MESSAGE_SIZE, Subscriber, type SubscriberConnection } from "./subscriber";

const ROUTES: ReadonlyMap<string, HubTopic> = new Map<string, HubTopic>([
  ["/ws/status", "status"],
  ["/ws/logs", "logs"],
  ["/ws/camera", "camera"]
]);

export function topicForPath(url: string | undefined): HubTopic | undefined {
  let pathname: string;
  try {
    pathname = new URL(url ?? "/", "http://localhost").pathname;
  } catch {
    return undefined;
  }
  return ROUTES.get(pathname.replace(/\/+$/, ""));
}

function preamble(dashboard: Dashboard, topic: HubTopic): string[] {
  switch (topic) {
    case "status":
      return dashboard.statusPreamble();
    case "logs":
      return dashboard.logsPreamble();
    case "camera":
      return [];
  }
}

/**
 * Writes the topic's preamble straight to the connection, then subscribes
 * it to the topic's hub. Resolves when the connection is torn down.
 */
export async function serveTopic(
  dashboard: Dashboard,
  topic: HubTopic,
  connection: SubscriberConnection,
  log: LoggerLike
): Promise<void> {
  // Nothing is registered yet, so no broadcast can interleave with these.
  for (const frame of preamble(dashboard, topic)) {
    connection.send(Buffer.from(frame, "utf8"), { binary: false }, (err) => {
      if (err) log.debug({ err }, `[${topic}] preamble write failed`);
    });
  }

  const subscriber = new Subscriber(dashboard.hubs[topic], connection, { logger: log });
  try {
    await subscriber.run();
  } catch (error) {
    log.error({ err: error }, `[${topic}] subscriber failed`);
    connection.terminate();
  }
}

/**
 * Upgrades `/ws/status`, `/ws/logs` and `/ws/camera`; any other upgrade
 * path is refused with 404.
 */
export class RealtimeGateway {
  private readonly wss: WebSocketServer;
  private readonly log: LoggerLike;

  constructor(
    server: HttpServer,
    private readonly dashboard: Dashboard,
    logger?: LoggerLike
  ) {
    this.log = ensureLogger(logger);
    this.wss = new WebSocketServer({ noServer: true, maxPayload: MAX_MESSAGE_SIZE });
    server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });
  }

  close(): void {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    this.wss.close();
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const topic = topicForPath(request.url);
    if (!topic) {
      socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(request, socket, head, (client: WebSocket) => {
      void serveTopic(this.dashboard, topic, client, this.log);
    });
  }
}
