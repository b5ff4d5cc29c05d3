import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { BROADCAST_BUFFER, Hub, HubEncodeError } from "./hub";
import { textMessage } from "./message";
import { SEND_BUFFER, Subscriber } from "./subscriber";
import { FakeConnection } from "./test/fake-connection";
import { createTestLogger, flush } from "./test/helpers";

describe("Hub", () => {
  let log: ReturnType<typeof createTestLogger>;
  let hub: Hub;
  let running: Promise<void>;
  const serving: Array<Promise<void>> = [];

  function connect(connection = new FakeConnection()): { connection: FakeConnection; subscriber: Subscriber } {
    const subscriber = new Subscriber(hub, connection, { logger: log });
    serving.push(subscriber.run());
    return { connection, subscriber };
  }

  beforeEach(() => {
    log = createTestLogger();
    hub = new Hub("status", { logger: log });
    running = hub.run();
  });

  afterEach(async () => {
    hub.stop();
    await running;
    await Promise.all(serving.splice(0));
  });

  it("delivers a broadcast to a registered subscriber", async () => {
    const { connection } = connect();
    await flush();
    expect(hub.clientCount()).toBe(1);
    expect(log.info).toHaveBeenCalledWith({}, "[status] client connected (1 total)");

    hub.broadcast(textMessage("hi"));
    await flush();

    expect(connection.texts()).toEqual(["hi"]);
  });

  it("delivers every broadcast to every subscriber in order", async () => {
    const a = connect();
    const b = connect();
    await flush();

    hub.broadcast(textMessage("one"));
    hub.broadcast(textMessage("two"));
    hub.broadcast(textMessage("three"));
    await flush();

    expect(a.connection.texts()).toEqual(["one", "two", "three"]);
    expect(b.connection.texts()).toEqual(["one", "two", "three"]);
  });

  it("sends binary broadcasts as binary frames", async () => {
    const { connection } = connect();
    await flush();

    hub.broadcastBinary(Buffer.from([0xff, 0xd8, 0xff]));
    await flush();

    expect(connection.frames).toEqual([{ kind: "binary", data: Buffer.from([0xff, 0xd8, 0xff]) }]);
  });

  it("encodes values with broadcastJSON", async () => {
    const { connection } = connect();
    await flush();

    hub.broadcastJSON({ speaking: true, head_yaw: 12.5 });
    await flush();

    expect(connection.texts()).toEqual(['{"speaking":true,"head_yaw":12.5}']);
  });

  it("rejects values without a JSON encoding and queues nothing", async () => {
    const { connection } = connect();
    await flush();
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(() => hub.broadcastJSON({ big: BigInt(1) })).toThrow(HubEncodeError);
    expect(() => hub.broadcastJSON(circular)).toThrow(HubEncodeError);
    expect(() => hub.broadcastJSON(undefined)).toThrow(
      "[status] broadcast value could not be encoded as JSON"
    );
    await flush();

    expect(connection.frames).toEqual([]);
  });

  it("evicts a subscriber whose queue is full without holding up the others", async () => {
    const fast = connect();
    // Registered but never pumped, so nothing drains its queue.
    const slow = new Subscriber(hub, new FakeConnection(), { logger: log });
    hub.register(slow);
    await flush();
    expect(hub.clientCount()).toBe(2);

    for (let i = 1; i <= SEND_BUFFER; i += 1) {
      hub.broadcast(textMessage(`m${i}`));
      await flush();
    }
    expect(slow.pending).toBe(SEND_BUFFER);
    expect(slow.removed).toBe(false);
    expect(hub.clientCount()).toBe(2);

    hub.broadcast(textMessage(`m${SEND_BUFFER + 1}`));
    await flush();

    expect(slow.removed).toBe(true);
    expect(hub.clientCount()).toBe(1);
    expect(log.warn).toHaveBeenCalledWith(
      { pending: SEND_BUFFER },
      "[status] dropped slow client (1 remaining)"
    );
    const received = fast.connection.texts();
    expect(received).toHaveLength(SEND_BUFFER + 1);
    expect(received[0]).toBe("m1");
    expect(received[SEND_BUFFER]).toBe("m257");
  });

  it("closes an evicted subscriber after its in-flight write without sending what was buffered", async () => {
    const connection = new FakeConnection();
    connection.stallWrites = true;
    const { subscriber } = connect(connection);
    await flush();

    for (let i = 1; i <= SEND_BUFFER + 2; i += 1) {
      hub.broadcast(textMessage(`m${i}`));
      await flush();
    }
    expect(subscriber.removed).toBe(true);
    expect(hub.clientCount()).toBe(0);

    connection.releaseWrites();
    await flush();

    expect(connection.texts()).toEqual(["m1"]);
    expect(connection.closeCode).toBe(1000);
    expect(connection.terminated).toBe(false);
  });

  it("delivers every message from concurrent producers exactly once", async () => {
    const { connection } = connect();
    await flush();

    const produce = async (id: number): Promise<void> => {
      for (let i = 0; i < 50; i += 1) {
        hub.broadcast(textMessage(`p${id}-${i}`));
        await Promise.resolve();
      }
    };
    await Promise.all([0, 1, 2, 3].map(produce));
    await flush();

    const received = connection.texts();
    expect(received).toHaveLength(200);
    expect(new Set(received).size).toBe(200);
    expect(received.filter((text) => text.startsWith("p2-"))).toEqual(
      Array.from({ length: 50 }, (_, i) => `p2-${i}`)
    );
  });

  it("treats a repeated unregister as a no-op", async () => {
    const subscriber = new Subscriber(hub, new FakeConnection(), { logger: log });
    hub.register(subscriber);
    await flush();

    hub.unregister(subscriber);
    hub.unregister(subscriber);
    await flush();

    expect(subscriber.removed).toBe(true);
    expect(hub.clientCount()).toBe(0);
    expect(log.info).toHaveBeenCalledWith({}, "[status] client disconnected (0 remaining)");
    expect(hub.isRunning()).toBe(true);
  });

  it("ignores unregister for a subscriber it never had", async () => {
    const stranger = new Subscriber(hub, new FakeConnection(), { logger: log });

    hub.unregister(stranger);
    await flush();

    expect(stranger.removed).toBe(false);
    expect(hub.isRunning()).toBe(true);
  });

  it("refuses to run twice", async () => {
    await expect(hub.run()).rejects.toThrow("[status] hub is already running");
    expect(hub.isRunning()).toBe(true);
  });

  it("describes itself", async () => {
    connect();
    await flush();

    expect(hub.describe()).toEqual({ name: "status", clients: 1, running: true });
  });

  describe("stop", () => {
    it("closes every subscriber and drops pending broadcasts", async () => {
      const { connection } = connect();
      await flush();

      hub.broadcast(textMessage("late-1"));
      hub.broadcast(textMessage("late-2"));
      hub.stop();
      await running;
      await flush();

      expect(log.info).toHaveBeenCalledWith({ clients: 1, discarded: 2 }, "[status] hub stopped");
      expect(connection.texts()).toEqual([]);
      expect(connection.closeCode).toBe(1000);
      expect(hub.describe()).toEqual({ name: "status", clients: 0, running: false });
    });

    it("is idempotent", async () => {
      hub.stop();
      hub.stop();
      await running;

      expect(log.info).toHaveBeenCalledTimes(1);
      expect(log.info).toHaveBeenCalledWith({ clients: 0, discarded: 0 }, "[status] hub stopped");
    });

    it("ignores broadcasts once stopped", async () => {
      hub.stop();
      await running;

      for (let i = 0; i <= BROADCAST_BUFFER; i += 1) {
        hub.broadcast(textMessage("ignored"));
      }

      expect(log.warn).not.toHaveBeenCalled();
    });

    it("closes a subscriber that registers after the hub stopped", async () => {
      hub.stop();
      await running;

      const { connection, subscriber } = connect();
      await flush();

      expect(subscriber.removed).toBe(true);
      expect(connection.closeCode).toBe(1000);
      expect(hub.clientCount()).toBe(0);
    });
  });
});

describe("Hub that never ran", () => {
  it("drops broadcasts beyond its queue with a warning", () => {
    const log = createTestLogger();
    const hub = new Hub("logs", { logger: log });

    for (let i = 0; i < BROADCAST_BUFFER; i += 1) {
      hub.broadcast(textMessage(`m${i}`));
    }
    expect(log.warn).not.toHaveBeenCalled();

    hub.broadcast(textMessage("overflow"));
    expect(log.warn).toHaveBeenCalledWith(
      { capacity: BROADCAST_BUFFER },
      "[logs] broadcast queue full, dropping message"
    );

    hub.stop();
    expect(log.info).toHaveBeenCalledWith(
      { clients: 0, discarded: BROADCAST_BUFFER },
      "[logs] hub stopped"
    );
  });

  it("closes pending registrations when stopped before running", async () => {
    const log = createTestLogger();
    const hub = new Hub("camera", { logger: log });
    const subscriber = new Subscriber(hub, new FakeConnection(), { logger: log });
    hub.register(subscriber);

    hub.stop();
    await hub.run();

    expect(subscriber.removed).toBe(true);
    expect(hub.isRunning()).toBe(false);
  });
});
