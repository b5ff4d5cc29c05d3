import { afterEach, describe, expect, it, vi } from "vitest";

import { clockTime, createConsoleLogger } from "./logger";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below its level and appends structured fields", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const log = createConsoleLogger("info");

    log.debug({ detail: 1 }, "hidden");
    log.info({}, "hub started");
    log.info({ clients: 2 }, "hub stopped");

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(2);
    expect(info).toHaveBeenNthCalledWith(
      1,
      expect.stringMatching(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] hub started$/)
    );
    expect(info).toHaveBeenNthCalledWith(2, expect.stringMatching(/\] hub stopped$/), {
      clients: 2
    });
  });

  it("routes warnings and errors to their console streams", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = createConsoleLogger("warn");

    log.info({}, "hidden");
    log.warn({}, "queue full");
    log.error({ err: "boom" }, "loop failed");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(expect.stringMatching(/\] loop failed$/), { err: "boom" });
  });
});

describe("clockTime", () => {
  it("formats local time with padding", () => {
    expect(clockTime(new Date(2024, 0, 2, 9, 5, 7))).toBe("09:05:07");
  });
});
