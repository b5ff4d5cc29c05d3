import { vi } from "vitest";

import type { LoggerLike } from "../logger";

// Captured before any test installs fake timers.
const realSetImmediate = setImmediate;

/** Lets every queued microtask and pump iteration run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => {
    realSetImmediate(() => resolve());
  });
}

export function createTestLogger() {
  return {
    debug: vi.fn<(obj: unknown, msg?: string) => void>(),
    info: vi.fn<(obj: unknown, msg?: string) => void>(),
    warn: vi.fn<(obj: unknown, msg?: string) => void>(),
    error: vi.fn<(obj: unknown, msg?: string) => void>()
  } satisfies LoggerLike;
}
