export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggerLike = {
  debug: (obj: unknown, msg?: string) => void;
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function two(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local wall-clock time as `HH:mm:ss`. */
export function clockTime(d: Date = new Date()): string {
  return `${two(d.getHours())}:${two(d.getMinutes())}:${two(d.getSeconds())}`;
}

function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${two(d.getMonth() + 1)}-${two(d.getDate())} ${clockTime(d)}`;
}

function isEmpty(obj: unknown): boolean {
  return (
    obj === undefined ||
    (typeof obj === "object" && obj !== null && Object.keys(obj).length === 0)
  );
}

export function createConsoleLogger(level: LogLevel = "info"): LoggerLike {
  const threshold = LEVEL_ORDER[level];

  const emit =
    (at: LogLevel, write: (...args: unknown[]) => void) =>
    (obj: unknown, msg?: string): void => {
      if (LEVEL_ORDER[at] < threshold) return;
      const line = `[${formatTimestamp(new Date())}] ${msg ?? ""}`.trim();
      if (isEmpty(obj)) {
        write(line);
      } else {
        write(line, obj);
      }
    };

  return {
    debug: emit("debug", console.debug),
    info: emit("info", console.log),
    warn: emit("warn", console.warn),
    error: emit("error", console.error)
  };
}

const defaultLogger = createConsoleLogger("info");

export function ensureLogger(log?: LoggerLike): LoggerLike {
  return log ?? defaultLogger;
}
