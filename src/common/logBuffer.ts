import { BeaconLoggerEvents, LogLevel, LogRecord } from "./logger";

export const DEFAULT_LOG_CAPACITY = 200;

type Listener = () => void;

/**
 * Keeps the newest formatted log lines in memory for the log view. Debug and
 * trace records stay out of it; they only reach the log destination.
 */
export class LogBuffer {
  private readonly entries: string[] = [];
  private readonly listeners = new Set<Listener>();

  constructor(readonly capacity: number = DEFAULT_LOG_CAPACITY) {}

  push(line: string): void {
    this.entries.push(line);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    for (const l of this.listeners) l();
  }

  lines(): readonly string[] {
    return this.entries.slice();
  }

  get size(): number {
    return this.entries.length;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Starts collecting from the process-wide logger events. Returns a detach function. */
  attach(): () => void {
    const onLog = (record: LogRecord) => {
      if (record.level === LogLevel.TRACE || record.level === LogLevel.DEBUG) return;
      this.push(formatLogLine(record));
    };
    BeaconLoggerEvents.on("log", onLog);
    return () => {
      BeaconLoggerEvents.off("log", onLog);
    };
  }
}

export function formatLogLine(record: LogRecord): string {
  const t = record.time;
  const hh = String(t.getHours()).padStart(2, "0");
  const mm = String(t.getMinutes()).padStart(2, "0");
  const ss = String(t.getSeconds()).padStart(2, "0");
  return `${hh}:${mm}:${ss} ${record.level.toUpperCase().padEnd(5)} ${record.message}`;
}
