export type LogSource = "SYSTEM" | "COMMAND" | "PILOT";

export interface LogEntry {
  timestamp: Date;
  source: LogSource;
  message: string;
}

export interface LogSink {
  log(message: string, source?: LogSource): void;
}

export type LogListener = (entry: LogEntry) => void;

function pad2(n: number): string {
  return n.toString().padStart(2, "0");
}

export function formatTimestamp(d: Date): string {
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

/** `[HH:MM:SS] SOURCE: message` */
export function formatLogEntry(entry: LogEntry): string {
  return `[${formatTimestamp(entry.timestamp)}] ${entry.source}: ${entry.message}`;
}

/**
 * Append-only comms log. The UI subscribes to it; the simulation only writes.
 */
export class CommLog implements LogSink {
  private entries: LogEntry[] = [];
  private listeners: LogListener[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  public log(message: string, source: LogSource = "SYSTEM") {
    const entry: LogEntry = { timestamp: this.now(), source, message };
    this.entries.push(entry);
    this.listeners.forEach((listener) => listener(entry));
  }

  /** Returns an unsubscribe function. */
  public subscribe(listener: LogListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  public getEntries(): readonly LogEntry[] {
    return this.entries;
  }
}
