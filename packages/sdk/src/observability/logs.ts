/**
 * Structured logging for database operations
 *
 * One line per event: `[timestamp] [LEVEL] [event] collection/id message {details}`.
 * Debug lines are written only while SCANVAULT_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  collection?: string;
  id?: string | number;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Destination of formatted lines
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

/**
 * Render an entry as one line; bigint details print as decimal strings
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.collection !== undefined || entry.id !== undefined) {
    parts.push(`${entry.collection ?? ""}/${entry.id ?? ""}`);
  }
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(
      JSON.stringify(entry.details, (_key, value: unknown) =>
        typeof value === "bigint" ? value.toString() : value
      )
    );
  }
  return parts.join(" ");
}

export class Logger {
  #enabled = true;
  #sink: LogSink;

  constructor(sink: LogSink = consoleSink) {
    this.#sink = sink;
  }

  log(level: LogLevel, event: string, data?: Omit<Partial<LogEntry>, "level" | "event">): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.SCANVAULT_DEBUG) return;
    this.#sink(level, formatEntry({ ...data, timestamp: data?.timestamp ?? new Date().toISOString(), level, event }));
  }

  debug(event: string, data?: Omit<Partial<LogEntry>, "level" | "event">): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Omit<Partial<LogEntry>, "level" | "event">): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Omit<Partial<LogEntry>, "level" | "event">): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Omit<Partial<LogEntry>, "level" | "event">): void {
    this.log("error", event, data);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Route lines elsewhere
   * @returns The previous sink
   */
  setSink(sink: LogSink): LogSink {
    const previous = this.#sink;
    this.#sink = sink;
    return previous;
  }
}

/**
 * Logger shared by every database
 */
export const logger = new Logger();
