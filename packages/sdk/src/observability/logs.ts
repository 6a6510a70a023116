/**
 * Structured logging for feed decoding
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Document type */
  type?: string;
  field?: string;
  documentId?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Receives formatted log lines. Defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  // Route to appropriate console method
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

export class Logger {
  #enabled = true;
  #debug: boolean;
  #sink: LogSink;

  /**
   * @param debug - Emit debug entries; defaults to the DOCFEED_DEBUG environment variable
   */
  constructor(sink: LogSink = consoleSink, debug = Boolean(process.env.DOCFEED_DEBUG)) {
    this.#sink = sink;
    this.#debug = debug;
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !this.#debug) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(level, formatLogEntry(entry));
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setDebug(debug: boolean): void {
    this.#debug = debug;
  }
}

/**
 * `[timestamp] [LEVEL] [event] type/field documentId message {details}`
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.type || entry.field) {
    parts.push(`${entry.type ?? ""}/${entry.field ?? ""}`);
  }
  if (entry.documentId) {
    parts.push(entry.documentId);
  }
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

/**
 * Global logger instance
 */
export const logger = new Logger();
