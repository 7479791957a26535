/**
 * Structured logging for engine operations
 *
 * Everything goes to stderr so log lines never mix with CLI results on stdout.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  database?: string;
  schema?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Render a log entry as a single console line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.database || entry.schema) {
    parts.push(`${entry.database ?? ""}/${entry.schema ?? ""}`);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

class Logger {
  #enabled = true;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.RECORDBOX_DEBUG) return;

    const line = formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    });

    // console.debug and console.log write to stdout
    switch (level) {
      case "info":
      case "warn":
        console.warn(line);
        break;
      case "debug":
      case "error":
        console.error(line);
        break;
    }
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
}

/**
 * Global logger instance
 */
export const logger = new Logger();
