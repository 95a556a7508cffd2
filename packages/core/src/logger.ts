/**
 * Structured logging for index and collection events
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  index?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export interface Logger {
  debug(event: string, data?: Partial<LogEntry>): void;
  info(event: string, data?: Partial<LogEntry>): void;
  warn(event: string, data?: Partial<LogEntry>): void;
  error(event: string, data?: Partial<LogEntry>): void;
}

export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.index) {
    parts.push(`index=${entry.index}`);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(' ');
}

export class ConsoleLogger implements Logger {
  #enabled = true;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;

    const line = formatEntry({
      ...data,
      timestamp: new Date().toISOString(),
      level,
      event,
    });

    // Route to appropriate console method
    switch (level) {
      case 'debug':
        if (process.env.POLYDEX_DEBUG) {
          console.debug(line);
        }
        break;
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log('error', event, data);
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
export const logger = new ConsoleLogger();
