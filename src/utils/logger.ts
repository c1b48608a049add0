/**
 * Structured logging for the argument parser.
 *
 * Writes one JSON object per line. The parser only emits debug entries
 * (token binding, subcommand selection, environment and config fallbacks)
 * unless something in the configuration sources looks wrong.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry as serialized to the sink.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that produced the entry.
   * @example "Matcher"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "token_bound"
   */
  readonly event: string;

  /** Additional JSON-serializable context. */
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled. When `false`, debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Destination for serialized lines.
   * @defaultValue writes to process.stderr
   */
  readonly write?: (line: string) => void;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that emits JSON lines.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ArgumentParser', debugMode: true });
 * logger.debug('token_bound', { field: 'verbose', source: '--verbose' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.write = options.write ?? writeToStderr;
  }

  /**
   * Returns a logger sharing this one's sink and debug setting under another component name.
   *
   * @param component - Component name for the derived logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, write: this.write });
  }

  /**
   * Logs a debug-level message. Only output when debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    this.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, falling back to a data-less line when the attached
 * data cannot be represented as JSON (cycles, BigInt).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: message,
      originalData: '[unserializable]',
    });
  }
}
