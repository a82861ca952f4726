/**
 * Core Logger Types and Interface Definitions
 *
 * Foundational type definitions for the logging backend that instrumented
 * methods write into. The method logger only needs a {@link LogSink}; the
 * standalone {@link Logger} with its transports is the sink shipped with
 * the package.
 *
 * Key Types:
 * - LogSink, the narrow contract the method logger writes records into
 * - Logger interface for level management and transport lifecycle
 * - Transport interface for pluggable log output destinations
 * - MethodLogRecord for the level, message and structured state of a call
 *
 * @example
 * ```typescript
 * import type { LogSink, MethodLogRecord } from 'logweave';
 *
 * // Minimal custom sink
 * const records: MethodLogRecord[] = [];
 * const sink: LogSink = {
 *   isEnabled: (level) => level !== 'trace',
 *   write: (record) => { records.push(record); }
 * };
 * ```
 */

/**
 * Log levels supported by the logger. `none` disables a directive or a
 * threshold entirely and is never written.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'critical' | 'none';

/** Every level that can appear on a written record */
export type WritableLogLevel = Exclude<LogLevel, 'none'>;

/**
 * A formatted record produced by the method logger
 */
export interface MethodLogRecord {
  /** Log level */
  level: WritableLogLevel;

  /** Template-expanded, human-readable message */
  message: string;

  /** Flat structured fields, empty when structured logging is off */
  state: Readonly<Record<string, unknown>>;

  /** The error observed by an exception record */
  error?: unknown;

  /** Timestamp when the record was created */
  timestamp: number;

  /** Category (class name) that produced the record */
  category: string;
}

/**
 * The backend contract consumed by the method logger
 */
export interface LogSink {
  /** Whether records at this level would be written */
  isEnabled(level: LogLevel, category?: string): boolean;

  /** Write a record; callers check {@link isEnabled} first */
  write(record: MethodLogRecord): void;
}

/**
 * Transport interface for log output
 */
export interface Transport {
  /** Transport name for identification */
  name: string;

  /** Write a record to this transport */
  write(record: MethodLogRecord): Promise<void> | void;

  /** Flush any pending logs */
  flush(): Promise<void> | void;

  /** Close the transport and clean up resources */
  close(): Promise<void> | void;

  /** Transport configuration */
  config?: Record<string, unknown>;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to process */
  level?: LogLevel;

  /** Per-category minimum levels, overriding `level` */
  categoryLevels?: Record<string, LogLevel>;

  /** Transport configuration */
  transports?: Transport[];
}

/**
 * Logger interface - the standalone backend
 */
export interface Logger extends LogSink {
  /** Logger name/identifier */
  readonly name: string;

  /** Current log level */
  readonly level: LogLevel;

  /** Set minimum log level */
  setLevel(level: LogLevel): void;

  /** Set category-specific log level */
  setCategoryLevel(category: string, level: LogLevel): void;

  /** Add a transport to this logger */
  addTransport(transport: Transport): void;

  /** Remove a transport from this logger */
  removeTransport(transportName: string): boolean;

  /** Flush all transports */
  flush(): Promise<void>;

  /** Destroy logger and clean up resources */
  destroy(): Promise<void>;
}
