/**
 * Console Transport
 *
 * Writes method log records to the console in one of three layouts:
 * `pretty` (state on its own line, indented JSON), `compact` (single line)
 * or `json` (one JSON document per record, for log shippers reading stdout).
 *
 * @example
 * ```typescript
 * import { ConsoleTransport } from 'logweave';
 *
 * const transport = new ConsoleTransport({
 *   format: 'compact',
 *   colors: false,
 *   timestamps: true
 * });
 * ```
 */

import type { LogLevel, MethodLogRecord } from '../logger/types.js';
import {
  BaseTransport,
  Environment,
  Formatters,
  Colors,
  type ConsoleTransportConfig,
  type ConsoleMethodName
} from './transport-interface.js';

type ConsoleMethod = (...args: unknown[]) => void;

const DEFAULT_CONSOLE_METHODS: Record<LogLevel, ConsoleMethodName> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
  critical: 'error',
  none: 'log'
};

/**
 * Console transport that outputs records with formatting and colors
 */
export class ConsoleTransport extends BaseTransport {
  private readonly transportConfig: Required<ConsoleTransportConfig>;

  constructor(config: ConsoleTransportConfig = {}) {
    const mergedConfig: Required<ConsoleTransportConfig> = {
      name: 'console',
      format: 'pretty',
      colors: Environment.supportsConsoleStyles,
      timestamps: true,
      timestampFormat: 'HH:mm:ss.SSS',
      enableInProduction: true,
      consoleMethods: {},
      ...config
    };

    super(mergedConfig.name, { ...mergedConfig });
    this.transportConfig = mergedConfig;
  }

  /**
   * Write a record to the console
   */
  write(record: MethodLogRecord): void {
    if (!record) {
      throw new TypeError('MethodLogRecord is required');
    }
    if (typeof record.message !== 'string') {
      throw new TypeError('MethodLogRecord must have a valid message');
    }
    if (!this.isEnabled()) {
      return;
    }

    const method = this.resolveConsoleMethod(record.level);
    method(this.format(record));
  }

  /**
   * Check if transport should be active in current environment
   */
  protected override isEnabled(): boolean {
    if (Environment.isProduction && !this.transportConfig.enableInProduction) {
      return false;
    }
    return typeof console !== 'undefined';
  }

  /**
   * Render a record as one output string according to the configured format
   */
  format(record: MethodLogRecord): string {
    if (this.transportConfig.format === 'json') {
      return Formatters.compactObject({
        timestamp: Formatters.timestamp(record.timestamp, 'iso'),
        level: record.level,
        category: record.category,
        message: record.message,
        ...(Object.keys(record.state).length > 0 ? { state: record.state } : {}),
        ...(record.error !== undefined ? { error: describeError(record.error) } : {})
      });
    }

    const colors = this.transportConfig.colors;
    const paint = (code: string, text: string): string => (colors ? `${code}${text}${Colors.reset}` : text);
    const parts: string[] = [];

    if (this.transportConfig.timestamps) {
      parts.push(paint(Colors.timestamp, Formatters.timestamp(record.timestamp, this.transportConfig.timestampFormat)));
    }
    parts.push(paint(Colors[record.level], record.level.toUpperCase().padEnd(8)));
    if (record.category) {
      parts.push(paint(Colors.category, `[${record.category}]`));
    }
    parts.push(record.message);

    let output = parts.join(' ');
    const separator = this.transportConfig.format === 'pretty' ? '\n' : ' ';

    if (Object.keys(record.state).length > 0) {
      const state = this.transportConfig.format === 'pretty'
        ? Formatters.prettyObject(record.state)
        : Formatters.compactObject(record.state);
      output += `${separator}${paint(Colors.dim, 'State:')} ${state}`;
    }

    if (record.error !== undefined) {
      const { name, message } = describeError(record.error);
      output += `${separator}${paint(Colors.dim, 'Error:')} ${name}: ${message}`;
    }

    return output;
  }

  private resolveConsoleMethod(level: LogLevel): ConsoleMethod {
    const methodName = this.transportConfig.consoleMethods[level] ?? DEFAULT_CONSOLE_METHODS[level];
    const method: ConsoleMethod = console[methodName];
    return method.bind(console);
  }
}

function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: typeof error, message: String(error) };
}

/**
 * Create a console transport with default configuration
 */
export function createConsoleTransport(config?: ConsoleTransportConfig): ConsoleTransport {
  return new ConsoleTransport(config);
}
