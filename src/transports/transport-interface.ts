/**
 * Transport base class and formatting utilities
 */

import type { LogLevel, MethodLogRecord, Transport } from '../logger/types.js';

/**
 * Environment detection utilities
 */
export const Environment = {
  /** Check if running in production environment */
  isProduction: process.env.NODE_ENV === 'production',

  /** Check if stdout supports ANSI styling */
  supportsConsoleStyles: !!process.stdout?.isTTY
} as const;

/**
 * Console transport formatting modes
 */
export type ConsoleFormatMode = 'json' | 'pretty' | 'compact';

/**
 * Console transport configuration
 */
export interface ConsoleTransportConfig {
  /** Transport name (default: 'console') */
  name?: string;

  /** Formatting mode for output */
  format?: ConsoleFormatMode;

  /** Enable/disable colorized output */
  colors?: boolean;

  /** Enable/disable timestamps */
  timestamps?: boolean;

  /** Timestamp format: 'iso', 'HH:mm:ss.SSS' or 'HH:mm:ss' */
  timestampFormat?: string;

  /** Enable/disable in production environments */
  enableInProduction?: boolean;

  /** Custom log level to console method mapping */
  consoleMethods?: Partial<Record<LogLevel, ConsoleMethodName>>;
}

/** Console methods a level can be routed to */
export type ConsoleMethodName = 'log' | 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Base transport class with common functionality
 */
export abstract class BaseTransport implements Transport {
  public readonly name: string;
  public readonly config: Record<string, unknown>;

  constructor(name: string, config: Record<string, unknown> = {}) {
    this.name = name;
    this.config = config;
  }

  /**
   * Write a record to this transport
   */
  abstract write(_record: MethodLogRecord): Promise<void> | void;

  /**
   * Flush any pending logs (default: no-op)
   */
  flush(): Promise<void> | void {
    // Default implementation - no buffering
  }

  /**
   * Close the transport and clean up resources (default: no-op)
   */
  close(): Promise<void> | void {
    // Default implementation - no cleanup needed
  }

  /**
   * Check if transport should be active in current environment
   */
  protected isEnabled(): boolean {
    return true;
  }
}

/**
 * Utility functions for formatting log data
 */
export const Formatters = {
  /**
   * Format timestamp with configurable format
   */
  timestamp(timestamp: number, format: string = 'HH:mm:ss.SSS'): string {
    const iso = new Date(timestamp).toISOString();

    if (format === 'iso') {
      return iso;
    }

    if (format === 'HH:mm:ss') {
      return iso.slice(11, 19);
    }

    return iso.slice(11, 23);
  },

  /**
   * Pretty-print objects with indentation
   */
  prettyObject(obj: unknown, indent: number = 2): string {
    try {
      return JSON.stringify(obj, null, indent);
    } catch {
      // Circular or BigInt-bearing values
      return String(obj);
    }
  },

  /**
   * Compact object representation
   */
  compactObject(obj: unknown): string {
    try {
      return JSON.stringify(obj);
    } catch {
      return String(obj);
    }
  }
} as const;

/**
 * ANSI color codes for terminal output
 */
export const Colors = {
  // Log level colors
  trace: '\x1b[36m',    // Cyan
  debug: '\x1b[34m',    // Blue
  info: '\x1b[32m',     // Green
  warn: '\x1b[33m',     // Yellow
  error: '\x1b[31m',    // Red
  critical: '\x1b[41m', // Red background

  // Style codes
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  category: '\x1b[35m',  // Magenta
  timestamp: '\x1b[90m', // Gray
} as const;
