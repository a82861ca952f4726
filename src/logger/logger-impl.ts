/** Core Logger Implementation - Standalone log sink with transport system */

import type { Logger, LoggerConfig, LogLevel, MethodLogRecord, Transport } from './types.js';
import { isLogLevel, mergeConfig, shouldLog } from './logger-config.js';
import { TransportRegistry } from './transport-registry.js';

/** Core standalone logger implementation with transport system */
export class LoggerImpl implements Logger {
  private readonly transportRegistry: TransportRegistry;
  private readonly categoryLevels: Map<string, LogLevel>;
  private currentLevel: LogLevel;
  private destroyed = false;

  /** Creates a new logger instance */
  constructor(
    config: LoggerConfig = {},
    private readonly loggerName: string = 'default'
  ) {
    const merged = mergeConfig(config);
    this.currentLevel = merged.level;
    this.categoryLevels = new Map(Object.entries(merged.categoryLevels));
    this.transportRegistry = new TransportRegistry();

    // Add all configured transports to the registry
    merged.transports.forEach(transport => {
      this.transportRegistry.add(transport);
    });
  }

  /** Logger name/identifier */
  get name(): string {
    return this.loggerName;
  }

  /** Current minimum log level */
  get level(): LogLevel {
    return this.currentLevel;
  }

  /** Whether a record at this level (and category) would be written */
  isEnabled(level: LogLevel, category?: string): boolean {
    if (this.destroyed) return false;

    const minLevel = category !== undefined
      ? this.categoryLevels.get(category) ?? this.currentLevel
      : this.currentLevel;
    return shouldLog(level, minLevel);
  }

  /** Writes a record to every transport */
  write(record: MethodLogRecord): void {
    if (this.destroyed) return;

    this.transportRegistry.writeToAll(record);
  }

  /** Sets the minimum log level for this logger */
  setLevel(level: LogLevel): void {
    if (!isLogLevel(level)) {
      throw new TypeError(`Invalid log level: ${String(level)}`);
    }
    this.currentLevel = level;
  }

  /** Sets log level for a specific category */
  setCategoryLevel(category: string, level: LogLevel): void {
    if (typeof category !== 'string' || category.length === 0) {
      throw new TypeError('Category must be a non-empty string');
    }
    if (!isLogLevel(level)) {
      throw new TypeError(`Invalid log level: ${String(level)}`);
    }
    this.categoryLevels.set(category, level);
  }

  /** Adds a transport to this logger */
  addTransport(transport: Transport): void {
    this.transportRegistry.add(transport);
  }

  /** Removes a transport from this logger */
  removeTransport(transportName: string): boolean {
    return this.transportRegistry.remove(transportName);
  }

  /** Flushes all transports */
  async flush(): Promise<void> {
    await this.transportRegistry.flushAll();
  }

  /** Destroys the logger and cleans up resources */
  async destroy(): Promise<void> {
    if (this.destroyed) return;

    this.destroyed = true;

    await this.transportRegistry.flushAll();
    await this.transportRegistry.closeAll();
  }
}

/** Creates a new standalone logger instance */
export function createLogger(config?: LoggerConfig, name?: string): Logger {
  return new LoggerImpl(config, name);
}
