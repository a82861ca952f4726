/**
 * Method logger - the runtime half of instrumentation
 *
 * Generated wrappers call {@link MethodLogger.logEntry},
 * {@link MethodLogger.logExit} and {@link MethodLogger.logException}. Each
 * call first asks the sink whether the level is enabled and returns before
 * any formatting when it is not. Enabled calls produce two outputs:
 *
 * - a message, rendered from the event's template;
 * - a structured field map holding `ClassName`, `MethodName`, and every
 *   other field only if the template references its placeholder. Parameters,
 *   return values and exception details never reach a structured sink
 *   through a field the visible message does not show.
 *
 * @example
 * ```typescript
 * import { createMethodLogger, createLogger, ConsoleTransport } from 'logweave';
 *
 * const methodLogger = createMethodLogger(
 *   { entryFormat: 'Entering {ClassName}.{MethodName} with {Parameters}' },
 *   createLogger({ level: 'debug', transports: [new ConsoleTransport()] })
 * );
 *
 * methodLogger.logEntry('OrderService', 'place', { sku: 'A-1', quantity: 2 }, 'info');
 * // message: Entering OrderService.place with sku="A-1", quantity=2
 * // state:   { ClassName, MethodName, Parameters }
 * ```
 */

import type { LogLevel, LogSink, WritableLogLevel } from '../logger/types.js';
import { createLogger } from '../logger/logger-impl.js';
import { ConsoleTransport } from '../transports/console-transport.js';
import { MessageTemplate } from './message-template.js';
import { createRuntimeOptions, type RuntimeOptions, type RuntimeOptionsInput } from './runtime-options.js';
import { TypeFilter, type LoggedTypeInfo } from './type-filter.js';
import { ValueFormatter, describeType } from './value-formatter.js';

/**
 * The contract generated wrappers call. No method throws.
 */
export interface MethodLogger {
  /** Records a call with its (already masked) arguments */
  logEntry(
    className: string,
    methodName: string,
    parameters: Readonly<Record<string, unknown>>,
    level: LogLevel
  ): void;

  /** Records a successful return; `elapsedMillis` is undefined when timing is off */
  logExit(
    className: string,
    methodName: string,
    returnValue: unknown,
    elapsedMillis: number | undefined,
    level: LogLevel
  ): void;

  /** Records a thrown value; the wrapper re-throws it afterwards */
  logException(
    className: string,
    methodName: string,
    error: unknown,
    elapsedMillis: number | undefined,
    level: LogLevel
  ): void;

  /** Whether instances of this type should receive this logger */
  shouldLogType(type: LoggedTypeInfo): boolean;
}

/** Prefix of per-parameter placeholders, e.g. `{Param_email}` */
export const PARAM_PLACEHOLDER_PREFIX = 'Param_';

/** Shown in place of a return value when return values are switched off */
export const OMITTED_VALUE = '<omitted>';

type FieldValue = string | number | null;
type FieldResolver = (name: string) => FieldValue | undefined;

const NO_PARAMETERS: Readonly<Record<string, unknown>> = Object.freeze({});

/**
 * Everything derived from one options object. Replaced as a whole by
 * {@link MethodLoggerImpl.reconfigure}, so a call in flight always sees a
 * consistent set.
 */
interface ActiveConfiguration {
  readonly options: RuntimeOptions;
  readonly filter: TypeFilter;
  readonly formatter: ValueFormatter;
  readonly entry: MessageTemplate;
  readonly exit: MessageTemplate;
  readonly exception: MessageTemplate;
}

function activate(options: RuntimeOptions): ActiveConfiguration {
  return Object.freeze({
    options,
    filter: new TypeFilter(options),
    formatter: new ValueFormatter(options),
    entry: new MessageTemplate(options.entryFormat),
    exit: new MessageTemplate(options.exitFormat),
    exception: new MessageTemplate(options.exceptionFormat)
  });
}

/**
 * Default {@link MethodLogger} writing into a {@link LogSink}
 */
export class MethodLoggerImpl implements MethodLogger {
  private active: ActiveConfiguration;

  constructor(
    private readonly sink: LogSink,
    options: RuntimeOptions = createRuntimeOptions()
  ) {
    this.active = activate(options);
  }

  /** Options currently in effect */
  get options(): RuntimeOptions {
    return this.active.options;
  }

  /**
   * Swaps in a new options object. Pass the result of
   * `createRuntimeOptions`; the previous options are left untouched.
   */
  reconfigure(options: RuntimeOptions): void {
    this.active = activate(options);
  }

  shouldLogType(type: LoggedTypeInfo): boolean {
    return this.active.filter.shouldLogType(type);
  }

  logEntry(
    className: string,
    methodName: string,
    parameters: Readonly<Record<string, unknown>>,
    level: LogLevel
  ): void {
    try {
      if (!this.isEnabled(level, className)) return;

      const active = this.active;
      const params = active.options.logParameters ? parameters : NO_PARAMETERS;

      this.write(active, active.entry, level, className, methodName, name => {
        if (name === 'Parameters') {
          return active.formatter.formatParameters(params);
        }
        if (name.startsWith(PARAM_PLACEHOLDER_PREFIX)) {
          const key = name.slice(PARAM_PLACEHOLDER_PREFIX.length);
          return Object.prototype.hasOwnProperty.call(params, key) ? active.formatter.format(params[key]) : undefined;
        }
        return undefined;
      });
    } catch (error) {
      reportFailure('entry', className, methodName, error);
    }
  }

  logExit(
    className: string,
    methodName: string,
    returnValue: unknown,
    elapsedMillis: number | undefined,
    level: LogLevel
  ): void {
    try {
      if (!this.isEnabled(level, className)) return;

      const active = this.active;

      this.write(active, active.exit, level, className, methodName, name => {
        switch (name) {
          case 'ReturnValue':
            return active.options.logReturnValues ? active.formatter.format(returnValue) : OMITTED_VALUE;
          case 'ExecutionTime':
            return elapsedTime(active.options, elapsedMillis);
          default:
            return undefined;
        }
      });
    } catch (error) {
      reportFailure('exit', className, methodName, error);
    }
  }

  logException(
    className: string,
    methodName: string,
    error: unknown,
    elapsedMillis: number | undefined,
    level: LogLevel
  ): void {
    try {
      if (!this.isEnabled(level, className)) return;

      const active = this.active;
      if (!active.options.logExceptions) return;

      this.write(active, active.exception, level, className, methodName, name => {
        switch (name) {
          case 'ExceptionType':
            return describeType(error);
          case 'ExceptionMessage':
            return describeErrorMessage(error, active.formatter);
          case 'ExecutionTime':
            return elapsedTime(active.options, elapsedMillis);
          default:
            return undefined;
        }
      }, error);
    } catch (failure) {
      reportFailure('exception', className, methodName, failure);
    }
  }

  private isEnabled(level: LogLevel, className: string): level is WritableLogLevel {
    return level !== 'none' && this.sink.isEnabled(level, className);
  }

  /**
   * Renders the message and the disclosed state, then hands the record to
   * the sink. `resolveField` only runs for placeholders the template uses.
   */
  private write(
    active: ActiveConfiguration,
    template: MessageTemplate,
    level: WritableLogLevel,
    className: string,
    methodName: string,
    resolveField: FieldResolver,
    error?: unknown
  ): void {
    const cache = new Map<string, FieldValue | undefined>();
    const resolve: FieldResolver = name => {
      if (name === 'ClassName') return className;
      if (name === 'MethodName') return methodName;
      if (!cache.has(name)) {
        cache.set(name, resolveField(name));
      }
      return cache.get(name);
    };

    const message = template.render(name => {
      const value = resolve(name);
      if (value === undefined) return undefined;
      return value === null ? 'n/a' : String(value);
    });

    const state: Record<string, unknown> = {};
    if (active.options.useStructuredLogging) {
      state.ClassName = className;
      state.MethodName = methodName;
      for (const name of template.placeholders) {
        const value = resolve(name);
        if (value !== undefined) {
          state[name] = value;
        }
      }
    }

    this.sink.write({
      level,
      message,
      state: Object.freeze(state),
      ...(error !== undefined ? { error } : {}),
      timestamp: Date.now(),
      category: className
    });
  }
}

function elapsedTime(options: RuntimeOptions, elapsedMillis: number | undefined): FieldValue {
  return options.logExecutionTime && elapsedMillis !== undefined ? elapsedMillis : null;
}

function describeErrorMessage(error: unknown, formatter: ValueFormatter): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return formatter.format(error);
}

function reportFailure(event: string, className: string, methodName: string, error: unknown): void {
  // Logging must not break the instrumented call; surface the failure instead
  console.error(`Method logging failed for ${className}.${methodName} (${event}):`, error);
}

/**
 * Creates a method logger. Without a sink, records go to the console at
 * `options.defaultLogLevel`.
 */
export function createMethodLogger(options: RuntimeOptionsInput = {}, sink?: LogSink): MethodLoggerImpl {
  const runtimeOptions = createRuntimeOptions(options);
  const target = sink ?? createLogger(
    { level: runtimeOptions.defaultLogLevel, transports: [new ConsoleTransport()] },
    'method-logger'
  );
  return new MethodLoggerImpl(target, runtimeOptions);
}
