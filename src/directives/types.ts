/**
 * Instrumentation directive shapes
 *
 * These records are what the decorators accept and what the generator reads
 * back out of source. Every field is optional: an absent field falls back to
 * the class directive, then to {@link DEFAULT_INSTRUMENTATION}.
 */

import type { LogLevel } from '../logger/types.js';

/** Settings shared by class- and method-level directives */
export interface InstrumentationDirective {
  /** Level of entry and exit records */
  logLevel?: LogLevel;

  /** Measure and report elapsed time */
  logExecutionTime?: boolean;

  /** Report arguments on entry */
  logParameters?: boolean;

  /** Report the return value on exit */
  logReturnValue?: boolean;

  /** Report exceptions before re-throwing them */
  logExceptions?: boolean;
}

/** Class-level directive (`@LogClass`) */
export type LogClassOptions = InstrumentationDirective;

/** Method-level directive (`@LogMethod`) */
export interface LogMethodOptions extends InstrumentationDirective {
  /** Exclude the method even when its class is instrumented */
  skip?: boolean;
}

/** Per-parameter directive (`@LogParameter`) */
export interface LogParameterOptions {
  /** Leave the parameter out of the entry record */
  skip?: boolean;

  /** Key used in the parameter map instead of the parameter name */
  name?: string;

  /** Maximum length of a string argument; -1 means unbounded */
  maxLength?: number;
}

/** Return value directive (`@LogResult`) */
export interface LogResultOptions {
  /** Do not pass the return value to the exit record */
  skip?: boolean;

  /** Maximum length of a string return value; -1 means unbounded */
  maxLength?: number;
}

/** Exception directive (`@LogException`) */
export interface LogExceptionOptions {
  /** Level of the exception record; defaults to the method's level */
  logLevel?: LogLevel;
}

/** Sensitivity directive (`@Sensitive`) */
export interface SensitiveOptions {
  /** Text logged in place of the value */
  maskValue?: string;

  /** Append the real value's length to the mask */
  showLength?: boolean;
}

/** Fully populated instrumentation settings */
export type ResolvedInstrumentation = Required<InstrumentationDirective>;

/** Hard defaults applied when neither method nor class sets a field */
export const DEFAULT_INSTRUMENTATION: Readonly<ResolvedInstrumentation> = Object.freeze<ResolvedInstrumentation>({
  logLevel: 'info',
  logExecutionTime: true,
  logParameters: true,
  logReturnValue: true,
  logExceptions: true
});

/** Mask used when `@Sensitive` does not name one */
export const DEFAULT_MASK_VALUE = '***SENSITIVE***';
