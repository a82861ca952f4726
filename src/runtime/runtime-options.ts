/**
 * Runtime options for the method logger
 *
 * Built once with {@link createRuntimeOptions}, validated and frozen. A
 * method logger that needs different settings is handed a new options
 * object; the old one is never edited.
 *
 * @example
 * ```typescript
 * const options = createRuntimeOptions({
 *   maxCollectionSize: 5,
 *   excludedClasses: ['*Health*'],
 *   entryFormat: 'Entering {ClassName}.{MethodName} with {Parameters}'
 * });
 * ```
 */

import type { LogLevel } from '../logger/types.js';
import { isLogLevel } from '../logger/logger-config.js';

/**
 * Process-wide runtime settings
 */
export interface RuntimeOptions {
  /** Threshold of the default console sink */
  readonly defaultLogLevel: LogLevel;

  /** Global switch for elapsed time, AND-ed with per-method settings */
  readonly logExecutionTime: boolean;

  /** Global switch for parameter maps */
  readonly logParameters: boolean;

  /** Global switch for return values */
  readonly logReturnValues: boolean;

  /** Global switch for exception records */
  readonly logExceptions: boolean;

  /** Namespace prefixes to include; empty includes everything */
  readonly includedNamespaces: readonly string[];

  /** Namespace prefixes to exclude; wins over inclusion */
  readonly excludedNamespaces: readonly string[];

  /** Class name globs to include; empty includes everything */
  readonly includedClasses: readonly string[];

  /** Class name globs to exclude; wins over inclusion */
  readonly excludedClasses: readonly string[];

  /** Strings longer than this are truncated */
  readonly maxStringLength: number;

  /** Iterables show at most this many items */
  readonly maxCollectionSize: number;

  /** Attach a structured field map to each record */
  readonly useStructuredLogging: boolean;

  /** Entry template: {ClassName} {MethodName} {Parameters} {Param_<name>} */
  readonly entryFormat: string;

  /** Exit template: {ClassName} {MethodName} {ReturnValue} {ExecutionTime} */
  readonly exitFormat: string;

  /** Exception template: {ClassName} {MethodName} {ExceptionType} {ExceptionMessage} {ExecutionTime} */
  readonly exceptionFormat: string;
}

/** Options accepted by {@link createRuntimeOptions} */
export type RuntimeOptionsInput = Partial<RuntimeOptions>;

/**
 * Default runtime options
 */
export const DEFAULT_RUNTIME_OPTIONS: RuntimeOptions = Object.freeze<RuntimeOptions>({
  defaultLogLevel: 'info',
  logExecutionTime: true,
  logParameters: true,
  logReturnValues: true,
  logExceptions: true,
  includedNamespaces: Object.freeze([]),
  excludedNamespaces: Object.freeze([]),
  includedClasses: Object.freeze([]),
  excludedClasses: Object.freeze([]),
  maxStringLength: 1000,
  maxCollectionSize: 10,
  useStructuredLogging: true,
  entryFormat: 'Entering {ClassName}.{MethodName}',
  exitFormat: 'Exiting {ClassName}.{MethodName} (took {ExecutionTime}ms)',
  exceptionFormat: 'Exception in {ClassName}.{MethodName}: {ExceptionType} - {ExceptionMessage}'
});

const BOOLEAN_FIELDS = [
  'logExecutionTime',
  'logParameters',
  'logReturnValues',
  'logExceptions',
  'useStructuredLogging'
] as const;

const LIST_FIELDS = [
  'includedNamespaces',
  'excludedNamespaces',
  'includedClasses',
  'excludedClasses'
] as const;

const TEMPLATE_FIELDS = ['entryFormat', 'exitFormat', 'exceptionFormat'] as const;

const LIMIT_FIELDS = ['maxStringLength', 'maxCollectionSize'] as const;

/**
 * Merges user options over the defaults, validates them and freezes the result.
 * Fields that are missing or `undefined` take the default.
 *
 * @throws {TypeError} If a field has the wrong type
 * @throws {RangeError} If a limit is negative or not an integer
 */
export function createRuntimeOptions(input: RuntimeOptionsInput = {}): RuntimeOptions {
  const option = <K extends keyof RuntimeOptions>(key: K): RuntimeOptions[K] =>
    input[key] ?? DEFAULT_RUNTIME_OPTIONS[key];

  const merged: RuntimeOptions = {
    defaultLogLevel: option('defaultLogLevel'),
    logExecutionTime: option('logExecutionTime'),
    logParameters: option('logParameters'),
    logReturnValues: option('logReturnValues'),
    logExceptions: option('logExceptions'),
    includedNamespaces: option('includedNamespaces'),
    excludedNamespaces: option('excludedNamespaces'),
    includedClasses: option('includedClasses'),
    excludedClasses: option('excludedClasses'),
    maxStringLength: option('maxStringLength'),
    maxCollectionSize: option('maxCollectionSize'),
    useStructuredLogging: option('useStructuredLogging'),
    entryFormat: option('entryFormat'),
    exitFormat: option('exitFormat'),
    exceptionFormat: option('exceptionFormat')
  };

  if (!isLogLevel(merged.defaultLogLevel)) {
    throw new TypeError(`defaultLogLevel must be a log level, got ${String(merged.defaultLogLevel)}`);
  }

  for (const field of BOOLEAN_FIELDS) {
    if (typeof merged[field] !== 'boolean') {
      throw new TypeError(`${field} must be a boolean`);
    }
  }

  for (const field of LIMIT_FIELDS) {
    const value = merged[field];
    if (typeof value !== 'number') {
      throw new TypeError(`${field} must be a number`);
    }
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`${field} must be a non-negative integer, got ${value}`);
    }
  }

  for (const field of TEMPLATE_FIELDS) {
    if (typeof merged[field] !== 'string') {
      throw new TypeError(`${field} must be a string`);
    }
  }

  const lists: Pick<RuntimeOptions, (typeof LIST_FIELDS)[number]> = {
    includedNamespaces: freezeList(merged.includedNamespaces, 'includedNamespaces'),
    excludedNamespaces: freezeList(merged.excludedNamespaces, 'excludedNamespaces'),
    includedClasses: freezeList(merged.includedClasses, 'includedClasses'),
    excludedClasses: freezeList(merged.excludedClasses, 'excludedClasses')
  };

  return Object.freeze({ ...merged, ...lists });
}

function freezeList(value: unknown, field: string): readonly string[] {
  if (!Array.isArray(value)) {
    throw new TypeError(`${field} must be an array of strings`);
  }
  const entries: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      throw new TypeError(`${field} must be an array of strings`);
    }
    entries.push(entry);
  }
  return Object.freeze(entries);
}
