/**
 * The capability generated classes implement
 *
 * Generated modules add {@link MethodLoggerAware} to every instrumented
 * class. Whatever constructs those objects (a container, a factory, a test)
 * hands them a logger through {@link attachMethodLogger}, which relies on
 * the typed interface rather than looking a setter up by name.
 */

import type { MethodLogger } from './method-logger.js';
import type { LoggedTypeInfo } from './type-filter.js';

/** Key of the injected logger on instrumented instances */
export const METHOD_LOGGER: unique symbol = Symbol('logweave.methodLogger');

/** Key of the type descriptor on instrumented prototypes */
export const LOGGED_TYPE: unique symbol = Symbol('logweave.loggedType');

/**
 * Members generated into every instrumented class
 */
export interface MethodLoggerAware {
  /** Namespace and class name, fixed at generation time */
  readonly [LOGGED_TYPE]: LoggedTypeInfo;

  /** The injected logger; wrappers log nothing while it is unset */
  [METHOD_LOGGER]?: MethodLogger;

  /** Stores the logger every wrapper of this instance uses */
  setMethodLogger(logger: MethodLogger): void;
}

/**
 * Type guard for instances of generated classes
 */
export function isMethodLoggerAware(value: unknown): value is MethodLoggerAware {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const type: unknown = Reflect.get(value, LOGGED_TYPE);
  return (
    typeof Reflect.get(value, 'setMethodLogger') === 'function' &&
    typeof type === 'object' &&
    type !== null &&
    typeof Reflect.get(type, 'className') === 'string' &&
    typeof Reflect.get(type, 'namespace') === 'string'
  );
}

/**
 * Injects `logger` into `target` when the target is instrumented and the
 * logger's filters accept its type.
 *
 * @returns Whether the logger was attached
 */
export function attachMethodLogger(target: unknown, logger: MethodLogger): boolean {
  if (!isMethodLoggerAware(target) || !logger.shouldLogType(target[LOGGED_TYPE])) {
    return false;
  }
  target.setMethodLogger(logger);
  return true;
}
