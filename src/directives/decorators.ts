/**
 * Instrumentation decorators
 *
 * The generator reads these statically, so their arguments must be
 * literals. At run time they are markers, except `@Sensitive` on a
 * property, which registers the property for masking.
 *
 * Requires `experimentalDecorators` (parameter decorators).
 *
 * @example
 * ```typescript
 * import { LogClass, LogMethod, Sensitive } from 'logweave';
 *
 * @LogClass({ logLevel: 'debug' })
 * export class AccountService {
 *   private async openCore(owner: string, @Sensitive() pin: string): Promise<string> {
 *     // ...
 *   }
 *
 *   @LogMethod({ skip: true })
 *   health(): boolean {
 *     return true;
 *   }
 * }
 * ```
 */

import type { LogLevel } from '../logger/types.js';
import { registerSensitiveProperty } from './sensitive-registry.js';
import type {
  LogClassOptions,
  LogExceptionOptions,
  LogMethodOptions,
  LogParameterOptions,
  LogResultOptions,
  SensitiveOptions
} from './types.js';

/** Decorator usable on parameters, properties and methods */
export interface SensitiveDecorator {
  (target: object, propertyKey: string | symbol | undefined, parameterIndex: number): void;
  (target: object, propertyKey: string | symbol): void;
  <T>(target: object, propertyKey: string | symbol, descriptor: TypedPropertyDescriptor<T>): void;
}

const marker = (): void => undefined;

/** Instruments every eligible method of the class */
export function LogClass(_options?: LogClassOptions | LogLevel): ClassDecorator {
  return marker;
}

/** Instruments one method, or overrides the class settings for it */
export function LogMethod(_options?: LogMethodOptions | LogLevel): MethodDecorator {
  return marker;
}

/** Renames, clips or skips one parameter in entry records */
export function LogParameter(_options?: LogParameterOptions | string): ParameterDecorator {
  return marker;
}

/** Clips or skips the return value in exit records */
export function LogResult(_options?: LogResultOptions): MethodDecorator {
  return marker;
}

/** Sets the level of exception records for one method */
export function LogException(_options?: LogExceptionOptions | LogLevel): MethodDecorator {
  return marker;
}

/**
 * Masks a parameter, a property, or (on a method) its return value
 */
export function Sensitive(options?: SensitiveOptions | string): SensitiveDecorator {
  const resolved: SensitiveOptions = typeof options === 'string' ? { maskValue: options } : options ?? {};

  return (target: object, propertyKey?: string | symbol, indexOrDescriptor?: unknown): void => {
    // Parameters and methods are masked in generated code; only
    // instance properties need run-time bookkeeping.
    if (propertyKey !== undefined && indexOrDescriptor === undefined && typeof target !== 'function') {
      registerSensitiveProperty(target, propertyKey, resolved);
    }
  };
}
