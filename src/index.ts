/**
 * logweave - method-level logging generated at build time
 *
 * Decorate classes or methods with logging directives; the generator
 * (`logweave/generator`) reads them and writes a companion module per class
 * that adds logging wrapper methods. At run time those wrappers call the
 * {@link MethodLogger} injected into each instance.
 *
 * ## Directives
 * - `@LogClass` / `@LogMethod`: instrument every method, or one
 * - `@LogParameter` / `@LogResult`: rename, clip or skip values
 * - `@LogException`: level of exception records
 * - `@Sensitive`: mask parameters, return values and properties
 *
 * @example
 * ```typescript
 * // services/user-service.ts
 * import { LogClass, Sensitive } from 'logweave';
 *
 * @LogClass({ logLevel: 'info' })
 * export class UserService {
 *   getUserCore(id: number): string {
 *     return `user-${id}`;
 *   }
 *
 *   loginCore(user: string, @Sensitive() password: string): boolean {
 *     return password.length > 0;
 *   }
 * }
 *
 * // composition root
 * import './services/user-service.UserService.logging.js';
 * import { attachMethodLogger, createMethodLogger } from 'logweave';
 *
 * const service = new UserService();
 * attachMethodLogger(service, createMethodLogger({ defaultLogLevel: 'debug' }));
 * service.getUser(42);
 * ```
 */

export * from './directives/index.js';
export * from './runtime/index.js';
export * from './logger/index.js';
export * from './transports/index.js';
