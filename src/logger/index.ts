/**
 * Standalone log sink with transports
 *
 * The backend instrumented methods write into when no other sink is
 * supplied.
 *
 * @example
 * ```typescript
 * import { createLogger, ConsoleTransport } from 'logweave';
 *
 * const logger = createLogger({
 *   level: 'debug',
 *   transports: [new ConsoleTransport({ format: 'compact' })]
 * });
 * ```
 */

export * from './types.js';
export * from './logger-config.js';
export * from './logger-impl.js';
export { TransportRegistry } from './transport-registry.js';
