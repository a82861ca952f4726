/**
 * Transport registry for managing multiple log transports
 *
 * Keeps transport failures isolated from each other and from the
 * instrumented call that produced the record. Flush and close run in
 * parallel across transports.
 *
 * @example
 * ```typescript
 * import { TransportRegistry } from './transport-registry';
 * import { ConsoleTransport } from '../transports';
 *
 * const registry = new TransportRegistry();
 * registry.add(new ConsoleTransport());
 *
 * registry.writeToAll(record);
 *
 * await registry.flushAll();
 * await registry.closeAll();
 * ```
 */

import type { Transport, MethodLogRecord } from './types.js';

/**
 * Registry for managing transport instances with error isolation and lifecycle management
 */
export class TransportRegistry {
  private transports: Transport[] = [];

  /**
   * Add a transport to the registry
   *
   * @throws {TypeError} If transport is invalid
   * @throws {Error} If a transport with the same name exists
   */
  add(transport: Transport): void {
    if (!transport || typeof transport !== 'object') {
      throw new TypeError('Transport must be a valid object');
    }
    if (typeof transport.write !== 'function') {
      throw new TypeError('Transport must have a write method');
    }
    if (!transport.name || typeof transport.name !== 'string') {
      throw new TypeError('Transport must have a valid name');
    }
    if (this.transports.find(t => t.name === transport.name)) {
      throw new Error(`Transport with name '${transport.name}' already exists`);
    }

    this.transports.push(transport);
  }

  /**
   * Remove a transport from the registry by name
   *
   * @returns True if transport was found and removed, false otherwise
   */
  remove(transportName: string): boolean {
    if (typeof transportName !== 'string' || transportName.length === 0) {
      throw new TypeError('Transport name must be a non-empty string');
    }

    const index = this.transports.findIndex(t => t.name === transportName);
    if (index >= 0) {
      this.transports.splice(index, 1);
      return true;
    }
    return false;
  }

  /**
   * Write a record to all registered transports.
   *
   * Synchronous throws and rejected promises are both reported to the
   * console; neither reaches the caller.
   */
  writeToAll(record: MethodLogRecord): void {
    this.transports.forEach(transport => {
      try {
        const result = transport.write(record);
        if (result && typeof result.catch === 'function') {
          result.catch((error: unknown) => {
            this.handleTransportError(transport.name, 'write', error);
          });
        }
      } catch (error) {
        this.handleTransportError(transport.name, 'write', error);
      }
    });
  }

  /**
   * Flush all registered transports in parallel
   */
  async flushAll(): Promise<void> {
    const flushPromises = this.transports.map(async transport => {
      try {
        await Promise.resolve(transport.flush());
      } catch (error) {
        this.handleTransportError(transport.name, 'flush', error);
      }
    });

    await Promise.all(flushPromises);
  }

  /**
   * Close all registered transports in parallel and clear the registry
   */
  async closeAll(): Promise<void> {
    const closePromises = this.transports.map(async transport => {
      try {
        await Promise.resolve(transport.close());
      } catch (error) {
        this.handleTransportError(transport.name, 'close', error);
      }
    });

    await Promise.all(closePromises);

    this.transports.length = 0;
  }

  /** Names of the registered transports, in registration order */
  getTransportNames(): string[] {
    return this.transports.map(t => t.name);
  }

  /** Number of registered transports */
  get size(): number {
    return this.transports.length;
  }

  private handleTransportError(transportName: string, operation: string, error: unknown): void {
    // Not routed through a transport: that could recurse
    console.error(`Transport ${transportName} ${operation} failed:`, error);
  }
}
