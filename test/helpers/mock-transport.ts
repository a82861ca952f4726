/**
 * Mock transport for registry and logger tests
 */

import type { MethodLogRecord, Transport } from '../../src/logger/types.js';

export class MockTransport implements Transport {
  public writeCalls: MethodLogRecord[] = [];
  public flushCalls: number = 0;
  public closeCalls: number = 0;
  public writeError: Error | null = null;
  public flushError: Error | null = null;
  public closeError: Error | null = null;
  public asyncWrite: boolean = false;
  public asyncFlush: boolean = false;
  public asyncClose: boolean = false;

  constructor(public name: string) {}

  write(record: MethodLogRecord): void | Promise<void> {
    if (this.writeError) {
      if (this.asyncWrite) {
        return Promise.reject(this.writeError);
      } else {
        throw this.writeError;
      }
    }
    this.writeCalls.push(record);

    if (this.asyncWrite) {
      return Promise.resolve();
    }
  }

  flush(): void | Promise<void> {
    this.flushCalls++;
    if (this.flushError) {
      if (this.asyncFlush) {
        return Promise.reject(this.flushError);
      } else {
        throw this.flushError;
      }
    }

    if (this.asyncFlush) {
      return Promise.resolve();
    }
  }

  close(): void | Promise<void> {
    this.closeCalls++;
    if (this.closeError) {
      if (this.asyncClose) {
        return Promise.reject(this.closeError);
      } else {
        throw this.closeError;
      }
    }

    if (this.asyncClose) {
      return Promise.resolve();
    }
  }
}

export const createTestRecord = (overrides: Partial<MethodLogRecord> = {}): MethodLogRecord => ({
  level: 'info',
  message: 'Entering UserService.getUser',
  state: { ClassName: 'UserService', MethodName: 'getUser' },
  timestamp: Date.now(),
  category: 'UserService',
  ...overrides
});
