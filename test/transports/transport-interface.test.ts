import { describe, it, expect } from 'vitest';
import { BaseTransport, Colors, Environment, Formatters } from '../../src/transports/transport-interface.js';
import type { MethodLogRecord } from '../../src/logger/types.js';
import { createTestRecord } from '../helpers/mock-transport.js';

describe('Environment Detection', () => {
  it('has environment detection properties', () => {
    expect(typeof Environment.isProduction).toBe('boolean');
    expect(typeof Environment.supportsConsoleStyles).toBe('boolean');
  });
});

describe('Formatters', () => {
  const testTimestamp = new Date('2023-12-25T10:30:45.123Z').getTime();

  describe('timestamp', () => {
    it('formats timestamp with default format', () => {
      expect(Formatters.timestamp(testTimestamp)).toBe('10:30:45.123');
    });

    it('formats timestamp with ISO format', () => {
      expect(Formatters.timestamp(testTimestamp, 'iso')).toBe('2023-12-25T10:30:45.123Z');
    });

    it('formats timestamp with HH:mm:ss format', () => {
      expect(Formatters.timestamp(testTimestamp, 'HH:mm:ss')).toBe('10:30:45');
    });
  });

  describe('objects', () => {
    it('pretty-prints with indentation', () => {
      expect(Formatters.prettyObject({ ClassName: 'UserService' })).toBe('{\n  "ClassName": "UserService"\n}');
      expect(Formatters.prettyObject({ a: 1 }, 4)).toBe('{\n    "a": 1\n}');
    });

    it('prints compactly', () => {
      expect(Formatters.compactObject({ MethodName: 'getUser', ExecutionTime: 3 })).toBe(
        '{"MethodName":"getUser","ExecutionTime":3}'
      );
    });

    it('falls back to String for circular values', () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;

      expect(Formatters.prettyObject(circular)).toBe('[object Object]');
      expect(Formatters.compactObject(circular)).toBe('[object Object]');
    });
  });
});

describe('Colors', () => {
  it('has a color for every writable level', () => {
    for (const level of ['trace', 'debug', 'info', 'warn', 'error', 'critical'] as const) {
      expect(Colors[level]).toMatch(/^\x1b\[\d+m$/);
    }
  });
});

describe('BaseTransport', () => {
  class TestTransport extends BaseTransport {
    public records: MethodLogRecord[] = [];

    constructor() {
      super('test-transport', { format: 'test' });
    }

    write(record: MethodLogRecord): void {
      this.records.push(record);
    }
  }

  it('stores name and configuration', () => {
    const transport = new TestTransport();

    expect(transport.name).toBe('test-transport');
    expect(transport.config).toEqual({ format: 'test' });
  });

  it('provides no-op flush and close', async () => {
    const transport = new TestTransport();

    await expect(Promise.resolve(transport.flush())).resolves.toBeUndefined();
    await expect(Promise.resolve(transport.close())).resolves.toBeUndefined();
  });

  it('delegates writes to the subclass', () => {
    const transport = new TestTransport();
    const record = createTestRecord();

    transport.write(record);

    expect(transport.records).toEqual([record]);
  });
});
