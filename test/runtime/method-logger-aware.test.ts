import { describe, it, expect } from 'vitest';
import {
  LOGGED_TYPE,
  METHOD_LOGGER,
  attachMethodLogger,
  isMethodLoggerAware,
  type MethodLoggerAware
} from '../../src/runtime/method-logger-aware.js';
import { MethodLoggerImpl, type MethodLogger } from '../../src/runtime/method-logger.js';
import { createRuntimeOptions } from '../../src/runtime/runtime-options.js';
import type { LoggedTypeInfo } from '../../src/runtime/type-filter.js';
import { RecordingSink } from '../helpers/recording-sink.js';

// Shaped the way generated modules shape an instrumented class
class InstrumentedService implements MethodLoggerAware {
  readonly [LOGGED_TYPE]: LoggedTypeInfo;
  [METHOD_LOGGER]?: MethodLogger;

  constructor(className: string) {
    this[LOGGED_TYPE] = { namespace: 'services/instrumented', className };
  }

  setMethodLogger(logger: MethodLogger): void {
    this[METHOD_LOGGER] = logger;
  }
}

describe('MethodLoggerAware', () => {
  const logger = new MethodLoggerImpl(new RecordingSink(), createRuntimeOptions({ excludedClasses: ['Health*'] }));

  describe('isMethodLoggerAware', () => {
    it('recognises instrumented instances', () => {
      expect(isMethodLoggerAware(new InstrumentedService('UserService'))).toBe(true);
    });

    it('rejects other values', () => {
      expect(isMethodLoggerAware({ setMethodLogger: () => {} })).toBe(false);
      expect(isMethodLoggerAware(null)).toBe(false);
      expect(isMethodLoggerAware('UserService')).toBe(false);
    });
  });

  describe('attachMethodLogger', () => {
    it('injects the logger into accepted types', () => {
      const service = new InstrumentedService('UserService');

      expect(attachMethodLogger(service, logger)).toBe(true);
      expect(service[METHOD_LOGGER]).toBe(logger);
    });

    it('skips types the filters exclude', () => {
      const service = new InstrumentedService('HealthService');

      expect(attachMethodLogger(service, logger)).toBe(false);
      expect(service[METHOD_LOGGER]).toBeUndefined();
    });

    it('ignores objects that are not instrumented', () => {
      expect(attachMethodLogger({}, logger)).toBe(false);
    });
  });
});
