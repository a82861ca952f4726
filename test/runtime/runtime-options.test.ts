import { describe, it, expect } from 'vitest';
import { DEFAULT_RUNTIME_OPTIONS, createRuntimeOptions } from '../../src/runtime/runtime-options.js';

describe('Runtime Options', () => {
  describe('Defaults', () => {
    it('uses the documented defaults', () => {
      const options = createRuntimeOptions();

      expect(options).toEqual(DEFAULT_RUNTIME_OPTIONS);
      expect(options.maxStringLength).toBe(1000);
      expect(options.maxCollectionSize).toBe(10);
      expect(options.entryFormat).toBe('Entering {ClassName}.{MethodName}');
      expect(options.exitFormat).toBe('Exiting {ClassName}.{MethodName} (took {ExecutionTime}ms)');
      expect(options.exceptionFormat).toBe(
        'Exception in {ClassName}.{MethodName}: {ExceptionType} - {ExceptionMessage}'
      );
    });
  });

  describe('Merging', () => {
    it('overrides only the given fields', () => {
      const options = createRuntimeOptions({ maxCollectionSize: 5, logReturnValues: false });

      expect(options.maxCollectionSize).toBe(5);
      expect(options.logReturnValues).toBe(false);
      expect(options.maxStringLength).toBe(DEFAULT_RUNTIME_OPTIONS.maxStringLength);
    });

    it('freezes the options and their lists', () => {
      const classes = ['*Service'];
      const options = createRuntimeOptions({ includedClasses: classes });
      classes.push('*Repository');

      expect(Object.isFrozen(options)).toBe(true);
      expect(Object.isFrozen(options.includedClasses)).toBe(true);
      expect(options.includedClasses).toEqual(['*Service']);
    });

    it('falls back to defaults for fields passed as undefined', () => {
      const options = createRuntimeOptions({ maxStringLength: undefined, entryFormat: undefined, logParameters: false });

      expect(options.maxStringLength).toBe(1000);
      expect(options.entryFormat).toBe('Entering {ClassName}.{MethodName}');
      expect(options.logParameters).toBe(false);
    });

    it('accepts zero limits', () => {
      expect(createRuntimeOptions({ maxStringLength: 0 }).maxStringLength).toBe(0);
    });
  });

  describe('Validation', () => {
    it('rejects negative limits', () => {
      expect(() => createRuntimeOptions({ maxStringLength: -1 })).toThrow(
        new RangeError('maxStringLength must be a non-negative integer, got -1')
      );
    });

    it('rejects fractional limits', () => {
      expect(() => createRuntimeOptions({ maxCollectionSize: 1.5 })).toThrow(RangeError);
    });

    it('rejects unknown default levels', () => {
      expect(() => Reflect.apply(createRuntimeOptions, undefined, [{ defaultLogLevel: 'loud' }])).toThrow(
        new TypeError('defaultLogLevel must be a log level, got loud')
      );
    });

    it('rejects templates that are not strings', () => {
      expect(() => Reflect.apply(createRuntimeOptions, undefined, [{ entryFormat: 42 }])).toThrow(
        new TypeError('entryFormat must be a string')
      );
    });

    it('rejects switches that are not booleans', () => {
      expect(() => Reflect.apply(createRuntimeOptions, undefined, [{ logParameters: 'yes' }])).toThrow(
        new TypeError('logParameters must be a boolean')
      );
    });

    it('rejects filter lists holding non-strings', () => {
      expect(() => Reflect.apply(createRuntimeOptions, undefined, [{ excludedClasses: ['ok', 7] }])).toThrow(
        new TypeError('excludedClasses must be an array of strings')
      );
    });
  });
});
