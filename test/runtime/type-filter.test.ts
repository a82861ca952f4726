import { describe, it, expect } from 'vitest';
import { TypeFilter, compileClassPattern } from '../../src/runtime/type-filter.js';
import { createRuntimeOptions } from '../../src/runtime/runtime-options.js';

describe('TypeFilter', () => {
  describe('compileClassPattern', () => {
    it('matches globs case-insensitively over the whole name', () => {
      const pattern = compileClassPattern('*Service');

      expect(pattern.test('UserService')).toBe(true);
      expect(pattern.test('userservice')).toBe(true);
      expect(pattern.test('ServiceLocator')).toBe(false);
    });

    it('treats regex characters literally', () => {
      const pattern = compileClassPattern('Cache.Entry');

      expect(pattern.test('Cache.Entry')).toBe(true);
      expect(pattern.test('CacheXEntry')).toBe(false);
    });

    it('supports wildcards in the middle', () => {
      expect(compileClassPattern('*Health*').test('AppHealthCheck')).toBe(true);
    });
  });

  describe('Namespaces', () => {
    it('includes everything when no inclusion list is set', () => {
      const filter = new TypeFilter(createRuntimeOptions());

      expect(filter.shouldLogNamespace('services/user-service')).toBe(true);
    });

    it('excludes by case-insensitive prefix', () => {
      const filter = new TypeFilter(createRuntimeOptions({ excludedNamespaces: ['services/internal'] }));

      expect(filter.shouldLogNamespace('Services/Internal/cache')).toBe(false);
      expect(filter.shouldLogNamespace('services/user-service')).toBe(true);
    });

    it('limits logging to included prefixes', () => {
      const filter = new TypeFilter(createRuntimeOptions({ includedNamespaces: ['services'] }));

      expect(filter.shouldLogNamespace('services/user-service')).toBe(true);
      expect(filter.shouldLogNamespace('models/user')).toBe(false);
    });

    it('lets exclusion win over inclusion', () => {
      const filter = new TypeFilter(
        createRuntimeOptions({ includedNamespaces: ['services'], excludedNamespaces: ['services/internal'] })
      );

      expect(filter.shouldLogNamespace('services/internal/cache')).toBe(false);
    });
  });

  describe('Classes', () => {
    it('lets exclusion win over inclusion', () => {
      const filter = new TypeFilter(
        createRuntimeOptions({ includedClasses: ['*Service'], excludedClasses: ['Health*'] })
      );

      expect(filter.shouldLogClass('UserService')).toBe(true);
      expect(filter.shouldLogClass('HealthService')).toBe(false);
      expect(filter.shouldLogClass('UserRepository')).toBe(false);
    });

    it('requires both filters to accept a type', () => {
      const filter = new TypeFilter(
        createRuntimeOptions({ excludedNamespaces: ['legacy'], includedClasses: ['*Service'] })
      );

      expect(filter.shouldLogType({ namespace: 'services/user-service', className: 'UserService' })).toBe(true);
      expect(filter.shouldLogType({ namespace: 'legacy/user-service', className: 'UserService' })).toBe(false);
      expect(filter.shouldLogType({ namespace: 'services/user-repository', className: 'UserRepository' })).toBe(false);
    });
  });
});
