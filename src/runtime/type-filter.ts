/**
 * Namespace and class filters
 *
 * Exclusions are checked first and always win. An empty inclusion list
 * includes everything. Namespaces match by case-insensitive prefix; class
 * patterns are `*` globs compiled once into anchored, case-insensitive
 * regular expressions.
 */

import type { RuntimeOptions } from './runtime-options.js';

/** Identity of an instrumented class, as recorded by generated code */
export interface LoggedTypeInfo {
  /** Module path (and enclosing namespaces) the class is declared in */
  readonly namespace: string;

  /** Class name */
  readonly className: string;
}

type FilterOptions = Pick<
  RuntimeOptions,
  'includedNamespaces' | 'excludedNamespaces' | 'includedClasses' | 'excludedClasses'
>;

/**
 * Compiles a `*` glob into an anchored, case-insensitive pattern
 */
export function compileClassPattern(pattern: string): RegExp {
  const source = pattern
    .split('*')
    .map(part => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Applies the include/exclude lists of the runtime options
 */
export class TypeFilter {
  private readonly includedNamespaces: readonly string[];
  private readonly excludedNamespaces: readonly string[];
  private readonly includedClasses: readonly RegExp[];
  private readonly excludedClasses: readonly RegExp[];

  constructor(options: FilterOptions) {
    this.includedNamespaces = options.includedNamespaces.map(ns => ns.toLowerCase());
    this.excludedNamespaces = options.excludedNamespaces.map(ns => ns.toLowerCase());
    this.includedClasses = options.includedClasses.map(compileClassPattern);
    this.excludedClasses = options.excludedClasses.map(compileClassPattern);
  }

  shouldLogNamespace(namespace: string): boolean {
    const candidate = namespace.toLowerCase();

    if (this.excludedNamespaces.some(prefix => candidate.startsWith(prefix))) {
      return false;
    }
    if (this.includedNamespaces.length === 0) {
      return true;
    }
    return this.includedNamespaces.some(prefix => candidate.startsWith(prefix));
  }

  shouldLogClass(className: string): boolean {
    if (this.excludedClasses.some(pattern => pattern.test(className))) {
      return false;
    }
    if (this.includedClasses.length === 0) {
      return true;
    }
    return this.includedClasses.some(pattern => pattern.test(className));
  }

  /** Both filters must accept the type */
  shouldLogType(type: LoggedTypeInfo): boolean {
    return this.shouldLogNamespace(type.namespace) && this.shouldLogClass(type.className);
  }
}
