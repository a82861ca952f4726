/**
 * Bounded value formatting
 *
 * Every value that reaches a log line goes through {@link ValueFormatter}.
 * Its cost is bounded by the configured limits rather than by the value:
 * strings are cut at `maxStringLength`, iterables are pulled by hand and
 * never more than `maxCollectionSize + 1` times (an infinite generator is
 * fine), nesting stops at a fixed depth and cycles print `<circular>`.
 *
 * @example
 * ```typescript
 * const formatter = new ValueFormatter({ maxStringLength: 5, maxCollectionSize: 2 });
 *
 * formatter.format('abcdefgh');  // '"abcde..." (truncated from 8)'
 * formatter.format([1, 2, 3]);   // '[Collection with 2+ items (showing first 2): [1, 2]]'
 * formatter.format(null);        // 'null'
 * ```
 */

import { applyMask, getSensitiveProperties, type ResolvedSensitivity } from '../directives/sensitive-registry.js';
import type { RuntimeOptions } from './runtime-options.js';
import { truncateUnits } from './wrapper-support.js';

/** Limits the formatter enforces */
export type FormatLimits = Pick<RuntimeOptions, 'maxStringLength' | 'maxCollectionSize'>;

const MAX_DEPTH = 4;

/**
 * Formats values for log messages and structured fields
 */
export class ValueFormatter {
  constructor(private readonly limits: FormatLimits) {}

  /**
   * Formats one value. Never throws: a value whose inspection throws
   * (a hostile getter, a revoked proxy) renders as `[unformattable <Type>]`.
   */
  format(value: unknown): string {
    try {
      return this.render(value, new WeakSet(), 0);
    } catch {
      return `[unformattable ${describeType(value)}]`;
    }
  }

  /**
   * Formats a parameter map as `key=value, ...`, or `no parameters`
   */
  formatParameters(parameters: Readonly<Record<string, unknown>>): string {
    const keys = Object.keys(parameters);
    if (keys.length === 0) {
      return 'no parameters';
    }
    return keys.map(key => `${key}=${this.format(parameters[key])}`).join(', ');
  }

  /**
   * Formats a string, truncating it past `maxStringLength`
   */
  formatString(value: string): string {
    const max = this.limits.maxStringLength;
    if (value.length > max) {
      return `"${truncateUnits(value, max)}..." (truncated from ${value.length})`;
    }
    return `"${value}"`;
  }

  private render(value: unknown, seen: WeakSet<object>, depth: number): string {
    if (value === null) return 'null';

    switch (typeof value) {
      case 'undefined':
        return 'undefined';
      case 'string':
        return this.formatString(value);
      case 'number':
      case 'boolean':
      case 'bigint':
        return String(value);
      case 'symbol':
        return value.toString();
      case 'function':
        return `[Function ${value.name || 'anonymous'}]`;
      default:
        return this.renderObject(value, seen, depth);
    }
  }

  private renderObject(value: object, seen: WeakSet<object>, depth: number): string {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    }
    if (value instanceof Error) {
      return `${value.name}: ${value.message}`;
    }
    if (seen.has(value)) {
      return '<circular>';
    }
    if (depth >= MAX_DEPTH) {
      return isIterable(value) ? '[...]' : '{...}';
    }

    seen.add(value);
    try {
      // Masked fields take precedence over the value's own rendering
      const sensitive = getSensitiveProperties(value);
      if (sensitive !== undefined) {
        return this.renderFields(value, sensitive, seen, depth);
      }
      if (isIterable(value)) {
        return this.renderIterable(value, seen, depth);
      }
      if (hasOwnToString(value)) {
        return String(value);
      }
      return this.renderFields(value, undefined, seen, depth);
    } finally {
      seen.delete(value);
    }
  }

  /**
   * Pulls at most `maxCollectionSize + 1` items: enough to show the first
   * `maxCollectionSize` and to know whether more exist.
   */
  private renderIterable(value: Iterable<unknown>, seen: WeakSet<object>, depth: number): string {
    const max = this.limits.maxCollectionSize;
    const items: string[] = [];
    const iterator = value[Symbol.iterator]();
    let truncated = false;
    let done = false;

    try {
      while (!done) {
        const next = iterator.next();
        if (next.done) {
          done = true;
        } else if (items.length >= max) {
          truncated = true;
          break;
        } else {
          items.push(this.render(next.value, seen, depth + 1));
        }
      }
    } finally {
      if (!done) {
        iterator.return?.();
      }
    }

    const list = `[${items.join(', ')}]`;
    return truncated ? `[Collection with ${max}+ items (showing first ${max}): ${list}]` : list;
  }

  private renderFields(
    value: object,
    sensitive: ReadonlyMap<PropertyKey, ResolvedSensitivity> | undefined,
    seen: WeakSet<object>,
    depth: number
  ): string {
    const fields = Object.entries(value).map(([key, field]) => {
      const sensitivity = sensitive?.get(key);
      const rendered = sensitivity !== undefined
        ? applyMask(sensitivity, field)
        : this.render(field, seen, depth + 1);
      return `${key}: ${rendered}`;
    });

    const body = fields.length > 0 ? `{ ${fields.join(', ')} }` : '{}';
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype === null || prototype === Object.prototype) {
      return body;
    }
    const name = describeType(value);
    return name === 'Object' ? body : `${name} ${body}`;
  }
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

function hasOwnToString(value: object): boolean {
  return typeof value.toString === 'function' && value.toString !== Object.prototype.toString;
}

/**
 * Names the type of a value without formatting it
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object' && typeof value !== 'function') return typeof value;

  try {
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype === null) return 'Object';
    const constructorName: unknown = typeof prototype === 'object' && 'constructor' in prototype
      ? Reflect.get(prototype, 'constructor')
      : undefined;
    return typeof constructorName === 'function' && constructorName.name ? constructorName.name : 'Object';
  } catch {
    return 'Object';
  }
}
