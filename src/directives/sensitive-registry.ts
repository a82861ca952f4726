/**
 * Registry of properties marked `@Sensitive`.
 *
 * Parameter and return-value sensitivity is resolved when wrappers are
 * generated; properties can only be masked at run time, when an object
 * carrying them is formatted. Entries are keyed by the prototype the
 * decorator ran on, so subclasses inherit their parents' masks.
 */

import { DEFAULT_MASK_VALUE, type SensitiveOptions } from './types.js';

/** Mask settings with defaults applied */
export type ResolvedSensitivity = Required<SensitiveOptions>;

const registry = new WeakMap<object, Map<PropertyKey, ResolvedSensitivity>>();

/** Applies sensitivity defaults */
export function resolveSensitivity(options: SensitiveOptions = {}): ResolvedSensitivity {
  return {
    maskValue: options.maskValue ?? DEFAULT_MASK_VALUE,
    showLength: options.showLength ?? false
  };
}

/** Records a sensitive property on a class prototype */
export function registerSensitiveProperty(prototype: object, key: PropertyKey, options: SensitiveOptions = {}): void {
  let entries = registry.get(prototype);
  if (entries === undefined) {
    entries = new Map();
    registry.set(prototype, entries);
  }
  entries.set(key, resolveSensitivity(options));
}

/**
 * Collects the sensitive properties that apply to a value, nearest
 * prototype first. Returns `undefined` when none apply.
 */
export function getSensitiveProperties(value: object): ReadonlyMap<PropertyKey, ResolvedSensitivity> | undefined {
  let result: Map<PropertyKey, ResolvedSensitivity> | undefined;
  let prototype: object | null = Object.getPrototypeOf(value);

  while (prototype !== null && prototype !== Object.prototype) {
    const entries = registry.get(prototype);
    if (entries !== undefined) {
      result ??= new Map();
      for (const [key, sensitivity] of entries) {
        if (!result.has(key)) {
          result.set(key, sensitivity);
        }
      }
    }
    prototype = Object.getPrototypeOf(prototype);
  }

  return result;
}

/**
 * Renders the mask for a value, with its length when requested. The value
 * itself is only measured, never rendered.
 */
export function maskedLength(mask: string, value: unknown): string {
  const length = measure(value);
  return length === undefined ? mask : `${mask} (length: ${length})`;
}

/** Renders the mask for a resolved sensitivity */
export function applyMask(sensitivity: ResolvedSensitivity, value: unknown): string {
  return sensitivity.showLength ? maskedLength(sensitivity.maskValue, value) : sensitivity.maskValue;
}

function measure(value: unknown): number | undefined {
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size;
  }
  return undefined;
}
