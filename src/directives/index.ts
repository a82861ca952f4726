export * from './types.js';
export * from './decorators.js';
export {
  registerSensitiveProperty,
  getSensitiveProperties,
  resolveSensitivity,
  maskedLength,
  applyMask,
  type ResolvedSensitivity
} from './sensitive-registry.js';
