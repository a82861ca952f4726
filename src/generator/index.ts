/**
 * Build-time generator for logging wrappers
 *
 * Reads a TypeScript program, finds classes and methods carrying logging
 * directives and produces one module per class that adds wrapper methods
 * calling the runtime's `MethodLogger`.
 */

export {
  generateLogging,
  resolveGeneratorOptions,
  modulePath,
  outputFileName
} from './generator.js';
export { writeGeneratedSources, type OutputHost } from './emit.js';
export {
  DiagnosticCode,
  formatDiagnostic,
  hasErrors,
  type DiagnosticSeverity,
  type GeneratorDiagnostic
} from './diagnostics.js';
export { GENERATED_HEADER } from './discovery.js';
export { toStringLiteral } from './string-literal.js';
export { wrapperNameFor } from './wrapper-naming.js';
export {
  DEFAULT_GENERATOR_OPTIONS,
  type GeneratedSource,
  type GenerationResult,
  type GeneratorOptions,
  type GeneratorOptionsInput,
  type ResolvedMethodConfig,
  type ParameterPlan,
  type ResultPlan
} from './types.js';
