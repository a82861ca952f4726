/**
 * Generator data model
 */

import type { LogLevel } from '../logger/types.js';
import type { ResolvedInstrumentation } from '../directives/types.js';
import type { ResolvedSensitivity } from '../directives/sensitive-registry.js';
import type { GeneratorDiagnostic } from './diagnostics.js';

/**
 * Generator settings
 */
export interface GeneratorOptions {
  /** Module specifier whose imports count as directives; generated code imports it too */
  readonly runtimeModule: string;

  /** Suffix stripped from a method name to form its wrapper name */
  readonly coreSuffix: string;

  /** Suffix appended when the method name does not end with `coreSuffix` */
  readonly loggedSuffix: string;

  /** Extension of the relative import of the source module (`'.js'` under NodeNext) */
  readonly importExtension: string;

  /** Suffix of generated files; files ending with it are never read as input */
  readonly outputSuffix: string;

  /** Base directory for type namespaces */
  readonly rootDir: string;
}

/** Options accepted by `generateLogging` */
export type GeneratorOptionsInput = Partial<GeneratorOptions>;

/**
 * Default generator options. `rootDir` falls back to the compiler's
 * `rootDir`, then to the program's current directory.
 */
export const DEFAULT_GENERATOR_OPTIONS: Readonly<Omit<GeneratorOptions, 'rootDir'>> = Object.freeze({
  runtimeModule: 'logweave',
  coreSuffix: 'Core',
  loggedSuffix: 'Logged',
  importExtension: '.js',
  outputSuffix: '.logging.ts'
});

/** One generated module */
export interface GeneratedSource {
  /** Path the module should be written to, beside its source */
  readonly fileName: string;

  /** Source file declaring the class */
  readonly sourceFileName: string;

  /** Instrumented class */
  readonly className: string;

  readonly text: string;
}

/** Result of one generator run */
export interface GenerationResult {
  readonly sources: readonly GeneratedSource[];
  readonly diagnostics: readonly GeneratorDiagnostic[];
}

/** How one parameter appears in the entry record */
export interface ParameterPlan {
  /** Parameter name in the wrapper signature */
  readonly name: string;

  /** Key in the parameter map */
  readonly key: string;

  readonly skip: boolean;

  /** `-1` for unbounded */
  readonly maxLength: number;

  readonly sensitivity?: ResolvedSensitivity;
}

/** How the return value appears in the exit record */
export interface ResultPlan {
  readonly skip: boolean;

  /** `-1` for unbounded */
  readonly maxLength: number;

  readonly sensitivity?: ResolvedSensitivity;
}

/**
 * Merged settings for one instrumented method
 */
export interface ResolvedMethodConfig extends ResolvedInstrumentation {
  /** Level of exception records */
  readonly exceptionLevel: LogLevel;

  readonly parameters: readonly ParameterPlan[];

  readonly result: ResultPlan;
}
