/**
 * Generator diagnostics
 *
 * The generator never throws for problems in user code. It reports them here
 * and keeps going with the next class or method.
 */

import ts from 'typescript';

/** Diagnostic codes */
export const DiagnosticCode = {
  /** Instrumented class is not a named export */
  ClassNotExported: 'LW001',
  /** Wrapper name already used by a member */
  WrapperNameCollision: 'LW002',
  /** Signature needs a type the generated module cannot import */
  UnimportableType: 'LW003',
  /** Directive argument is not a literal of the expected type */
  NonLiteralArgument: 'LW004',
  /** Class declares the generated setter itself */
  SetterConflict: 'LW005',
  /** Two logged parameters share a key in the parameter map */
  DuplicateParameterKey: 'LW006'
} as const;

export type DiagnosticCode = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

export type DiagnosticSeverity = 'error' | 'warning';

/**
 * A problem found in user code. Line and column are 1-based.
 */
export interface GeneratorDiagnostic {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly fileName: string;
  readonly line: number;
  readonly column: number;
}

/**
 * Creates a diagnostic located at the start of `node`
 */
export function createDiagnostic(
  sourceFile: ts.SourceFile,
  node: ts.Node,
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string
): GeneratorDiagnostic {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
  return Object.freeze({
    code,
    severity,
    message,
    fileName: sourceFile.fileName,
    line: line + 1,
    column: character + 1
  });
}

/**
 * Renders a diagnostic the way `tsc` prints its own:
 * `file(line,col): error LW001: message`
 */
export function formatDiagnostic(diagnostic: GeneratorDiagnostic): string {
  const { fileName, line, column, severity, code, message } = diagnostic;
  return `${fileName}(${line},${column}): ${severity} ${code}: ${message}`;
}

/** Whether any diagnostic is an error */
export function hasErrors(diagnostics: readonly GeneratorDiagnostic[]): boolean {
  return diagnostics.some(diagnostic => diagnostic.severity === 'error');
}
