/**
 * Eligibility rules for classes and methods
 *
 * Generated modules reach a class through module augmentation, which only
 * sees named exports. A candidate that is not `export class Name` (or is
 * nested in something other than exported namespaces) gets one `LW001` and
 * nothing is generated for it.
 */

import ts from 'typescript';
import { createDiagnostic, DiagnosticCode, type GeneratorDiagnostic } from './diagnostics.js';
import type { Candidate } from './discovery.js';

/** Name of the setter every generated module adds */
export const SETTER_NAME = 'setMethodLogger';

/** Where an exported class lives inside its module */
export interface ClassLocation {
  readonly className: string;

  /** Enclosing `namespace` blocks, outermost first */
  readonly namespacePath: readonly string[];
}

export type CandidateCheck =
  | { readonly ok: true; readonly location: ClassLocation }
  | { readonly ok: false; readonly diagnostics: readonly GeneratorDiagnostic[] };

/** A method the generator can wrap */
export type InstrumentableMethod = ts.MethodDeclaration & {
  readonly name: ts.Identifier;
  readonly body: ts.Block;
};

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some(modifier => modifier.kind === kind) ?? false;
}

/**
 * Checks that a candidate can be augmented
 */
export function validateCandidate(candidate: Candidate): CandidateCheck {
  const { declaration, sourceFile } = candidate;
  const className = declaration.name?.text;
  const namespacePath = className !== undefined ? exportedNamespacePath(declaration) : undefined;

  if (
    className === undefined ||
    namespacePath === undefined ||
    !hasModifier(declaration, ts.SyntaxKind.ExportKeyword) ||
    hasModifier(declaration, ts.SyntaxKind.DefaultKeyword) ||
    hasModifier(declaration, ts.SyntaxKind.DeclareKeyword)
  ) {
    const name = className ?? '(anonymous)';
    return {
      ok: false,
      diagnostics: [
        createDiagnostic(
          sourceFile,
          declaration.name ?? declaration,
          DiagnosticCode.ClassNotExported,
          'error',
          `Class '${name}' has logging directives but is not a named export; declare it as 'export class ${name}' so its logging wrappers can be generated`
        )
      ]
    };
  }

  const setter = declaration.members.find(member => memberName(member) === SETTER_NAME);
  if (setter !== undefined) {
    return {
      ok: false,
      diagnostics: [
        createDiagnostic(
          sourceFile,
          setter,
          DiagnosticCode.SetterConflict,
          'error',
          `Class '${className}' declares '${SETTER_NAME}', which generated logging code defines; rename the member`
        )
      ]
    };
  }

  return { ok: true, location: { className, namespacePath } };
}

/**
 * Names of the exported namespaces around a class, or `undefined` when the
 * class is not reachable from its module's exports
 */
function exportedNamespacePath(declaration: ts.ClassDeclaration): string[] | undefined {
  const path: string[] = [];
  let node: ts.Node = declaration.parent;

  while (!ts.isSourceFile(node)) {
    if (!ts.isModuleBlock(node)) {
      return undefined;
    }
    let namespace: ts.ModuleDeclaration = node.parent;
    const names: string[] = [];

    // `namespace A.B {}` nests B's declaration directly in A's
    for (;;) {
      if (!ts.isIdentifier(namespace.name) || hasModifier(namespace, ts.SyntaxKind.DeclareKeyword)) {
        return undefined;
      }
      names.unshift(namespace.name.text);
      const parent: ts.Node = namespace.parent;
      if (!ts.isModuleDeclaration(parent)) {
        break;
      }
      namespace = parent;
    }

    if (!hasModifier(namespace, ts.SyntaxKind.ExportKeyword)) {
      return undefined;
    }
    path.unshift(...names);
    node = namespace.parent;
  }

  return path;
}

/**
 * Whether a class member is an ordinary instance method with a body and a
 * plain identifier name
 */
export function isInstrumentableMethod(member: ts.ClassElement): member is InstrumentableMethod {
  return (
    ts.isMethodDeclaration(member) &&
    member.body !== undefined &&
    ts.isIdentifier(member.name) &&
    member.asteriskToken === undefined &&
    !hasModifier(member, ts.SyntaxKind.StaticKeyword) &&
    !hasModifier(member, ts.SyntaxKind.AbstractKeyword)
  );
}

/**
 * Text of a member's name; `undefined` for computed names
 */
export function memberName(member: ts.ClassElement): string | undefined {
  const name = member.name;
  if (name === undefined) {
    return undefined;
  }
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return undefined;
}
