/**
 * Reads logging directives out of source
 *
 * A decorator counts as a directive only when its identifier resolves, through
 * the checker, to an import from the runtime module: a named import
 * (`import { LogClass } from 'logweave'`), a renamed one
 * (`import { LogClass as Logged }`) or a namespace import (`@lw.LogClass()`).
 * A local function that happens to be called `LogClass` is not a directive.
 */

import ts from 'typescript';
import { createDiagnostic, DiagnosticCode, type GeneratorDiagnostic } from './diagnostics.js';

export type DirectiveName = 'LogClass' | 'LogMethod' | 'LogParameter' | 'LogResult' | 'LogException' | 'Sensitive';

const DIRECTIVE_NAMES: ReadonlySet<string> = new Set<DirectiveName>([
  'LogClass',
  'LogMethod',
  'LogParameter',
  'LogResult',
  'LogException',
  'Sensitive'
]);

function isDirectiveName(name: string): name is DirectiveName {
  return DIRECTIVE_NAMES.has(name);
}

/** Literal values a directive argument may hold */
export type LiteralValue = string | number | boolean;

/**
 * The literal arguments of one directive
 */
export interface DirectiveArguments {
  readonly directive: DirectiveName;

  /** A literal passed in place of the options object, e.g. `@LogMethod('debug')` */
  readonly shorthand: LiteralValue | undefined;

  /** Fields of the options object that hold literals */
  readonly fields: ReadonlyMap<string, LiteralValue>;

  /** Reports a field whose literal has the wrong type; the field is then ignored */
  invalid(field: string, expected: string): void;
}

/**
 * Recognizes directives and extracts their literal arguments. Problems are
 * appended to the shared diagnostics list.
 */
export class DirectiveReader {
  constructor(
    private readonly checker: ts.TypeChecker,
    private readonly runtimeModule: string,
    private readonly diagnostics: GeneratorDiagnostic[]
  ) {}

  /** The directive `decorator` applies, if any */
  directiveOf(decorator: ts.Decorator): DirectiveName | undefined {
    const callee = ts.isCallExpression(decorator.expression) ? decorator.expression.expression : decorator.expression;

    let name: string | undefined;
    if (ts.isIdentifier(callee)) {
      name = this.importedName(callee);
    } else if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.expression)) {
      name = this.isRuntimeNamespace(callee.expression) ? callee.name.text : undefined;
    }

    return name !== undefined && isDirectiveName(name) ? name : undefined;
  }

  /** First decorator on `node` applying `directive` */
  find(node: ts.Node, directive: DirectiveName): ts.Decorator | undefined {
    const decorators = ts.canHaveDecorators(node) ? ts.getDecorators(node) : undefined;
    return decorators?.find(decorator => this.directiveOf(decorator) === directive);
  }

  /** Whether `node` carries `directive` */
  has(node: ts.Node, directive: DirectiveName): boolean {
    return this.find(node, directive) !== undefined;
  }

  /**
   * Extracts the literal arguments of a directive. Arguments that are not
   * literals are reported as `LW004` and left out.
   */
  readArguments(decorator: ts.Decorator, directive: DirectiveName): DirectiveArguments {
    const sourceFile = decorator.getSourceFile();
    const fields = new Map<string, LiteralValue>();
    let shorthand: LiteralValue | undefined;

    const warn = (node: ts.Node, message: string): void => {
      this.diagnostics.push(
        createDiagnostic(sourceFile, node, DiagnosticCode.NonLiteralArgument, 'warning', message)
      );
    };

    const argument = ts.isCallExpression(decorator.expression) ? decorator.expression.arguments[0] : undefined;

    if (argument !== undefined) {
      if (ts.isObjectLiteralExpression(argument)) {
        for (const property of argument.properties) {
          const key = property.name !== undefined ? propertyKeyText(property.name) : undefined;
          const value = ts.isPropertyAssignment(property) ? readLiteral(property.initializer) : undefined;
          if (key !== undefined && value !== undefined) {
            fields.set(key, value);
          } else {
            warn(property, `Argument '${key ?? property.getText(sourceFile)}' of @${directive} is not a literal and is ignored`);
          }
        }
      } else {
        shorthand = readLiteral(argument);
        if (shorthand === undefined) {
          warn(argument, `Argument of @${directive} is not a literal and is ignored`);
        }
      }
    }

    return {
      directive,
      shorthand,
      fields,
      invalid: (field, expected) => {
        warn(decorator, `Argument '${field}' of @${directive} must be ${expected} and is ignored`);
      }
    };
  }

  private importedName(identifier: ts.Identifier): string | undefined {
    const declaration = this.aliasDeclaration(identifier);
    if (declaration === undefined || !ts.isImportSpecifier(declaration)) {
      return undefined;
    }
    const importDeclaration = declaration.parent.parent.parent;
    if (!this.isRuntimeSpecifier(importDeclaration.moduleSpecifier)) {
      return undefined;
    }
    return (declaration.propertyName ?? declaration.name).text;
  }

  private isRuntimeNamespace(identifier: ts.Identifier): boolean {
    const declaration = this.aliasDeclaration(identifier);
    return (
      declaration !== undefined &&
      ts.isNamespaceImport(declaration) &&
      this.isRuntimeSpecifier(declaration.parent.parent.moduleSpecifier)
    );
  }

  private aliasDeclaration(identifier: ts.Identifier): ts.Declaration | undefined {
    const symbol = this.checker.getSymbolAtLocation(identifier);
    if (symbol === undefined || (symbol.flags & ts.SymbolFlags.Alias) === 0) {
      return undefined;
    }
    return symbol.declarations?.[0];
  }

  private isRuntimeSpecifier(specifier: ts.Expression): boolean {
    return ts.isStringLiteral(specifier) && specifier.text === this.runtimeModule;
  }
}

function propertyKeyText(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return undefined;
}

/**
 * Reads a string, number, boolean or negated number literal
 */
export function readLiteral(expression: ts.Expression): LiteralValue | undefined {
  if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) {
    return expression.text;
  }
  if (ts.isNumericLiteral(expression)) {
    return Number(expression.text);
  }
  if (expression.kind === ts.SyntaxKind.TrueKeyword) {
    return true;
  }
  if (expression.kind === ts.SyntaxKind.FalseKeyword) {
    return false;
  }
  if (
    ts.isPrefixUnaryExpression(expression) &&
    expression.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(expression.operand)
  ) {
    return -Number(expression.operand.text);
  }
  return undefined;
}
