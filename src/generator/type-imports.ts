/**
 * Type imports for generated modules
 *
 * A generated module sits beside its source, so every type the source can
 * name is importable the same way: through the source's own import (same
 * specifier, relative ones included) or, for a type the source declares,
 * from the source module itself. Globals need nothing. A type declared in the
 * source but not exported cannot be reached at all.
 */

import ts from 'typescript';
import { toStringLiteral } from './string-literal.js';

/** One imported name */
export interface TypeImport {
  readonly moduleSpecifier: string;
  readonly kind: 'named' | 'namespace';

  /** Exported name (`default` for a default export); unused for namespaces */
  readonly importedName: string;

  /** Name used in the generated module */
  readonly localName: string;
}

export type TypeImportResolution =
  | { readonly ok: true; readonly imports: readonly TypeImport[] }
  | { readonly ok: false; readonly name: string; readonly reason: string };

/**
 * Names a type text refers to, without names the text declares itself
 * (mapped type keys, `infer` variables, type parameters of function types)
 */
export function referencedNames(typeText: string): { names: string[]; usesThisType: boolean } {
  const file = ts.createSourceFile('__type.ts', `type __Type = ${typeText};`, ts.ScriptTarget.Latest, false);
  const referenced = new Set<string>();
  const declared = new Set<string>();
  let usesThisType = false;

  const visit = (node: ts.Node): void => {
    if (ts.isTypeReferenceNode(node)) {
      referenced.add(leftmostName(node.typeName));
    } else if (ts.isTypeQueryNode(node)) {
      referenced.add(leftmostName(node.exprName));
    } else if (ts.isTypeParameterDeclaration(node)) {
      declared.add(node.name.text);
    } else if (node.kind === ts.SyntaxKind.ThisType) {
      usesThisType = true;
    }
    ts.forEachChild(node, visit);
  };
  ts.forEachChild(file, visit);

  declared.add('__Type');
  return { names: [...referenced].filter(name => !declared.has(name) && name !== 'this'), usesThisType };
}

function leftmostName(name: ts.EntityName): string {
  let current: ts.EntityName = name;
  while (ts.isQualifiedName(current)) {
    current = current.left;
  }
  return current.text;
}

/**
 * Resolves the names a signature uses to imports for a generated module
 */
export class TypeImportResolver {
  private readonly moduleExports: readonly ts.Symbol[];

  /**
   * @param sourceModuleSpecifier - Relative specifier of the source module, e.g. `./user-service.js`
   */
  constructor(
    private readonly checker: ts.TypeChecker,
    private readonly sourceFile: ts.SourceFile,
    private readonly sourceModuleSpecifier: string
  ) {
    const moduleSymbol = checker.getSymbolAtLocation(sourceFile);
    this.moduleExports = moduleSymbol !== undefined ? checker.getExportsOfModule(moduleSymbol) : [];
  }

  /**
   * Resolves every name in `typeTexts` as seen from `location`
   *
   * @param ignored - Names that need no import (type parameters, the class's own import)
   */
  resolve(typeTexts: readonly string[], location: ts.Node, ignored: ReadonlySet<string>): TypeImportResolution {
    const imports = new Map<string, TypeImport>();
    let scope: ts.Symbol[] | undefined;

    for (const text of typeTexts) {
      const { names, usesThisType } = referencedNames(text);
      if (usesThisType) {
        return { ok: false, name: 'this', reason: "the polymorphic 'this' type cannot be named outside the class" };
      }

      for (const name of names) {
        if (ignored.has(name) || imports.has(name)) continue;

        scope ??= this.checker.getSymbolsInScope(
          location,
          ts.SymbolFlags.Type | ts.SymbolFlags.Value | ts.SymbolFlags.Namespace | ts.SymbolFlags.Alias
        );
        const symbol = scope.find(candidate => candidate.getName() === name);
        if (symbol === undefined) {
          return { ok: false, name, reason: 'it cannot be resolved from the source module' };
        }

        const resolved = this.importFor(symbol, name);
        if (resolved === 'global') continue;
        if ('reason' in resolved) {
          return { ok: false, name, reason: resolved.reason };
        }
        imports.set(name, resolved);
      }
    }

    return { ok: true, imports: [...imports.values()] };
  }

  private importFor(symbol: ts.Symbol, name: string): TypeImport | 'global' | { reason: string } {
    const declarations = symbol.declarations ?? [];
    if (declarations.length === 0 || declarations.every(node => node.getSourceFile() !== this.sourceFile)) {
      return 'global';
    }

    if ((symbol.flags & ts.SymbolFlags.Alias) !== 0) {
      return this.reimport(declarations[0], name);
    }

    const exported = this.moduleExports.find(candidate => this.declaresSame(candidate, declarations));
    if (exported === undefined) {
      return { reason: 'it is declared in the source module but not exported' };
    }
    return {
      moduleSpecifier: this.sourceModuleSpecifier,
      kind: 'named',
      importedName: exported.getName(),
      localName: name
    };
  }

  private reimport(declaration: ts.Declaration | undefined, name: string): TypeImport | { reason: string } {
    if (declaration !== undefined && ts.isImportSpecifier(declaration)) {
      const specifier = declaration.parent.parent.parent.moduleSpecifier;
      if (ts.isStringLiteral(specifier)) {
        return {
          moduleSpecifier: specifier.text,
          kind: 'named',
          importedName: (declaration.propertyName ?? declaration.name).text,
          localName: name
        };
      }
    }
    if (declaration !== undefined && ts.isImportClause(declaration) && ts.isStringLiteral(declaration.parent.moduleSpecifier)) {
      return {
        moduleSpecifier: declaration.parent.moduleSpecifier.text,
        kind: 'named',
        importedName: 'default',
        localName: name
      };
    }
    if (declaration !== undefined && ts.isNamespaceImport(declaration)) {
      const specifier = declaration.parent.parent.moduleSpecifier;
      if (ts.isStringLiteral(specifier)) {
        return { moduleSpecifier: specifier.text, kind: 'namespace', importedName: '*', localName: name };
      }
    }
    return { reason: 'it comes from an import form the generated module cannot reproduce' };
  }

  private declaresSame(exported: ts.Symbol, declarations: readonly ts.Declaration[]): boolean {
    const target = (exported.flags & ts.SymbolFlags.Alias) !== 0 ? this.checker.getAliasedSymbol(exported) : exported;
    return (target.declarations ?? []).some(node => declarations.includes(node));
  }
}

/**
 * Renders `import type` statements: one per namespace import, then one per
 * module specifier for named imports
 */
export function renderTypeImports(imports: readonly TypeImport[]): string[] {
  const named = new Map<string, string[]>();
  const lines: string[] = [];

  for (const entry of imports) {
    if (entry.kind === 'namespace') {
      lines.push(`import type * as ${entry.localName} from ${toStringLiteral(entry.moduleSpecifier)};`);
      continue;
    }
    const clause = entry.importedName === entry.localName ? entry.localName : `${entry.importedName} as ${entry.localName}`;
    const clauses = named.get(entry.moduleSpecifier);
    if (clauses === undefined) {
      named.set(entry.moduleSpecifier, [clause]);
    } else if (!clauses.includes(clause)) {
      clauses.push(clause);
    }
  }

  for (const [specifier, clauses] of named) {
    lines.push(`import type { ${clauses.join(', ')} } from ${toStringLiteral(specifier)};`);
  }
  return lines;
}
