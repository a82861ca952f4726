/**
 * Logging wrapper generator
 *
 * @example
 * ```typescript
 * import ts from 'typescript';
 * import { generateLogging, writeGeneratedSources, formatDiagnostic } from 'logweave/generator';
 *
 * const program = ts.createProgram(['src/services/user-service.ts'], { rootDir: 'src', experimentalDecorators: true });
 * const result = generateLogging(program);
 *
 * result.diagnostics.forEach(diagnostic => console.error(formatDiagnostic(diagnostic)));
 * writeGeneratedSources(result);
 * ```
 */

import path from 'node:path';
import ts from 'typescript';
import type { InstrumentationDirective } from '../directives/types.js';
import { findDuplicateParameterKey, readInstrumentation, resolveMethodConfig } from './config-resolver.js';
import { createDiagnostic, DiagnosticCode, type GeneratorDiagnostic } from './diagnostics.js';
import { DirectiveReader } from './directive-reader.js';
import { discoverCandidates, isGeneratedFile, type Candidate } from './discovery.js';
import { isInstrumentableMethod, validateCandidate, type ClassLocation, type InstrumentableMethod } from './eligibility.js';
import { reproduceSignature, typeParameterTypeTexts } from './signature.js';
import { TypeImportResolver, type TypeImport } from './type-imports.js';
import {
  DEFAULT_GENERATOR_OPTIONS,
  type GeneratedSource,
  type GenerationResult,
  type GeneratorOptions,
  type GeneratorOptionsInput
} from './types.js';
import { emitClassModule, rootName, uniqueName, type ClassPlan, type WrapperPlan } from './wrapper-emitter.js';
import { collectMemberNames, wrapperNameFor } from './wrapper-naming.js';

const SOURCE_EXTENSION = /\.(?:[cm]?tsx?)$/;

const RUNTIME_ALIAS = 'logweave';

function toPosix(fileName: string): string {
  return fileName.replace(/\\/g, '/');
}

/**
 * Applies defaults. `rootDir` falls back to the compiler's `rootDir`, then
 * to the program's current directory.
 */
export function resolveGeneratorOptions(program: ts.Program, input: GeneratorOptionsInput = {}): GeneratorOptions {
  const currentDirectory = toPosix(program.getCurrentDirectory());
  const rootDir = input.rootDir ?? program.getCompilerOptions().rootDir ?? currentDirectory;
  return Object.freeze({
    ...DEFAULT_GENERATOR_OPTIONS,
    ...input,
    rootDir: path.posix.resolve(currentDirectory, toPosix(rootDir))
  });
}

/**
 * Module path of a source file relative to `rootDir`, without extension
 * (`services/user-service`)
 */
export function modulePath(fileName: string, rootDir: string): string {
  const relative = path.posix.relative(toPosix(rootDir), toPosix(fileName));
  return relative.replace(SOURCE_EXTENSION, '');
}

/** File the logging module of `className` is written to */
export function outputFileName(sourceFileName: string, className: string, options: Pick<GeneratorOptions, 'outputSuffix'>): string {
  return `${toPosix(sourceFileName).replace(SOURCE_EXTENSION, '')}.${className}${options.outputSuffix}`;
}

interface GenerationContext {
  readonly checker: ts.TypeChecker;
  readonly reader: DirectiveReader;
  readonly options: GeneratorOptions;
  readonly diagnostics: GeneratorDiagnostic[];
}

/**
 * Generates one logging module per instrumented class of `program`.
 * Synchronous and free of I/O: the same program yields the same result.
 */
export function generateLogging(program: ts.Program, input: GeneratorOptionsInput = {}): GenerationResult {
  const options = resolveGeneratorOptions(program, input);
  // The checker binds every file, which sets the parent links the readers rely on
  const checker = program.getTypeChecker();
  const diagnostics: GeneratorDiagnostic[] = [];
  const context: GenerationContext = {
    checker,
    reader: new DirectiveReader(checker, options.runtimeModule, diagnostics),
    options,
    diagnostics
  };

  const sources: GeneratedSource[] = [];
  for (const candidate of discoverCandidates(program, context.reader, options)) {
    const check = validateCandidate(candidate);
    if (!check.ok) {
      diagnostics.push(...check.diagnostics);
      continue;
    }

    const plan = planClass(candidate, check.location, context);
    if (plan !== undefined) {
      sources.push(
        Object.freeze({
          fileName: outputFileName(candidate.sourceFile.fileName, check.location.className, options),
          sourceFileName: candidate.sourceFile.fileName,
          className: check.location.className,
          text: emitClassModule(plan)
        })
      );
    }
  }

  return Object.freeze({ sources: Object.freeze(sources), diagnostics: Object.freeze(diagnostics) });
}

function planClass(candidate: Candidate, location: ClassLocation, context: GenerationContext): ClassPlan | undefined {
  const { declaration, sourceFile } = candidate;
  const { checker, reader, options, diagnostics } = context;
  const { className, namespacePath } = location;

  const baseName = path.posix.basename(toPosix(sourceFile.fileName)).replace(SOURCE_EXTENSION, '');
  const sourceModuleSpecifier = `./${baseName}${options.importExtension}`;
  const resolver = new TypeImportResolver(checker, sourceFile, sourceModuleSpecifier);

  const classTypeParameters = declaration.typeParameters ?? [];
  const classTypeArguments = classTypeParameters.map(parameter => parameter.name.text);
  const ignoredNames = new Set([...classTypeArguments, rootName(location)]);

  const classImports = resolver.resolve(typeParameterTypeTexts(declaration.typeParameters, sourceFile), declaration, ignoredNames);
  if (!classImports.ok) {
    diagnostics.push(
      createDiagnostic(
        sourceFile,
        declaration.name ?? declaration,
        DiagnosticCode.UnimportableType,
        'warning',
        `Logging wrappers for '${className}' were not generated: its type parameters use '${classImports.name}', and ${classImports.reason}`
      )
    );
    return undefined;
  }

  const classDirective = reader.find(declaration, 'LogClass');
  const classOptions: InstrumentationDirective | undefined = classDirective !== undefined
    ? readInstrumentation(reader.readArguments(classDirective, 'LogClass'))
    : undefined;

  const takenNames = collectMemberNames(declaration, checker, file => isGeneratedFile(file, options));
  const typeImports: TypeImport[] = [...classImports.imports];
  const wrappers: WrapperPlan[] = [];

  for (const member of declaration.members) {
    if (!isInstrumentableMethod(member) || isOverloaded(declaration, member)) continue;

    const config = resolveMethodConfig(member, classOptions, reader);
    if (config === undefined) continue;

    const methodName = member.name.text;
    const duplicate = findDuplicateParameterKey(config);
    if (duplicate !== undefined) {
      diagnostics.push(
        createDiagnostic(
          sourceFile,
          member.name,
          DiagnosticCode.DuplicateParameterKey,
          'warning',
          `No logging wrapper was generated for '${className}.${methodName}': parameters '${duplicate.first}' and '${duplicate.second}' are both logged as '${duplicate.key}'`
        )
      );
      continue;
    }

    const wrapperName = wrapperNameFor(methodName, options);
    if (takenNames.has(wrapperName)) {
      diagnostics.push(
        createDiagnostic(
          sourceFile,
          member.name,
          DiagnosticCode.WrapperNameCollision,
          'warning',
          `No logging wrapper was generated for '${className}.${methodName}': the name '${wrapperName}' is already taken`
        )
      );
      continue;
    }

    const signature = reproduceSignature(member, checker);
    const methodTypeParameters = (member.typeParameters ?? []).map(parameter => parameter.name.text);
    const resolution = resolver.resolve(signature.typeTexts, member, new Set([...ignoredNames, ...methodTypeParameters]));
    if (!resolution.ok) {
      diagnostics.push(
        createDiagnostic(
          sourceFile,
          member.name,
          DiagnosticCode.UnimportableType,
          'warning',
          `No logging wrapper was generated for '${className}.${methodName}': its signature uses '${resolution.name}', and ${resolution.reason}`
        )
      );
      continue;
    }

    takenNames.add(wrapperName);
    typeImports.push(...resolution.imports);
    wrappers.push({ methodName, wrapperName, signature, config });
  }

  const imports = dedupeImports(typeImports);
  const reservedNames = new Set([
    rootName(location),
    ...imports.map(entry => entry.localName),
    ...wrappers.flatMap(wrapper => wrapper.signature.parameters.map(parameter => parameter.name))
  ]);

  return Object.freeze({
    className,
    namespacePath,
    loggedNamespace: [modulePath(sourceFile.fileName, options.rootDir), ...namespacePath].join('.'),
    sourceDisplayName: path.posix.relative(options.rootDir, toPosix(sourceFile.fileName)),
    sourceModuleSpecifier,
    runtimeModule: options.runtimeModule,
    runtimeAlias: uniqueName(RUNTIME_ALIAS, reservedNames),
    classTypeParameters: classTypeParameters.map(parameter => parameter.getText(sourceFile)),
    classTypeArguments,
    typeImports: imports,
    wrappers
  });
}

/** Methods with overload signatures cannot be forwarded through their implementation signature */
function isOverloaded(declaration: ts.ClassDeclaration, method: InstrumentableMethod): boolean {
  return declaration.members.some(
    member =>
      member !== method &&
      ts.isMethodDeclaration(member) &&
      member.body === undefined &&
      ts.isIdentifier(member.name) &&
      member.name.text === method.name.text
  );
}

function dedupeImports(imports: readonly TypeImport[]): TypeImport[] {
  const byLocalName = new Map<string, TypeImport>();
  for (const entry of imports) {
    if (!byLocalName.has(entry.localName)) {
      byLocalName.set(entry.localName, entry);
    }
  }
  return [...byLocalName.values()];
}
