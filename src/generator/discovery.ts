/**
 * Target discovery
 *
 * Two independent searches run over every user source file: classes that
 * carry `@LogClass`, and methods that carry `@LogMethod` (whose enclosing
 * class becomes the candidate). Their union is keyed by declaration
 * location, so a class found by both searches, or through several of its
 * methods, is a single candidate.
 */

import ts from 'typescript';
import type { DirectiveReader } from './directive-reader.js';
import type { GeneratorOptions } from './types.js';

/** First line of every generated module */
export const GENERATED_HEADER = '// <auto-generated />';

/**
 * A class declaration selected for instrumentation
 */
export interface Candidate {
  /** `fileName:position`, stable across searches */
  readonly key: string;
  readonly declaration: ts.ClassDeclaration;
  readonly sourceFile: ts.SourceFile;
}

/**
 * Whether a file was written by the generator
 */
export function isGeneratedFile(sourceFile: ts.SourceFile, options: Pick<GeneratorOptions, 'outputSuffix'>): boolean {
  return sourceFile.fileName.endsWith(options.outputSuffix) || sourceFile.text.startsWith(GENERATED_HEADER);
}

/**
 * Source files the generator reads: no declaration files, no library or
 * `node_modules` files and no generated output.
 */
export function userSourceFiles(program: ts.Program, options: Pick<GeneratorOptions, 'outputSuffix'>): ts.SourceFile[] {
  return program.getSourceFiles().filter(
    sourceFile =>
      !sourceFile.isDeclarationFile &&
      !program.isSourceFileFromExternalLibrary(sourceFile) &&
      !program.isSourceFileDefaultLibrary(sourceFile) &&
      !isGeneratedFile(sourceFile, options)
  );
}

/**
 * Finds the candidate classes of a program, in source order
 */
export function discoverCandidates(
  program: ts.Program,
  reader: DirectiveReader,
  options: Pick<GeneratorOptions, 'outputSuffix'>
): Candidate[] {
  const candidates = new Map<string, Candidate>();

  const add = (declaration: ts.ClassDeclaration, sourceFile: ts.SourceFile): void => {
    const key = `${sourceFile.fileName}:${declaration.pos}`;
    if (!candidates.has(key)) {
      candidates.set(key, { key, declaration, sourceFile });
    }
  };

  for (const sourceFile of userSourceFiles(program, options)) {
    for (const declaration of findClassDirectives(sourceFile, reader)) {
      add(declaration, sourceFile);
    }
    for (const method of findMethodDirectives(sourceFile, reader)) {
      if (ts.isClassDeclaration(method.parent)) {
        add(method.parent, sourceFile);
      }
    }
  }

  return [...candidates.values()].sort(
    (a, b) => compareFileOrder(program, a, b) || a.declaration.pos - b.declaration.pos
  );
}

function findClassDirectives(sourceFile: ts.SourceFile, reader: DirectiveReader): ts.ClassDeclaration[] {
  const found: ts.ClassDeclaration[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node) && reader.has(node, 'LogClass')) {
      found.push(node);
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  return found;
}

function findMethodDirectives(sourceFile: ts.SourceFile, reader: DirectiveReader): ts.MethodDeclaration[] {
  const found: ts.MethodDeclaration[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isMethodDeclaration(node) && reader.has(node, 'LogMethod')) {
      found.push(node);
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  return found;
}

function compareFileOrder(program: ts.Program, a: Candidate, b: Candidate): number {
  if (a.sourceFile === b.sourceFile) return 0;
  const files = program.getSourceFiles();
  return files.indexOf(a.sourceFile) - files.indexOf(b.sourceFile);
}
