/**
 * Writing generated modules
 *
 * The only part of the generator that touches the file system.
 */

import ts from 'typescript';
import type { GenerationResult } from './types.js';

/** Where generated modules are written */
export interface OutputHost {
  writeFile(fileName: string, text: string): void;
}

/**
 * Writes every generated module through `host` (the real file system by
 * default) and returns the written file names
 */
export function writeGeneratedSources(result: GenerationResult, host: OutputHost = ts.sys): string[] {
  return result.sources.map(source => {
    host.writeFile(source.fileName, source.text);
    return source.fileName;
  });
}
