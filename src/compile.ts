import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { diagnosticFromThrown } from './diagnostics/errors.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { Artifact, WriteAsmOptions } from './formats/types.js';
import { compileToLines } from './frontend/parser.js';
import { makeSourceFile } from './frontend/source.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

function asmOptions(options: CompilerOptions): WriteAsmOptions {
  return {
    ...(options.lineEnding ? { lineEnding: options.lineEnding } : {}),
    ...(options.header !== undefined ? { header: options.header } : {}),
  };
}

/**
 * Compile already-loaded source text. `path` is only used to label diagnostics.
 */
export function compileSource(
  path: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  let lines: readonly string[];
  try {
    lines = compileToLines(makeSourceFile(path, text));
  } catch (err) {
    diagnostics.push(diagnosticFromThrown(err, path));
    return { diagnostics, artifacts: [] };
  }

  const asm = deps.formats.writeAsm(lines, asmOptions(options));
  const artifacts: Artifact[] = [options.outputPath ? { ...asm, path: options.outputPath } : asm];
  return { diagnostics, artifacts };
}

/**
 * Compile an entry file to NASM source.
 *
 * Compilation stops at the first error; the result then carries that single diagnostic and no
 * artifacts.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  let sourceText: string;
  try {
    sourceText = await readFile(entryPath, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryPath,
        },
      ],
      artifacts: [],
    };
  }
  return compileSource(entryPath, sourceText, options, deps);
};
