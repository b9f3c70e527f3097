import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that influence compilation behavior and the shape of the produced artifact.
 */
export interface CompilerOptions {
  /** Path the CLI writes the `.asm` artifact to; recorded on the artifact. */
  outputPath?: string;
  /** Line ending used when rendering the assembly text. */
  lineEnding?: '\n' | '\r\n';
  /** Prefix the assembly with a `; generated by ternc` comment. */
  header?: boolean;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 *
 * When `diagnostics` holds an error, `artifacts` is empty.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline stays in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
