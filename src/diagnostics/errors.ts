import type { Diagnostic, DiagnosticId } from './types.js';
import { DiagnosticIds } from './types.js';

/**
 * A user-facing diagnostic raised while compiling.
 *
 * Throwing one unwinds the whole compilation; nothing emitted so far is kept.
 */
export class CompileError extends Error {
  readonly id: DiagnosticId;
  readonly line: number;
  readonly column: number;

  constructor(id: DiagnosticId, message: string, line: number, column: number) {
    super(message);
    this.name = 'CompileError';
    this.id = id;
    this.line = line;
    this.column = column;
  }

  toDiagnostic(file: string): Diagnostic {
    return {
      id: this.id,
      severity: 'error',
      message: this.message,
      file,
      line: this.line,
      column: this.column,
    };
  }
}

/**
 * A broken compiler invariant (e.g. mismatched operand sizes reaching the emitter).
 *
 * These are never the input program's fault and are kept apart from {@link CompileError}.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalError';
  }
}

export function errorAt(
  id: DiagnosticId,
  where: { line: number; column: number },
  message: string,
): CompileError {
  return new CompileError(id, message, where.line, where.column);
}

/**
 * Convert anything thrown during a compilation into a diagnostic for `file`.
 */
export function diagnosticFromThrown(err: unknown, file: string): Diagnostic {
  if (err instanceof CompileError) return err.toDiagnostic(file);
  const message = err instanceof Error ? err.message : String(err);
  return {
    id: DiagnosticIds.InternalError,
    severity: 'error',
    message: `Internal compiler error: ${message}`,
    file,
  };
}
