/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics carry stable IDs so editors and scripts can match on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `TERN101`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'TERN000',

  /** Failed to read the entry file from disk. */
  IoReadFailed: 'TERN001',

  /**
   * Compiler invariant violation.
   *
   * Never caused by the input program alone; it always points at a bug in ternc.
   */
  InternalError: 'TERN002',

  /** Unexpected character or malformed literal. */
  LexError: 'TERN100',

  /** Unexpected token where a specific token or construct was required. */
  ParseError: 'TERN101',

  /** Undeclared name, name of the wrong kind, or redeclaration in the same scope. */
  NameError: 'TERN200',

  /** Operator, index, call argument or assignment type mismatch. */
  TypeError: 'TERN300',

  /** Compile-time evaluation failure (division by zero, bad array bound, oversized literal). */
  ConstEvalError: 'TERN301',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
