export type BinaryOp = '+' | '-' | '*' | '/' | '%' | '<<' | '>>';

export type TokenKind =
  | 'Identifier'
  | 'Integer'
  | 'Char'
  | 'Var'
  | 'Export'
  | 'Begin'
  | 'End'
  | 'As'
  | 'Colon'
  | 'Comma'
  | 'Assign'
  | 'LParen'
  | 'RParen'
  | 'LBracket'
  | 'RBracket'
  | 'Amp'
  | 'Plus'
  | 'Minus'
  | 'Star'
  | 'Slash'
  | 'Percent'
  | 'LShift'
  | 'RShift'
  | 'EOF';

export interface Token {
  kind: TokenKind;
  /** Source text of the token; for `Char` tokens, the decoded character. */
  lexeme: string;
  line: number;
  column: number;
}

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['var', 'Var'],
  ['export', 'Export'],
  ['begin', 'Begin'],
  ['end', 'End'],
  ['as', 'As'],
]);

/**
 * Punctuation, longest spellings first so `:=` wins over `:` and `<<` is never split.
 */
export const PUNCTUATION: ReadonlyArray<readonly [string, TokenKind]> = [
  [':=', 'Assign'],
  ['<<', 'LShift'],
  ['>>', 'RShift'],
  [':', 'Colon'],
  [',', 'Comma'],
  ['(', 'LParen'],
  [')', 'RParen'],
  ['[', 'LBracket'],
  [']', 'RBracket'],
  ['&', 'Amp'],
  ['+', 'Plus'],
  ['-', 'Minus'],
  ['*', 'Star'],
  ['/', 'Slash'],
  ['%', 'Percent'],
];

const BINARY_OPS: Partial<Record<TokenKind, BinaryOp>> = {
  Plus: '+',
  Minus: '-',
  Star: '*',
  Slash: '/',
  Percent: '%',
  LShift: '<<',
  RShift: '>>',
};

export function binaryOpOf(kind: TokenKind): BinaryOp | undefined {
  return BINARY_OPS[kind];
}

/**
 * Binding strength of a binary operator; higher binds tighter.
 */
export function precedence(op: BinaryOp): number {
  switch (op) {
    case '<<':
    case '>>':
      return 0;
    case '+':
    case '-':
      return 1;
    case '*':
    case '/':
    case '%':
      return 2;
  }
}

export function isUnaryOp(kind: TokenKind): boolean {
  return kind === 'Amp' || kind === 'Minus';
}

/**
 * Human-readable token kind for diagnostics.
 */
export function describeKind(kind: TokenKind): string {
  switch (kind) {
    case 'Identifier':
      return 'identifier';
    case 'Integer':
      return 'integer literal';
    case 'Char':
      return 'character literal';
    case 'EOF':
      return 'end of input';
    default: {
      for (const [word, k] of KEYWORDS) if (k === kind) return `"${word}"`;
      for (const [text, k] of PUNCTUATION) if (k === kind) return `"${text}"`;
      return kind;
    }
  }
}
