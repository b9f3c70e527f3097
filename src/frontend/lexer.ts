import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt } from '../diagnostics/errors.js';
import type { SourceFile, SourcePosition } from './source.js';
import type { Token } from './token.js';
import { KEYWORDS, PUNCTUATION } from './token.js';

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '0': '\0',
  '\\': '\\',
  "'": "'",
};

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * On-demand tokenizer for Tern source text.
 *
 * Once the end of the text is reached every further call to {@link Lexer.next} returns an `EOF` token.
 */
export class Lexer {
  private index = 0;
  private line = 1;
  // Offset of the first character of the current line.
  private lineStart = 0;

  constructor(private readonly file: SourceFile) {}

  next(): Token {
    this.skipTrivia();
    const start = this.index;
    const where: SourcePosition = { line: this.line, column: start - this.lineStart + 1 };
    const text = this.file.text;

    if (start >= text.length) {
      return { kind: 'EOF', lexeme: '', line: where.line, column: where.column };
    }

    const ch = text[start] ?? '';

    if (isIdentStart(ch)) {
      while (this.index < text.length && isIdentPart(text[this.index] ?? '')) this.index++;
      const lexeme = text.slice(start, this.index);
      const keyword = KEYWORDS.get(lexeme);
      return { kind: keyword ?? 'Identifier', lexeme, line: where.line, column: where.column };
    }

    if (isDigit(ch)) {
      while (this.index < text.length && isDigit(text[this.index] ?? '')) this.index++;
      const suffix = text[this.index];
      if (suffix === 'l' || suffix === 'L') this.index++;
      if (isIdentPart(text[this.index] ?? '')) {
        throw errorAt(DiagnosticIds.LexError, where, `Malformed integer literal.`);
      }
      return {
        kind: 'Integer',
        lexeme: text.slice(start, this.index),
        line: where.line,
        column: where.column,
      };
    }

    if (ch === "'") {
      return { kind: 'Char', lexeme: this.readChar(where), line: where.line, column: where.column };
    }

    for (const [spelling, kind] of PUNCTUATION) {
      if (text.startsWith(spelling, start)) {
        this.index += spelling.length;
        return { kind, lexeme: spelling, line: where.line, column: where.column };
      }
    }

    throw errorAt(DiagnosticIds.LexError, where, `Unexpected character '${ch}'.`);
  }

  private skipTrivia(): void {
    const text = this.file.text;
    while (this.index < text.length) {
      const ch = text[this.index];
      if (ch === '\n') {
        this.index++;
        this.line++;
        this.lineStart = this.index;
        continue;
      }
      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.index++;
        continue;
      }
      if (text.startsWith('//', this.index)) {
        while (this.index < text.length && text[this.index] !== '\n') this.index++;
        continue;
      }
      break;
    }
  }

  private readChar(where: SourcePosition): string {
    const text = this.file.text;
    let i = this.index + 1;
    let value = text[i];
    if (value === undefined || value === '\n' || value === "'") {
      throw errorAt(DiagnosticIds.LexError, where, `Malformed character literal.`);
    }
    if (value === '\\') {
      const escaped = ESCAPES[text[i + 1] ?? ''];
      if (escaped === undefined) {
        throw errorAt(DiagnosticIds.LexError, where, `Unknown escape in character literal.`);
      }
      value = escaped;
      i++;
    }
    if (value.charCodeAt(0) > 0xff) {
      throw errorAt(DiagnosticIds.LexError, where, `Character literal does not fit in a byte.`);
    }
    if (text[i + 1] !== "'") {
      throw errorAt(DiagnosticIds.LexError, where, `Unterminated character literal.`);
    }
    this.index = i + 2;
    return value;
  }
}
