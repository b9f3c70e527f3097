import { describe, expect, it } from 'vitest';

import { compileSource } from '../src/compile.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';

function diagnose(text: string): Diagnostic {
  const res = compileSource('test.tern', text, {}, { formats: defaultFormatWriters });
  expect(res.artifacts).toEqual([]);
  expect(res.diagnostics).toHaveLength(1);
  const d = res.diagnostics[0];
  if (!d) throw new Error('no diagnostic');
  return d;
}

describe('parser diagnostics', () => {
  it.each([
    [
      'var x: Long begin x := 1 end',
      DiagnosticIds.TypeError,
      'Incompatible types Long and Int in assignment.',
      21,
    ],
    ['begin y := 1 end', DiagnosticIds.NameError, 'Undeclared identifier "y".', 7],
    [
      'var x: Int begin x := 1 / 0 end',
      DiagnosticIds.ConstEvalError,
      'Division by zero in constant expression.',
      25,
    ],
    [
      'begin write_eln end extra',
      DiagnosticIds.ParseError,
      'Expected end of input, got identifier.',
      21,
    ],
    [
      'var x: Int begin x := write_eln end',
      DiagnosticIds.TypeError,
      'Cannot use a void value as an expression.',
      23,
    ],
    ['var x: Int begin x end', DiagnosticIds.ParseError, 'Expected assignment or call.', 18],
    ['var x: Int begin x := &5 end', DiagnosticIds.TypeError, 'Expression is not addressable.', 23],
    [
      'var a: Int[0] begin end',
      DiagnosticIds.ConstEvalError,
      'Array size must be between 1 and 2147483647, got 0.',
      12,
    ],
    [
      'var x: Int, x: Long begin end',
      DiagnosticIds.NameError,
      '"x" is already declared in this scope.',
      13,
    ],
    [
      'begin var export y: Int end',
      DiagnosticIds.ParseError,
      'Cannot export a non-global variable.',
      11,
    ],
    [
      "var x: Int begin x := 'a' end",
      DiagnosticIds.TypeError,
      'Incompatible types Int and Char in assignment.',
      20,
    ],
    [
      'begin d2i(1) end',
      DiagnosticIds.TypeError,
      'Argument 1 to "d2i" expected Char, got Int.',
      7,
    ],
    [
      'begin write_eln(1) end',
      DiagnosticIds.TypeError,
      'Procedure "write_eln" expects 0 argument(s), got 1.',
      7,
    ],
    [
      'var x: Int begin x := x[0] end',
      DiagnosticIds.TypeError,
      'Type Int does not support indexing.',
      24,
    ],
    ['begin @ end', DiagnosticIds.LexError, "Unexpected character '@'.", 7],
    [
      'var a: Int[2], b: Int[2] begin a := b end',
      DiagnosticIds.TypeError,
      'Cannot assign to a value of array type Int[2].',
      34,
    ],
    [
      'var p: Int* begin p := p * p end',
      DiagnosticIds.TypeError,
      'Type Int* does not support operator "*".',
      26,
    ],
    [
      'var p: Int*, q: Char* begin p := p + q end',
      DiagnosticIds.TypeError,
      'Incompatible types Int* and Char* in binary operation.',
      36,
    ],
    [
      'var x: Int, y: Int[x] begin end',
      DiagnosticIds.NameError,
      'Variable "x" cannot be used inside its own declaration list.',
      20,
    ],
    ['var x: Int begin x := 1', DiagnosticIds.ParseError, 'Expected "end", got end of input.', 24],
    [
      'var x: Int begin x := 4294967296 end',
      DiagnosticIds.ConstEvalError,
      'Integer literal 4294967296 does not fit in Int.',
      23,
    ],
    ['var x: Foo begin end', DiagnosticIds.NameError, 'Undeclared type "Foo".', 8],
    ['var x: Int begin x := x as x end', DiagnosticIds.NameError, '"x" is not a type.', 28],
    [
      'var a: Long[2147483647] begin end',
      DiagnosticIds.ConstEvalError,
      'Type Long[2147483647] is larger than 2147483647 bytes.',
      13,
    ],
    [
      'var a: Int[65536][32768] begin end',
      DiagnosticIds.ConstEvalError,
      'Type Int[65536][32768] is larger than 2147483647 bytes.',
      19,
    ],
    [
      'begin var a: Byte[2147483647], b: Byte end',
      DiagnosticIds.ConstEvalError,
      'Variables of this scope take more than 2147483647 bytes.',
      32,
    ],
    [
      'var export rax: Int begin end',
      DiagnosticIds.NameError,
      'Cannot export "rax": the name is reserved in assembly output.',
      12,
    ],
    [
      'var export _start: Int begin end',
      DiagnosticIds.NameError,
      'Cannot export "_start": the name is reserved in assembly output.',
      12,
    ],
  ])('%s', (text, id, message, column) => {
    expect(diagnose(text)).toEqual({
      id,
      severity: 'error',
      message,
      file: 'test.tern',
      line: 1,
      column,
    });
  });

  it('rejects casts to array types', () => {
    expect(diagnose('var x: Int begin x := x as Int[2] end').message).toBe(
      'Cannot cast Int to Int[2].',
    );
  });

  it('rejects negating pointers', () => {
    expect(diagnose('var p: Int* begin p := -p end').message).toBe(
      'Cannot negate a value of type Int*.',
    );
  });

  it('accepts reserved assembly names on globals that are not exported', () => {
    const res = compileSource(
      'test.tern',
      'var rax: Int, _start: Byte begin rax := 1 end',
      {},
      { formats: defaultFormatWriters },
    );
    expect(res.diagnostics).toEqual([]);
  });

  it('never blames malformed programs on the compiler', () => {
    for (const text of ['begin', 'var', 'begin x', 'var x: begin end', 'begin ( end', 'end']) {
      expect(diagnose(text).id).not.toBe(DiagnosticIds.InternalError);
    }
  });
});
