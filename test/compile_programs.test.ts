import { describe, expect, it } from 'vitest';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { compile, compileSource } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import { Parser } from '../src/frontend/parser.js';
import { makeSourceFile } from '../src/frontend/source.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const deps = { formats: defaultFormatWriters };

const HEAD = ['global _start', '', 'section .data', '  tern$newl: db 10'];
const EXIT = ['  mov rax, 60', '  xor rdi, rdi', '  syscall'];

function asmLines(text: string): string[] {
  const res = compileSource('test.tern', text, {}, deps);
  expect(res.diagnostics).toEqual([]);
  const asm = res.artifacts[0];
  if (!asm) throw new Error('no artifact');
  return asm.text.split('\n').slice(0, -1);
}

/** Instructions between `_start:` and the exit sequence. */
function body(text: string): string[] {
  const lines = asmLines(text);
  return lines.slice(lines.indexOf('_start:') + 1, -EXIT.length);
}

describe('compile fixtures', () => {
  it('folds a constant sum into a single store', async () => {
    const res = await compile(join(__dirname, 'fixtures', 'sum.tern'), {}, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts).toEqual([
      {
        kind: 'asm',
        text: [
          ...HEAD,
          '  tern$global$x: dd 0',
          'section .text',
          '_start:',
          '  mov dword [tern$global$x], 3',
          ...EXIT,
          '',
        ].join('\n'),
      },
    ]);
  });

  it('lays out locals in a frame', async () => {
    const res = await compile(join(__dirname, 'fixtures', 'locals.tern'), {}, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts[0]?.text.split('\n').slice(0, -1)).toEqual([
      ...HEAD,
      'section .text',
      '_start:',
      '  push rbp',
      '  mov rbp, rsp',
      '  sub rsp, 12',
      '  mov dword [rbp-4], 5',
      '  xor r8, r8',
      '  mov r8d, [rbp-4]',
      '  add r8, 1',
      '  mov qword [rbp-12], r8',
      '  mov rax, 1',
      '  mov rdi, 1',
      '  mov rsi, tern$newl',
      '  mov rdx, 1',
      '  syscall',
      '  mov rsp, rbp',
      '  pop rbp',
      ...EXIT,
    ]);
  });

  it('addresses array elements and pointers', async () => {
    const res = await compile(join(__dirname, 'fixtures', 'arrays.tern'), {}, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts[0]?.text.split('\n').slice(0, -1)).toEqual([
      ...HEAD,
      '  tern$global$a: times 4 dd 0',
      '  tern$global$i: dd 0',
      '  tern$global$m: times 6 dd 0',
      '  tern$global$p: dq 0',
      'section .text',
      '_start:',
      '  mov dword [tern$global$i], 2',
      '  lea r8, [tern$global$a]',
      '  mov r9d, dword [tern$global$i]',
      '  mov dword [r9*4+r8], 7',
      '  lea r8, [tern$global$a]',
      '  lea r9, [tern$global$a]',
      '  mov r10d, dword [tern$global$i]',
      '  mov r11d, [r10*4+r9]',
      '  add r11d, 3',
      '  mov dword [r8+4], r11d',
      '  lea r8, [tern$global$m]',
      '  lea r9, [r8+12]',
      '  mov r8d, dword [tern$global$i]',
      '  mov dword [r8*4+r9], 4',
      '  lea r8, [tern$global$a]',
      '  lea r9, [r8]',
      '  mov qword [tern$global$p], r9',
      '  mov r8, [tern$global$p]',
      '  mov dword [r8+12], 9',
      ...EXIT,
    ]);
  });

  it('reports the first error with its position', async () => {
    const entry = join(__dirname, 'fixtures', 'bad_assign.tern');
    const res = await compile(entry, {}, deps);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.TypeError,
        severity: 'error',
        message: 'Incompatible types Long and Int in assignment.',
        file: entry,
        line: 3,
        column: 5,
      },
    ]);
  });

  it('reports unreadable entry files', async () => {
    const res = await compile(join(__dirname, 'fixtures', 'missing.tern'), {}, deps);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe(DiagnosticIds.IoReadFailed);
  });
});

describe('code generation', () => {
  it('multiplies through rax and copies the result out', () => {
    expect(body('var x: Int, y: Int begin y := 2 x := y * 3 + 1 end')).toEqual([
      '  mov dword [tern$global$y], 2',
      '  mov r8d, 3',
      '  mov eax, [tern$global$y]',
      '  mul r8d',
      '  mov r8d, eax',
      '  add r8d, 1',
      '  mov dword [tern$global$x], r8d',
    ]);
  });

  it('clears rdx before dividing and takes the remainder from it', () => {
    expect(body('var x: Int, y: Int begin x := y % 5 end')).toEqual([
      '  mov r8d, 5',
      '  mov eax, [tern$global$y]',
      '  xor edx, edx',
      '  div r8d',
      '  mov eax, edx',
      '  mov r8d, eax',
      '  mov dword [tern$global$x], r8d',
    ]);
  });

  it('widens the narrower operand', () => {
    expect(body('var b: Byte, x: Int begin x := b + 1 end')).toEqual([
      '  xor r8d, r8d',
      '  mov r8b, [tern$global$b]',
      '  add r8d, 1',
      '  mov dword [tern$global$x], r8d',
    ]);
  });

  it('shifts by a runtime count through cl', () => {
    expect(body('var x: Int, n: Byte begin x := x << n end')).toEqual([
      '  xor r8d, r8d',
      '  mov r8b, [tern$global$n]',
      '  mov r9d, [tern$global$x]',
      '  mov cl, r8b',
      '  shl r9d, cl',
      '  mov dword [tern$global$x], r9d',
    ]);
  });

  it('negates runtime values', () => {
    expect(body('var x: Int, y: Int begin x := -y end')).toEqual([
      '  mov r8d, [tern$global$y]',
      '  neg r8d',
      '  mov dword [tern$global$x], r8d',
    ]);
  });

  it('converts a digit character with d2i', () => {
    expect(body("var b: Byte begin b := d2i('7') end")).toEqual([
      '  mov r8b, 55',
      '  sub r8b, 48',
      '  mov byte [tern$global$b], r8b',
    ]);
  });

  it('chains assignments through memory', () => {
    expect(body('var x: Int, y: Int begin x := y := 4 end')).toEqual([
      '  mov dword [tern$global$y], 4',
      '  mov r8d, [tern$global$y]',
      '  mov [tern$global$x], r8d',
    ]);
  });

  it('exports globals and stages wide constants', () => {
    const lines = asmLines('var export total: Long begin total := 3000000000l end');
    expect(lines.slice(4, 6)).toEqual(['  global total', '  total: dq 0']);
    expect(lines.slice(lines.indexOf('_start:') + 1, -EXIT.length)).toEqual([
      '  mov r8, 3000000000',
      '  mov [total], r8',
    ]);
  });

  it('lets a local shadow a global', () => {
    expect(body('var x: Int begin var x: Byte x := 1 as Byte end')).toEqual([
      '  push rbp',
      '  mov rbp, rsp',
      '  sub rsp, 1',
      '  mov byte [rbp-1], 1',
      '  mov rsp, rbp',
      '  pop rbp',
    ]);
  });

  it('addresses a constant index past a 32-bit displacement like a runtime one', () => {
    expect(
      body('var a: Long[4], x: Long, i: Int begin x := a[600000000] x := a[i] end'),
    ).toEqual([
      '  lea r8, [tern$global$a]',
      '  mov r9, 600000000',
      '  mov r10, [r9*8+r8]',
      '  mov [tern$global$x], r10',
      '  lea r8, [tern$global$a]',
      '  mov r9d, dword [tern$global$i]',
      '  mov r10, [r9*8+r8]',
      '  mov [tern$global$x], r10',
    ]);
  });

  it('leaves no register live after a program', () => {
    const parser = new Parser(
      makeSourceFile('test.tern', 'var a: Int[4], i: Int begin a[i] := a[i + 1] * (i - 2) end'),
    );
    parser.parseProgram();
    expect(parser.gen.regs.inUse()).toEqual([]);
  });

  it('reports register exhaustion as an internal error', () => {
    const nest = (n: number): string => (n === 0 ? '(y+y)' : `(y+y) + (${nest(n - 1)})`);
    const ok = compileSource('test.tern', `var y: Int begin y := ${nest(8)} end`, {}, deps);
    expect(ok.diagnostics).toEqual([]);

    const res = compileSource('test.tern', `var y: Int begin y := ${nest(9)} end`, {}, deps);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe(DiagnosticIds.InternalError);
    expect(res.diagnostics[0]?.message).toBe(
      'Internal compiler error: register pool exhausted (9 temporaries live); expression too complex',
    );
  });
});
