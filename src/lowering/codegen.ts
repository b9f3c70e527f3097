import { InternalError } from '../diagnostics/errors.js';
import type { BinaryOp } from '../frontend/token.js';
import type { Item, MemItem, RegItem, ValueItem } from '../semantics/items.js';
import { VOID, heldRegisters, memItem, regItem, retype } from '../semantics/items.js';
import type { Procedure, Variable } from '../semantics/scope.js';
import type { Type } from '../semantics/types.js';
import { MAX_OBJECT_SIZE, innermostElement, pointerTo, typeSize } from '../semantics/types.js';
import type { Reg } from './registers.js';
import { RegisterAllocator, isRegisterName, regName } from './registers.js';
import type { AsmWriter } from './writer.js';

/** Data label holding the single newline byte written by `write_eln`. */
export const NEWLINE_LABEL = 'tern$newl';

/** Label prefix for globals that are not exported. */
export const GLOBAL_LABEL_PREFIX = 'tern$global$';

// Words NASM reads as something other than a label where a label is expected.
const ASSEMBLER_KEYWORDS: ReadonlySet<string> = new Set([
  'byte',
  'word',
  'dword',
  'qword',
  'rel',
  'abs',
  'global',
  'section',
  'times',
  'db',
  'dw',
  'dd',
  'dq',
]);

/**
 * Can `name` not be used verbatim as the label of an exported global?
 */
export function isReservedLabel(name: string): boolean {
  return name === '_start' || isRegisterName(name) || ASSEMBLER_KEYWORDS.has(name.toLowerCase());
}

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;

/**
 * Intel size keyword for an operand of `size` bytes.
 */
export function sizeKeyword(size: number): 'byte' | 'word' | 'dword' | 'qword' {
  switch (size) {
    case 1:
      return 'byte';
    case 2:
      return 'word';
    case 4:
      return 'dword';
    case 8:
      return 'qword';
    default:
      throw new InternalError(`invalid size ${size} given to sizeKeyword`);
  }
}

/**
 * NASM data directive (`db`/`dw`/`dd`/`dq`) for one scalar unit of `t`.
 */
export function dataDirective(t: Type): string {
  const size = typeSize(innermostElement(t));
  switch (size) {
    case 1:
      return 'db';
    case 2:
      return 'dw';
    case 4:
      return 'dd';
    case 8:
      return 'dq';
    default:
      throw new InternalError(`invalid type size ${size} given to dataDirective`);
  }
}

/**
 * `value` truncated to `size` bytes, printed as a signed decimal.
 */
export function immediate(value: bigint, size: number): string {
  return BigInt.asIntN(size * 8, value).toString();
}

function fitsImm32(value: bigint, size: number): boolean {
  if (size < 8) return true;
  const v = BigInt.asIntN(64, value);
  return v >= INT32_MIN && v <= INT32_MAX;
}

function scalarSize(t: Type): number {
  const size = typeSize(t);
  if (size !== 1 && size !== 2 && size !== 4 && size !== 8) {
    throw new InternalError(`type of size ${size} cannot live in a register`);
  }
  return size;
}

function renderMem(item: MemItem): string {
  const base = item.base.kind === 'Label' ? item.base.name : regName(item.base.reg, 8);
  const mul = item.multiplier === 1 ? '' : `*${item.multiplier}`;
  let offs = '';
  if (typeof item.offset === 'string') {
    offs = `+${regName(item.offset, 8)}`;
  } else if (item.offset > 0) {
    offs = `+${item.offset}`;
  } else if (item.offset < 0) {
    offs = `${item.offset}`;
  }
  return `[${base}${mul}${offs}]`;
}

/**
 * x86-64 (NASM, Linux) instruction selection for Tern.
 *
 * Every operation consumes its operand items, releases the registers they held, and returns the
 * item describing its result.
 */
export class X64Generator {
  readonly regs: RegisterAllocator;
  // Local-variable bytes of each active frame, innermost last.
  private readonly totals: number[] = [];

  constructor(private readonly out: AsmWriter) {
    this.regs = new RegisterAllocator(out);
  }

  /** Bytes of locals in the innermost frame. */
  get frameSize(): number {
    const total = this.totals[this.totals.length - 1];
    if (total === undefined) throw new InternalError('no active frame');
    return total;
  }

  /** Intel operand syntax for `item`. */
  operand(item: Item): string {
    switch (item.kind) {
      case 'Const':
        return immediate(item.value, scalarSize(item.type));
      case 'Reg':
        return regName(item.reg, scalarSize(item.type));
      case 'Mem':
        return renderMem(item);
      case 'Void':
        throw new InternalError('void item given to operand');
    }
  }

  /** Release every register `item` keeps alive. */
  discard(item: Item): void {
    this.regs.release(...heldRegisters(item));
  }

  prologue(): void {
    this.out.line('global _start');
    this.out.line();
  }

  dataSection(): void {
    this.out.line('section .data');
    this.out.instr(`${NEWLINE_LABEL}: db 10`);
  }

  textSection(): void {
    this.out.line('section .text');
  }

  enterMain(): void {
    this.totals.push(0);
    this.out.label('_start');
  }

  leaveMain(): void {
    const total = this.totals.pop();
    if (total === undefined) throw new InternalError('leaveMain without an active frame');
    if (total !== 0) {
      this.out.instr('mov rsp, rbp');
      this.out.instr('pop rbp');
    }
    // exit(0)
    this.out.instr('mov rax, 60');
    this.out.instr('xor rdi, rdi');
    this.out.instr('syscall');
  }

  emitGlobals(vars: Variable[]): void {
    const labels = vars.map((v) => (v.exported ? v.name : `${GLOBAL_LABEL_PREFIX}${v.name}`));
    vars.forEach((v, i) => {
      if (v.exported) this.out.instr(`global ${labels[i] ?? v.name}`);
    });

    vars.forEach((v, i) => {
      const label = labels[i] ?? v.name;
      const size = typeSize(v.type);
      const directive = dataDirective(v.type);
      this.assignStorage(v, { global: true, label, size });
      if (v.type.kind === 'Array') {
        const units = size / typeSize(innermostElement(v.type));
        this.out.instr(`${label}: times ${units} ${directive} 0`);
      } else {
        this.out.instr(`${label}: ${directive} 0`);
      }
    });
  }

  emitLocals(vars: Variable[]): void {
    let total = this.frameSize;
    for (const v of vars) {
      const size = typeSize(v.type);
      total += size;
      this.assignStorage(v, { global: false, offset: total, size });
    }
    if (total > MAX_OBJECT_SIZE) throw new InternalError(`frame of ${total} bytes`);
    this.totals[this.totals.length - 1] = total;
    if (total === 0) return;
    this.out.instr('push rbp');
    this.out.instr('mov rbp, rsp');
    this.out.instr(`sub rsp, ${total}`);
  }

  private assignStorage(v: Variable, storage: NonNullable<Variable['storage']>): void {
    if (v.storage) throw new InternalError(`storage for ${v.name} assigned twice`);
    v.storage = storage;
  }

  /** The memory item for a declared variable. */
  variable(v: Variable): MemItem {
    const storage = v.storage;
    if (!storage) throw new InternalError(`variable ${v.name} used before its storage was emitted`);
    if (storage.global) return memItem({ kind: 'Label', name: storage.label }, v.type);
    return memItem({ kind: 'Reg', reg: 'rbp' }, v.type, { offset: -storage.offset });
  }

  addressOf(item: Item): RegItem {
    if (item.kind !== 'Mem') throw new InternalError(`${item.kind} item given to addressOf`);
    const reg = this.regs.acquire();
    this.out.instr(`lea ${regName(reg, 8)}, ${this.operand(item)}`);
    this.discard(item);
    return regItem(reg, pointerTo(item.type));
  }

  /** Two's complement negation. Constants are folded by the parser and never reach here. */
  negate(item: Item): RegItem {
    if (item.kind === 'Void' || item.kind === 'Const') {
      throw new InternalError(`${item.kind} item given to negate`);
    }
    const reg = this.regs.acquire();
    const r = regName(reg, scalarSize(item.type));
    this.out.instr(`mov ${r}, ${this.operand(item)}`);
    this.out.instr(`neg ${r}`);
    this.discard(item);
    return regItem(reg, item.type);
  }

  /**
   * Widen the narrower operand to the other's type.
   */
  equalize(lhs: ValueItem, rhs: ValueItem): [ValueItem, ValueItem] {
    const lsz = typeSize(lhs.type);
    const rsz = typeSize(rhs.type);
    if (lsz > rsz) {
      return [lhs, rhs.kind === 'Const' ? retype(rhs, lhs.type) : this.cast(rhs, lhs.type)];
    }
    if (lsz < rsz) {
      return [lhs.kind === 'Const' ? retype(lhs, rhs.type) : this.cast(lhs, rhs.type), rhs];
    }
    return [lhs, rhs];
  }

  binary(lhs: ValueItem, rhs: ValueItem, op: BinaryOp): RegItem {
    const size = scalarSize(lhs.type);
    if (size !== typeSize(rhs.type)) {
      throw new InternalError('lhs and rhs sizes should be the same in binary');
    }
    switch (op) {
      case '+':
      case '-':
        return this.additive(lhs, rhs, op === '+' ? 'add' : 'sub', size);
      case '<<':
      case '>>':
        return this.shift(lhs, rhs, op === '<<' ? 'shl' : 'shr', size);
      case '*':
      case '/':
      case '%':
        return this.multiplicative(lhs, rhs, op, size);
    }
  }

  /**
   * A register holding `item`'s value: `item` itself when it already is one.
   */
  private intoRegister(item: ValueItem, size: number): Reg {
    if (item.kind === 'Reg') return item.reg;
    const reg = this.regs.acquire();
    this.out.instr(`mov ${regName(reg, size)}, ${this.operand(item)}`);
    this.discard(item);
    return reg;
  }

  private additive(lhs: ValueItem, rhs: ValueItem, mnemonic: 'add' | 'sub', size: number): RegItem {
    const dst = this.intoRegister(lhs, size);
    const d = regName(dst, size);
    if (rhs.kind === 'Const' && !fitsImm32(rhs.value, size)) {
      this.regs.withTemporary((tmp) => {
        this.out.instr(`mov ${regName(tmp, 8)}, ${this.operand(rhs)}`);
        this.out.instr(`${mnemonic} ${d}, ${regName(tmp, 8)}`);
      });
    } else {
      this.out.instr(`${mnemonic} ${d}, ${this.operand(rhs)}`);
    }
    this.discard(rhs);
    return regItem(dst, lhs.type);
  }

  private shift(lhs: ValueItem, rhs: ValueItem, mnemonic: 'shl' | 'shr', size: number): RegItem {
    let dst = this.intoRegister(lhs, size);
    if (rhs.kind === 'Const') {
      this.out.instr(`${mnemonic} ${regName(dst, size)}, ${BigInt.asUintN(8, rhs.value)}`);
      return regItem(dst, lhs.type);
    }
    if (dst === 'rcx') {
      // The count has to go in cl.
      const moved = this.regs.acquire();
      this.out.instr(`mov ${regName(moved, 8)}, rcx`);
      this.regs.release('rcx');
      dst = moved;
    }
    const count = rhs.kind === 'Reg' ? regName(rhs.reg, 1) : this.operand(rhs);
    this.regs.reserveFor(['rcx'], () => {
      this.out.instr(`mov cl, ${count}`);
      this.out.instr(`${mnemonic} ${regName(dst, size)}, cl`);
    });
    this.discard(rhs);
    return regItem(dst, lhs.type);
  }

  /**
   * Sized operand for instructions that take no size hint from another register (`mul`, `movzx`).
   */
  private explicitOperand(item: ValueItem, size: number): string {
    return item.kind === 'Mem' ? `${sizeKeyword(size)} ${this.operand(item)}` : this.operand(item);
  }

  private loadAccumulator(item: ValueItem, size: number): void {
    if (item.kind === 'Const') {
      const v = BigInt.asUintN(size * 8, item.value);
      this.out.instr(size === 8 ? `mov rax, ${v}` : `mov eax, ${v}`);
      return;
    }
    if (size < 4) {
      this.out.instr(`movzx eax, ${this.explicitOperand(item, size)}`);
    } else {
      this.out.instr(`mov ${regName('rax', size)}, ${this.operand(item)}`);
    }
  }

  private multiplicative(
    lhs: ValueItem,
    rhs: ValueItem,
    op: '*' | '/' | '%',
    size: number,
  ): RegItem {
    const staged = this.regs.reserveFor(['rax', 'rdx'], (): Reg | undefined => {
      // mul/div take no immediate, and div needs rdx to itself.
      let divisor = rhs;
      let tmp: Reg | undefined;
      if (rhs.kind === 'Const' || heldRegisters(rhs).includes('rdx')) {
        tmp = this.regs.acquire();
        this.out.instr(`mov ${regName(tmp, size)}, ${this.operand(rhs)}`);
        divisor = regItem(tmp, rhs.type);
      }
      this.loadAccumulator(lhs, size);
      if (op === '*') {
        this.out.instr(`mul ${this.explicitOperand(divisor, size)}`);
        return tmp;
      }
      if (size > 1) this.out.instr('xor edx, edx');
      this.out.instr(`div ${this.explicitOperand(divisor, size)}`);
      if (op === '%') {
        this.out.instr(
          size === 1 ? 'mov al, ah' : `mov ${regName('rax', size)}, ${regName('rdx', size)}`,
        );
      }
      return tmp;
    });

    this.discard(lhs);
    this.discard(rhs);
    if (staged) this.regs.release(staged);
    const dst = this.regs.acquire();
    this.out.instr(`mov ${regName(dst, size)}, ${regName('rax', size)}`);
    return regItem(dst, lhs.type);
  }

  cast(item: ValueItem, type: Type): ValueItem {
    const srcsz = typeSize(item.type);
    const dstsz = typeSize(type);
    // No instruction when only the type changes.
    if (srcsz === dstsz) return retype(item, type);
    switch (item.kind) {
      case 'Reg': {
        if (dstsz > srcsz) {
          if (srcsz === 4) {
            this.out.instr(`mov ${regName(item.reg, 4)}, ${regName(item.reg, 4)}`);
          } else {
            const mask = `0x${'FF'.repeat(srcsz)}`;
            this.out.instr(`and ${regName(item.reg, scalarSize(type))}, ${mask}`);
          }
        }
        return regItem(item.reg, type);
      }
      case 'Mem': {
        const reg = this.regs.acquire();
        if (dstsz > srcsz) {
          const r = regName(reg, scalarSize(type));
          this.out.instr(`xor ${r}, ${r}`);
          this.out.instr(`mov ${regName(reg, scalarSize(item.type))}, ${this.operand(item)}`);
        } else {
          this.out.instr(`mov ${regName(reg, scalarSize(type))}, ${this.operand(item)}`);
        }
        this.discard(item);
        return regItem(reg, type);
      }
      case 'Const':
        // The parser retypes constants itself.
        throw new InternalError('Const item given to cast');
    }
  }

  call(proc: Procedure, args: Item[]): Item {
    try {
      switch (proc.builtin) {
        case 'WriteEln':
          // write(1, &newline, 1); the syscall itself clobbers rcx and r11.
          this.regs.reserveFor(['rax', 'rcx', 'rdx', 'rsi', 'rdi', 'r11'], () => {
            this.out.instr('mov rax, 1');
            this.out.instr('mov rdi, 1');
            this.out.instr(`mov rsi, ${NEWLINE_LABEL}`);
            this.out.instr('mov rdx, 1');
            this.out.instr('syscall');
          });
          return VOID;
        case 'DigitToInt': {
          const arg = args[0];
          if (!arg || !proc.returns) throw new InternalError('malformed d2i call');
          const reg = this.regs.acquire();
          // d2i(c) = c - '0'
          this.out.instr(`mov ${regName(reg, 1)}, ${this.operand(arg)}`);
          this.out.instr(`sub ${regName(reg, 1)}, 48`);
          return regItem(reg, proc.returns);
        }
        default: {
          const unknown: never = proc.builtin;
          throw new InternalError(`invalid procedure ${String(unknown)} given to call`);
        }
      }
    } finally {
      for (const arg of args) this.discard(arg);
    }
  }

  index(array: Item, index: Item): MemItem {
    if (array.kind === 'Void' || array.kind === 'Const') {
      throw new InternalError(`${array.kind} item given as array to index`);
    }
    const arrayType = array.type;
    if (arrayType.kind !== 'Array' && arrayType.kind !== 'Pointer') {
      throw new InternalError('non-indexable item given to index');
    }
    const element = arrayType.base;
    const elemsz = typeSize(element);

    let base: Reg;
    if (array.kind === 'Reg') {
      base = array.reg;
    } else {
      // Not pretty for plain globals, but always correct.
      base = this.regs.acquire();
      const mnemonic = arrayType.kind === 'Array' ? 'lea' : 'mov';
      this.out.instr(`${mnemonic} ${regName(base, 8)}, ${this.operand(array)}`);
      this.discard(array);
    }

    if (index.kind === 'Void') throw new InternalError('void item given as index');

    let idx: Reg;
    if (index.kind === 'Const') {
      // Runtime indexes are zero-extended; read the constant the same way.
      const value = BigInt.asUintN(scalarSize(index.type) * 8, index.value);
      const displacement = value * BigInt(elemsz);
      if (displacement <= INT32_MAX) {
        return memItem({ kind: 'Reg', reg: base }, element, {
          offset: Number(displacement),
          holds: [base],
        });
      }
      // Too far for a displacement: address it as a runtime index.
      idx = this.regs.acquire();
      this.out.instr(`mov ${regName(idx, 8)}, ${immediate(value, 8)}`);
    } else {
      idx = this.widenIndex(index);
    }
    let multiplier = elemsz;
    if (elemsz !== 1 && elemsz !== 2 && elemsz !== 4 && elemsz !== 8) {
      // Only 1, 2, 4 and 8 are encodable scales.
      const r = regName(idx, 8);
      this.out.instr(`imul ${r}, ${r}, ${elemsz}`);
      multiplier = 1;
    }
    return memItem({ kind: 'Reg', reg: idx }, element, {
      multiplier,
      offset: base,
      holds: [idx, base],
    });
  }

  /**
   * Zero-extend a runtime index into a full 64-bit register usable in an addressing mode.
   */
  private widenIndex(index: RegItem | MemItem): Reg {
    const size = scalarSize(index.type);
    const reg = index.kind === 'Reg' ? index.reg : this.regs.acquire();
    const src = index.kind === 'Reg' ? regName(index.reg, size) : this.explicitOperand(index, size);
    if (size < 4) {
      this.out.instr(`movzx ${regName(reg, 8)}, ${src}`);
    } else if (size === 4) {
      this.out.instr(`mov ${regName(reg, 4)}, ${src}`);
    } else if (index.kind === 'Mem') {
      this.out.instr(`mov ${regName(reg, 8)}, ${src}`);
    }
    if (index.kind === 'Mem') this.discard(index);
    return reg;
  }

  /**
   * Store `source` into `target`. The target stays live and is returned for chained use.
   */
  assign(target: Item, source: Item): MemItem {
    if (target.kind !== 'Mem') throw new InternalError(`${target.kind} item given as assign target`);
    if (source.kind === 'Void') throw new InternalError('void item given as assign source');
    const size = scalarSize(target.type);
    const dst = this.operand(target);
    if (source.kind === 'Mem') {
      // No memory-to-memory mov.
      this.regs.withTemporary((tmp) => {
        this.out.instr(`mov ${regName(tmp, size)}, ${this.operand(source)}`);
        this.out.instr(`mov ${dst}, ${regName(tmp, size)}`);
      });
    } else if (source.kind === 'Const' && !fitsImm32(source.value, size)) {
      this.regs.withTemporary((tmp) => {
        this.out.instr(`mov ${regName(tmp, 8)}, ${this.operand(source)}`);
        this.out.instr(`mov ${dst}, ${regName(tmp, 8)}`);
      });
    } else {
      this.out.instr(`mov ${sizeKeyword(size)} ${dst}, ${this.operand(source)}`);
    }
    this.discard(source);
    return target;
  }
}
