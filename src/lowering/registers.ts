import { InternalError } from '../diagnostics/errors.js';
import type { AsmWriter } from './writer.js';

export type Reg =
  | 'rax'
  | 'rbx'
  | 'rcx'
  | 'rdx'
  | 'rsi'
  | 'rdi'
  | 'rsp'
  | 'rbp'
  | 'r8'
  | 'r9'
  | 'r10'
  | 'r11';

/**
 * Registers handed out for temporaries, in allocation order.
 */
export const REGISTER_POOL: readonly Reg[] = [
  'r8',
  'r9',
  'r10',
  'r11',
  'rdx',
  'rbx',
  'rcx',
  'rsi',
  'rdi',
];

// [byte, word, dword, qword]
const SUBREGISTERS: Record<Reg, readonly [string, string, string, string]> = {
  rax: ['al', 'ax', 'eax', 'rax'],
  rbx: ['bl', 'bx', 'ebx', 'rbx'],
  rcx: ['cl', 'cx', 'ecx', 'rcx'],
  rdx: ['dl', 'dx', 'edx', 'rdx'],
  rsi: ['sil', 'si', 'esi', 'rsi'],
  rdi: ['dil', 'di', 'edi', 'rdi'],
  rsp: ['spl', 'sp', 'esp', 'rsp'],
  rbp: ['bpl', 'bp', 'ebp', 'rbp'],
  r8: ['r8b', 'r8w', 'r8d', 'r8'],
  r9: ['r9b', 'r9w', 'r9d', 'r9'],
  r10: ['r10b', 'r10w', 'r10d', 'r10'],
  r11: ['r11b', 'r11w', 'r11d', 'r11'],
};

const REGISTER_NAMES: ReadonlySet<string> = new Set([
  ...Object.values(SUBREGISTERS).flat(),
  ...['r12', 'r13', 'r14', 'r15'].flatMap((r) => [r, `${r}b`, `${r}w`, `${r}d`]),
  'ah',
  'bh',
  'ch',
  'dh',
  'rip',
]);

/** Is `name` a general-purpose register name in any case (`rax`, `R8D`, `ah`)? */
export function isRegisterName(name: string): boolean {
  return REGISTER_NAMES.has(name.toLowerCase());
}

/**
 * Name of the `size`-byte view of `reg` (`regName('r8', 4)` is `r8d`).
 */
export function regName(reg: Reg, size: number): string {
  const views = SUBREGISTERS[reg];
  switch (size) {
    case 1:
      return views[0];
    case 2:
      return views[1];
    case 4:
      return views[2];
    case 8:
      return views[3];
    default:
      throw new InternalError(`invalid size ${size} given to regName`);
  }
}

/**
 * Allocator over {@link REGISTER_POOL}.
 *
 * There is no spilling: asking for more temporaries than the pool holds is an internal error,
 * which bounds how deeply an expression may nest.
 */
export class RegisterAllocator {
  private readonly used = new Set<Reg>();

  constructor(private readonly out: AsmWriter) {}

  acquire(): Reg {
    const reg = REGISTER_POOL.find((r) => !this.used.has(r));
    if (reg === undefined) {
      throw new InternalError(
        `register pool exhausted (${REGISTER_POOL.length} temporaries live); expression too complex`,
      );
    }
    this.used.add(reg);
    return reg;
  }

  release(...regs: Reg[]): void {
    for (const reg of regs) this.used.delete(reg);
  }

  isUsed(reg: Reg): boolean {
    return this.used.has(reg);
  }

  /** Registers currently holding live values, in pool order. */
  inUse(): Reg[] {
    return [...this.used].sort((a, b) => REGISTER_POOL.indexOf(a) - REGISTER_POOL.indexOf(b));
  }

  /**
   * Run `body` with a scratch register that is released however `body` exits.
   */
  withTemporary<T>(body: (reg: Reg) => T): T {
    const reg = this.acquire();
    try {
      return body(reg);
    } finally {
      this.release(reg);
    }
  }

  /**
   * Run `body` with exclusive use of `regs`.
   *
   * Live registers among `regs` are pushed before and popped (in reverse order) after; free ones are
   * kept out of {@link acquire} until `body` returns.
   */
  reserveFor<T>(regs: readonly Reg[], body: () => T): T {
    const saved = regs.filter((r) => this.used.has(r));
    const blocked = regs.filter((r) => !this.used.has(r));
    for (const reg of saved) this.out.instr(`push ${reg}`);
    for (const reg of blocked) this.used.add(reg);
    const result = body();
    for (const reg of blocked) this.used.delete(reg);
    for (const reg of [...saved].reverse()) this.out.instr(`pop ${reg}`);
    return result;
  }
}
