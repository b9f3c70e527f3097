import type { BinaryOp } from '../frontend/token.js';

/** Size of a pointer, in bytes. */
export const WORD_SIZE = 8;

/**
 * Largest size in bytes of a variable, and of the variables of one scope together. Addresses
 * inside them must fit a signed 32-bit displacement.
 */
export const MAX_OBJECT_SIZE = 0x7fffffff;

export type BuiltinName = 'Byte' | 'Char' | 'Int' | 'Long';

export type Type =
  | { kind: 'Builtin'; name: BuiltinName }
  | { kind: 'Pointer'; base: Type }
  | { kind: 'Array'; base: Type; count: number };

const BUILTIN_SIZES: Record<BuiltinName, number> = {
  Byte: 1,
  Char: 1,
  Int: 4,
  Long: 8,
};

export const BUILTIN_NAMES: readonly BuiltinName[] = ['Byte', 'Char', 'Int', 'Long'];

export function builtin(name: BuiltinName): Type {
  return { kind: 'Builtin', name };
}

export function pointerTo(base: Type): Type {
  return { kind: 'Pointer', base };
}

export function arrayOf(base: Type, count: number): Type {
  return { kind: 'Array', base, count };
}

export function typeSize(t: Type): number {
  switch (t.kind) {
    case 'Builtin':
      return BUILTIN_SIZES[t.name];
    case 'Pointer':
      return WORD_SIZE;
    case 'Array':
      return t.count * typeSize(t.base);
  }
}

export function typeEquals(a: Type, b: Type): boolean {
  switch (a.kind) {
    case 'Builtin':
      return b.kind === 'Builtin' && a.name === b.name;
    case 'Pointer':
      return b.kind === 'Pointer' && typeEquals(a.base, b.base);
    case 'Array':
      return b.kind === 'Array' && a.count === b.count && typeEquals(a.base, b.base);
  }
}

/**
 * Source-level spelling of a type, for diagnostics (`Int`, `Char*`, `Long[4]`).
 */
export function typeToString(t: Type): string {
  switch (t.kind) {
    case 'Builtin':
      return t.name;
    case 'Pointer':
      return `${typeToString(t.base)}*`;
    case 'Array':
      return `${typeToString(t.base)}[${t.count}]`;
  }
}

/** Can values of `t` be indexed? */
export function indexes(t: Type): boolean {
  return t.kind === 'Pointer' || t.kind === 'Array';
}

/** Can `t` be used to index a pointer or array? */
export function isIndex(t: Type): boolean {
  return t.kind === 'Builtin';
}

/** Can values of `t` be indexed with a value of type `index`? */
export function indexesWith(t: Type, index: Type): boolean {
  return indexes(t) && isIndex(index);
}

/** Does `t` support the binary operator `op` at all? */
export function supports(t: Type, op: BinaryOp): boolean {
  switch (t.kind) {
    case 'Builtin':
      return true;
    case 'Pointer':
      return op === '+' || op === '-';
    case 'Array':
      return false;
  }
}

/** Does `t` support `op` with a right-hand operand of type `other`? */
export function supportsWith(t: Type, op: BinaryOp, other: Type): boolean {
  if (!supports(t, op)) return false;
  switch (t.kind) {
    case 'Builtin':
      // Integer kinds mix freely; the narrower side is widened.
      return other.kind === 'Builtin';
    case 'Pointer':
      if (other.kind === 'Pointer') return typeEquals(t.base, other.base);
      return other.kind === 'Builtin';
    case 'Array':
      return false;
  }
}

/**
 * The scalar type an array (of arrays) ultimately holds.
 */
export function innermostElement(t: Type): Type {
  return t.kind === 'Array' ? innermostElement(t.base) : t;
}
