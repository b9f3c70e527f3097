import { InternalError } from '../diagnostics/errors.js';
import type { Reg } from '../lowering/registers.js';
import type { Type } from './types.js';

export type MemBase = { kind: 'Label'; name: string } | { kind: 'Reg'; reg: Reg };

/** A compile-time constant. */
export interface ConstItem {
  kind: 'Const';
  type: Type;
  value: bigint;
}

/** A value held in a register. */
export interface RegItem {
  kind: 'Reg';
  type: Type;
  reg: Reg;
}

/**
 * A memory operand `[base*multiplier+offset]`.
 *
 * `offset` is either a displacement or a second register. `holds` lists the pool registers the
 * addressing mode keeps alive; they are released together with the item.
 */
export interface MemItem {
  kind: 'Mem';
  type: Type;
  base: MemBase;
  multiplier: number;
  offset: number | Reg;
  holds: Reg[];
}

/** The lack of a value, e.g. the result of `write_eln`. */
export interface VoidItem {
  kind: 'Void';
}

export type Item = ConstItem | RegItem | MemItem | VoidItem;

/** An item that carries a type. */
export type ValueItem = Exclude<Item, VoidItem>;

export function constItem(type: Type, value: bigint): ConstItem {
  return { kind: 'Const', type, value };
}

export function regItem(reg: Reg, type: Type): RegItem {
  return { kind: 'Reg', type, reg };
}

export function memItem(
  base: MemBase,
  type: Type,
  opts: { multiplier?: number; offset?: number | Reg; holds?: Reg[] } = {},
): MemItem {
  return {
    kind: 'Mem',
    type,
    base,
    multiplier: opts.multiplier ?? 1,
    offset: opts.offset ?? 0,
    holds: opts.holds ?? [],
  };
}

export const VOID: VoidItem = { kind: 'Void' };

/** Only memory locations have an address. */
export function isAddressable(item: Item): item is MemItem {
  return item.kind === 'Mem';
}

/**
 * Shallow copy of `item` with a new type; storage is unchanged.
 */
export function retype<T extends ValueItem>(item: T, type: Type): T;
export function retype(item: Item, type: Type): ValueItem;
export function retype(item: Item, type: Type): ValueItem {
  if (item.kind === 'Void') throw new InternalError('called retype on a void item');
  return { ...item, type };
}

/**
 * Pool registers an item keeps alive.
 */
export function heldRegisters(item: Item): Reg[] {
  switch (item.kind) {
    case 'Reg':
      return [item.reg];
    case 'Mem':
      return item.holds;
    case 'Const':
    case 'Void':
      return [];
  }
}
