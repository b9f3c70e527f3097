import { InternalError } from '../diagnostics/errors.js';
import type { BuiltinName, Type } from './types.js';
import { BUILTIN_NAMES, builtin } from './types.js';

/**
 * Where a variable lives, fixed once its declaration has been emitted.
 *
 * Globals sit at their data label; locals at `[rbp-offset]`.
 */
export type Storage =
  | { global: true; label: string; size: number }
  | { global: false; offset: number; size: number };

export interface Variable {
  kind: 'Variable';
  name: string;
  type: Type;
  exported: boolean;
  storage?: Storage;
}

export interface TypeEntity {
  kind: 'Type';
  name: string;
  type: Type;
}

export type BuiltinProcName = 'WriteEln' | 'DigitToInt';

export interface Procedure {
  kind: 'Procedure';
  name: string;
  builtin: BuiltinProcName;
  returns?: Type;
  params: Type[];
}

export type Entity = Variable | TypeEntity | Procedure;

/**
 * Names visible in the global scope before any declaration.
 */
export function builtinEntities(): Entity[] {
  const types = BUILTIN_NAMES.map((name): TypeEntity => ({
    kind: 'Type',
    name,
    type: builtin(name),
  }));
  return [
    ...types,
    { kind: 'Procedure', name: 'write_eln', builtin: 'WriteEln', params: [] },
    {
      kind: 'Procedure',
      name: 'd2i',
      builtin: 'DigitToInt',
      returns: builtin('Byte'),
      params: [builtin('Char')],
    },
  ];
}

/**
 * Stack of lexical scopes, global first. The global scope is never popped.
 */
export class ScopeStack {
  private readonly scopes: Map<string, Entity>[];

  constructor(globals: Entity[] = builtinEntities()) {
    this.scopes = [new Map(globals.map((e) => [e.name, e]))];
  }

  get depth(): number {
    return this.scopes.length;
  }

  get isGlobal(): boolean {
    return this.scopes.length === 1;
  }

  push(): void {
    this.scopes.push(new Map());
  }

  pop(): void {
    if (this.scopes.length === 1) throw new InternalError('attempted to pop the global scope');
    this.scopes.pop();
  }

  /**
   * Add `entity` to the innermost scope. Returns false if the name is already declared there.
   */
  declare(entity: Entity): boolean {
    const scope = this.scopes[this.scopes.length - 1];
    if (!scope) throw new InternalError('scope stack is empty');
    if (scope.has(entity.name)) return false;
    scope.set(entity.name, entity);
    return true;
  }

  lookup(name: string): Entity | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const found = this.scopes[i]?.get(name);
      if (found) return found;
    }
    return undefined;
  }

  builtinType(name: BuiltinName): Type {
    const entity = this.scopes[0]?.get(name);
    if (entity?.kind !== 'Type') throw new InternalError(`builtin type ${name} is not declared`);
    return entity.type;
  }
}
