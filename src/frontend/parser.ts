import type { DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { InternalError, errorAt } from '../diagnostics/errors.js';
import { X64Generator, isReservedLabel } from '../lowering/codegen.js';
import { AsmWriter } from '../lowering/writer.js';
import type { ConstItem, Item, MemItem, ValueItem } from '../semantics/items.js';
import { constItem, isAddressable } from '../semantics/items.js';
import type { Procedure, TypeEntity, Variable } from '../semantics/scope.js';
import { ScopeStack } from '../semantics/scope.js';
import type { Type } from '../semantics/types.js';
import {
  MAX_OBJECT_SIZE,
  arrayOf,
  indexes,
  indexesWith,
  pointerTo,
  supports,
  supportsWith,
  typeEquals,
  typeSize,
  typeToString,
} from '../semantics/types.js';
import { Lexer } from './lexer.js';
import type { SourceFile } from './source.js';
import type { BinaryOp, Token, TokenKind } from './token.js';
import { binaryOpOf, describeKind, isUnaryOp, precedence } from './token.js';

/** Largest element count accepted for an array type. */
const MAX_ARRAY_COUNT = 0x7fffffffn;

/**
 * Reduce `value` to what a `type`-sized unsigned machine integer holds.
 */
function wrap(value: bigint, type: Type): bigint {
  return BigInt.asUintN(typeSize(type) * 8, value);
}

/**
 * Single-pass parser for Tern: recognises each construct and immediately lowers it through the
 * {@link X64Generator}. There is no AST.
 */
export class Parser {
  readonly out = new AsmWriter();
  readonly gen = new X64Generator(this.out);
  private readonly lexer: Lexer;
  private token: Token;

  constructor(
    file: SourceFile,
    readonly scopes: ScopeStack = new ScopeStack(),
  ) {
    this.lexer = new Lexer(file);
    this.token = this.lexer.next();
  }

  private next(): void {
    this.token = this.lexer.next();
  }

  /** The kind of the current token, read afresh after {@link next} moves on. */
  private currentKind(): TokenKind {
    return this.token.kind;
  }

  private error(id: DiagnosticId, message: string, at: Token = this.token): never {
    throw errorAt(id, at, message);
  }

  /** Fail unless the current token is a `kind`. */
  private expect(kind: TokenKind): Token {
    if (this.token.kind !== kind) {
      this.error(
        DiagnosticIds.ParseError,
        `Expected ${describeKind(kind)}, got ${describeKind(this.token.kind)}.`,
      );
    }
    return this.token;
  }

  private lookupVariable(name: string, at: Token): Variable {
    const entity = this.scopes.lookup(name);
    if (!entity) this.error(DiagnosticIds.NameError, `Undeclared identifier "${name}".`, at);
    if (entity.kind !== 'Variable') {
      this.error(DiagnosticIds.NameError, `"${name}" is not a variable.`, at);
    }
    return entity;
  }

  private lookupType(name: string, at: Token): TypeEntity {
    const entity = this.scopes.lookup(name);
    if (!entity) this.error(DiagnosticIds.NameError, `Undeclared type "${name}".`, at);
    if (entity.kind !== 'Type') this.error(DiagnosticIds.NameError, `"${name}" is not a type.`, at);
    return entity;
  }

  private lookupProcedure(name: string, at: Token): Procedure {
    const entity = this.scopes.lookup(name);
    if (!entity) this.error(DiagnosticIds.NameError, `Undeclared procedure "${name}".`, at);
    if (entity.kind !== 'Procedure') {
      this.error(DiagnosticIds.NameError, `"${name}" is not a procedure.`, at);
    }
    return entity;
  }

  private variableItem(v: Variable, at: Token): MemItem {
    if (!v.storage) {
      this.error(
        DiagnosticIds.NameError,
        `Variable "${v.name}" cannot be used inside its own declaration list.`,
        at,
      );
    }
    return this.gen.variable(v);
  }

  /**
   * Evaluate a binary operation on two constants.
   */
  private fold(lhs: ConstItem, rhs: ConstItem, op: BinaryOp, at: Token): ConstItem {
    const type = typeSize(rhs.type) > typeSize(lhs.type) ? rhs.type : lhs.type;
    const l = wrap(lhs.value, type);
    const r = wrap(rhs.value, type);
    const shiftMask = typeSize(type) === 8 ? 63n : 31n;
    let value: bigint;
    switch (op) {
      case '+':
        value = l + r;
        break;
      case '-':
        value = l - r;
        break;
      case '*':
        value = l * r;
        break;
      case '/':
      case '%':
        if (r === 0n) {
          this.error(DiagnosticIds.ConstEvalError, 'Division by zero in constant expression.', at);
        }
        value = op === '/' ? l / r : l % r;
        break;
      case '<<':
        value = l << (r & shiftMask);
        break;
      case '>>':
        value = l >> (r & shiftMask);
        break;
    }
    return constItem(type, wrap(value, type));
  }

  /**
   * Parse a type: a type name followed by any number of `[count]` and `*` suffixes.
   */
  parseDeclaredType(): Type {
    const nameTok = this.expect('Identifier');
    let type = this.lookupType(nameTok.lexeme, nameTok).type;
    this.next();
    for (;;) {
      if (this.token.kind === 'LBracket') {
        this.next();
        if (this.currentKind() === 'RBracket') {
          this.error(DiagnosticIds.ConstEvalError, 'Variable-length arrays are not supported.');
        }
        const sizeTok = this.token;
        const size = this.parseExpr();
        if (size.kind !== 'Const') {
          this.error(DiagnosticIds.ConstEvalError, 'Array size must be constant.', sizeTok);
        }
        if (size.value === 0n || size.value > MAX_ARRAY_COUNT) {
          this.error(
            DiagnosticIds.ConstEvalError,
            `Array size must be between 1 and ${MAX_ARRAY_COUNT}, got ${size.value}.`,
            sizeTok,
          );
        }
        this.expect('RBracket');
        this.next();
        const array = arrayOf(type, Number(size.value));
        if (size.value * BigInt(typeSize(type)) > BigInt(MAX_OBJECT_SIZE)) {
          this.error(
            DiagnosticIds.ConstEvalError,
            `Type ${typeToString(array)} is larger than ${MAX_OBJECT_SIZE} bytes.`,
            sizeTok,
          );
        }
        type = array;
      } else if (this.token.kind === 'Star') {
        this.next();
        type = pointerTo(type);
      } else {
        return type;
      }
    }
  }

  /**
   * Parse `var` followed by a comma-separated declaration list, then lay the variables out.
   */
  parseVarDecls(): void {
    this.next();
    const vars: Variable[] = [];
    let bytes = this.scopes.isGlobal ? 0 : this.gen.frameSize;
    for (;;) {
      let exported = false;
      if (this.token.kind === 'Export') {
        if (!this.scopes.isGlobal) {
          this.error(DiagnosticIds.ParseError, 'Cannot export a non-global variable.');
        }
        this.next();
        exported = true;
      }
      const nameTok = this.expect('Identifier');
      if (exported && isReservedLabel(nameTok.lexeme)) {
        this.error(
          DiagnosticIds.NameError,
          `Cannot export "${nameTok.lexeme}": the name is reserved in assembly output.`,
        );
      }
      this.next();
      this.expect('Colon');
      this.next();
      const type = this.parseDeclaredType();
      const v: Variable = { kind: 'Variable', name: nameTok.lexeme, type, exported };
      if (!this.scopes.declare(v)) {
        this.error(
          DiagnosticIds.NameError,
          `"${v.name}" is already declared in this scope.`,
          nameTok,
        );
      }
      bytes += typeSize(type);
      if (bytes > MAX_OBJECT_SIZE) {
        this.error(
          DiagnosticIds.ConstEvalError,
          `Variables of this scope take more than ${MAX_OBJECT_SIZE} bytes.`,
          nameTok,
        );
      }
      vars.push(v);
      if (this.token.kind !== 'Comma') break;
      this.next();
    }
    if (this.scopes.isGlobal) {
      this.gen.emitGlobals(vars);
    } else {
      this.gen.emitLocals(vars);
    }
  }

  private parseIntLiteral(): ConstItem {
    const tok = this.token;
    this.next();
    const long = tok.lexeme.endsWith('l') || tok.lexeme.endsWith('L');
    const type = this.scopes.builtinType(long ? 'Long' : 'Int');
    const value = BigInt(long ? tok.lexeme.slice(0, -1) : tok.lexeme);
    if (value !== wrap(value, type)) {
      this.error(
        DiagnosticIds.ConstEvalError,
        `Integer literal ${value} does not fit in ${typeToString(type)}.`,
        tok,
      );
    }
    return constItem(type, value);
  }

  /**
   * Parse a call; parentheses are optional when there are no arguments.
   */
  private parseCall(name: string, at: Token): Item {
    const proc = this.lookupProcedure(name, at);
    const args: ValueItem[] = [];
    if (this.token.kind === 'LParen') {
      this.next();
      if (this.currentKind() !== 'RParen') {
        for (;;) {
          args.push(this.parseExpr());
          if (this.currentKind() !== 'Comma') break;
          this.next();
        }
      }
      this.expect('RParen');
      this.next();
    }
    if (args.length !== proc.params.length) {
      this.error(
        DiagnosticIds.TypeError,
        `Procedure "${name}" expects ${proc.params.length} argument(s), got ${args.length}.`,
        at,
      );
    }
    proc.params.forEach((want, i) => {
      const got = args[i];
      if (got && !typeEquals(got.type, want)) {
        this.error(
          DiagnosticIds.TypeError,
          `Argument ${i + 1} to "${name}" expected ${typeToString(want)}, got ${typeToString(got.type)}.`,
          at,
        );
      }
    });
    return this.gen.call(proc, args);
  }

  /**
   * Parse one or more `[index]` suffixes applied to the variable `name`.
   */
  private parseIndex(name: string, at: Token): MemItem {
    let item = this.variableItem(this.lookupVariable(name, at), at);
    while (this.token.kind === 'LBracket') {
      if (!indexes(item.type)) {
        this.error(
          DiagnosticIds.TypeError,
          `Type ${typeToString(item.type)} does not support indexing.`,
        );
      }
      this.next();
      const index = this.parseExpr();
      if (!indexesWith(item.type, index.type)) {
        this.error(
          DiagnosticIds.TypeError,
          `Type ${typeToString(item.type)} cannot be indexed with ${typeToString(index.type)}.`,
          at,
        );
      }
      this.expect('RBracket');
      this.next();
      item = this.gen.index(item, index);
    }
    return item;
  }

  private parseAssignment(target: MemItem): MemItem {
    const assignTok = this.token;
    if (target.type.kind === 'Array') {
      this.error(
        DiagnosticIds.TypeError,
        `Cannot assign to a value of array type ${typeToString(target.type)}.`,
      );
    }
    this.next();
    const expr = this.parseExpr();
    if (!typeEquals(target.type, expr.type)) {
      this.error(
        DiagnosticIds.TypeError,
        `Incompatible types ${typeToString(target.type)} and ${typeToString(expr.type)} in assignment.`,
        assignTok,
      );
    }
    return this.gen.assign(target, expr);
  }

  /**
   * Parse an identifier-led construct: assignment, call, index, or (when `bare`) a plain reference.
   */
  private parseIdentifier(bare: boolean): Item {
    const idTok = this.token;
    const name = idTok.lexeme;
    this.next();
    switch (this.token.kind) {
      case 'Assign':
        return this.parseAssignment(this.variableItem(this.lookupVariable(name, idTok), idTok));
      case 'LParen':
        return this.parseCall(name, idTok);
      case 'LBracket': {
        const element = this.parseIndex(name, idTok);
        if (this.currentKind() === 'Assign') return this.parseAssignment(element);
        if (!bare) this.error(DiagnosticIds.ParseError, 'Expected assignment or call.', idTok);
        return element;
      }
      default: {
        if (this.scopes.lookup(name)?.kind === 'Procedure') return this.parseCall(name, idTok);
        if (!bare) this.error(DiagnosticIds.ParseError, 'Expected assignment or call.', idTok);
        return this.variableItem(this.lookupVariable(name, idTok), idTok);
      }
    }
  }

  private parseUnary(): Item {
    const opTok = this.token;
    this.next();
    const { item } = this.parsePrimary();
    if (opTok.kind === 'Amp') {
      if (!isAddressable(item)) {
        this.error(DiagnosticIds.TypeError, 'Expression is not addressable.', opTok);
      }
      return this.gen.addressOf(item);
    }
    if (item.kind === 'Void') {
      this.error(DiagnosticIds.TypeError, 'Cannot use a void value as an expression.', opTok);
    }
    if (item.type.kind !== 'Builtin') {
      this.error(
        DiagnosticIds.TypeError,
        `Cannot negate a value of type ${typeToString(item.type)}.`,
        opTok,
      );
    }
    if (item.kind === 'Const') return constItem(item.type, wrap(-item.value, item.type));
    return this.gen.negate(item);
  }

  /**
   * Parse a primary expression. Also returns its first token so diagnostics can point at it.
   */
  private parsePrimary(): { start: Token; item: Item } {
    const start = this.token;
    switch (start.kind) {
      case 'Integer':
        return { start, item: this.parseIntLiteral() };
      case 'Char':
        this.next();
        return {
          start,
          item: constItem(this.scopes.builtinType('Char'), BigInt(start.lexeme.charCodeAt(0))),
        };
      case 'Identifier':
        return { start, item: this.parseIdentifier(true) };
      case 'LParen': {
        this.next();
        const item = this.parseExpr();
        this.expect('RParen');
        this.next();
        return { start, item };
      }
      default:
        if (isUnaryOp(start.kind)) return { start, item: this.parseUnary() };
        return this.error(
          DiagnosticIds.ParseError,
          `Expected expression, got ${describeKind(start.kind)}.`,
        );
    }
  }

  /**
   * Parse an expression by precedence climbing, folding constant subexpressions as it goes.
   *
   * Operators binding at least as tightly as `minPrec` are consumed here; each right-hand side is
   * parsed with a threshold one above its operator, so equal-precedence chains group to the left.
   */
  parseExpr(minPrec = 0): ValueItem {
    const { start, item } = this.parsePrimary();
    if (item.kind === 'Void') {
      this.error(DiagnosticIds.TypeError, 'Cannot use a void value as an expression.', start);
    }
    let res: ValueItem = item;

    if (this.token.kind === 'As') {
      const asTok = this.token;
      this.next();
      const type = this.parseDeclaredType();
      if (type.kind === 'Array' || res.type.kind === 'Array') {
        this.error(
          DiagnosticIds.TypeError,
          `Cannot cast ${typeToString(res.type)} to ${typeToString(type)}.`,
          asTok,
        );
      }
      res = res.kind === 'Const' ? constItem(type, wrap(res.value, type)) : this.gen.cast(res, type);
    }

    for (;;) {
      const op = binaryOpOf(this.token.kind);
      if (op === undefined) break;
      const prec = precedence(op);
      if (prec < minPrec) break;
      const opTok = this.token;
      this.next();
      let rhs = this.parseExpr(prec + 1);
      if (!supports(res.type, op)) {
        this.error(
          DiagnosticIds.TypeError,
          `Type ${typeToString(res.type)} does not support operator "${op}".`,
          opTok,
        );
      }
      if (!supportsWith(res.type, op, rhs.type)) {
        this.error(
          DiagnosticIds.TypeError,
          `Incompatible types ${typeToString(res.type)} and ${typeToString(rhs.type)} in binary operation.`,
          opTok,
        );
      }
      if (res.kind === 'Const' && rhs.kind === 'Const') {
        res = this.fold(res, rhs, op, opTok);
        continue;
      }
      if (!typeEquals(res.type, rhs.type)) [res, rhs] = this.gen.equalize(res, rhs);
      res = this.gen.binary(res, rhs, op);
    }
    return res;
  }

  /**
   * Parse statements up to (not including) `end`. Each statement must leave the register set as
   * it found it.
   */
  parseBlock(): void {
    while (this.token.kind !== 'End') {
      if (this.token.kind !== 'Identifier') {
        this.error(
          DiagnosticIds.ParseError,
          this.token.kind === 'EOF'
            ? `Expected ${describeKind('End')}, got ${describeKind('EOF')}.`
            : `Expected statement, got ${describeKind(this.token.kind)}.`,
        );
      }
      const line = this.token.line;
      const before = this.gen.regs.inUse().join(',');
      this.gen.discard(this.parseIdentifier(false));
      const after = this.gen.regs.inUse().join(',');
      if (after !== before) {
        throw new InternalError(`statement on line ${line} leaked registers: {${after}}`);
      }
    }
  }

  /**
   * Parse and compile a whole program. Returns the generated assembly lines.
   */
  parseProgram(): readonly string[] {
    this.gen.prologue();
    this.gen.dataSection();
    if (this.token.kind === 'Var') this.parseVarDecls();
    this.gen.textSection();

    this.expect('Begin');
    this.next();
    this.scopes.push();
    this.gen.enterMain();
    if (this.token.kind === 'Var') this.parseVarDecls();
    this.parseBlock();
    this.expect('End');
    this.gen.leaveMain();
    this.scopes.pop();

    this.next();
    if (this.token.kind !== 'EOF') {
      this.error(
        DiagnosticIds.ParseError,
        `Expected ${describeKind('EOF')}, got ${describeKind(this.token.kind)}.`,
      );
    }
    return this.out.lines;
  }
}

/**
 * Compile `file` to assembly lines. Throws `CompileError` or `InternalError` on failure.
 */
export function compileToLines(file: SourceFile): readonly string[] {
  return new Parser(file).parseProgram();
}
