/**
 * Recursive-descent parser for Logo source text.
 *
 * Each production is tried at a saved cursor position and rewinds on
 * failure, so alternatives are attempted in a fixed order: keyword commands
 * first, then bare expressions, and procedure calls last because their
 * syntax would otherwise swallow every keyword.
 *
 * Once an opening `[` or a `TO` header has been consumed the parser commits:
 * failures inside are reported with a span instead of rewinding.
 */

import {
  AssignTarget,
  Command,
  Expression,
  Operator,
  ParameterDecl,
  Program,
  QueryName,
  UnaryCommandName,
  binaryExpr,
  formatExpression,
  queryExpr,
  valueExpr,
} from './ast';
import { LogoInvalidArgumentError, LogoParseError, ParseErrorCode } from './errors';
import { LogoValue, mkBool, mkNumber, mkString, mkVariable, parseInt32 } from './values';

const IDENT_CHAR = /[\p{L}\p{N}_]/u;
const WORD_CHAR = /[\p{L}\p{N}_-]/u;
const NUMBER = /-?\d+/y;

const UNARY_COMMANDS: readonly UnaryCommandName[] = [
  'FORWARD',
  'BACK',
  'LEFT',
  'RIGHT',
  'SETPENCOLOR',
  'TURN',
  'SETHEADING',
  'SETX',
  'SETY',
];

const SYMBOL_OPERATORS: readonly Operator[] = ['+', '-', '*', '/'];
const WORD_OPERATORS: readonly Operator[] = ['EQ', 'NE', 'GT', 'LT', 'AND', 'OR'];
const QUERIES: readonly QueryName[] = ['XCOR', 'YCOR', 'HEADING', 'COLOR'];

/**
 * Parse a whole program. Whitespace-only input is an empty program.
 * Throws LogoParseError, or LogoInvalidArgumentError for a fixed-arity
 * command given too many arguments.
 */
export function parse(source: string): Program {
  if (source.trim() === '') {
    return { commands: [] };
  }
  return new Parser(source).parseProgram();
}

class Parser {
  private readonly source: string;
  private pos = 0;

  constructor(source: string) {
    this.source = source;
  }

  parseProgram(): Program {
    const commands: Command[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.atEnd()) break;
      const start = this.pos;
      const command = this.parseCommand();
      if (command === null) {
        throw this.error(start, this.source.length, `unexpected input '${this.snippet(start)}'`);
      }
      commands.push(command);
    }
    return { commands };
  }

  // ==================================================================
  // Cursor helpers
  // ==================================================================

  private atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    return this.source.charAt(this.pos);
  }

  private startsWith(text: string): boolean {
    return this.source.startsWith(text, this.pos);
  }

  /** Run a production, rewinding the cursor if it yields null. */
  private attempt<T>(production: () => T | null): T | null {
    const saved = this.pos;
    const result = production();
    if (result === null) this.pos = saved;
    return result;
  }

  private takeWhile(pattern: RegExp): string {
    const start = this.pos;
    while (!this.atEnd() && pattern.test(this.peek())) this.pos++;
    return this.source.slice(start, this.pos);
  }

  /** Match a keyword that is not immediately followed by an identifier character. */
  private matchWord(word: string): boolean {
    if (!this.startsWith(word)) return false;
    const next = this.source.charAt(this.pos + word.length);
    if (next !== '' && IDENT_CHAR.test(next)) return false;
    this.pos += word.length;
    return true;
  }

  /** Skip whitespace and `//` comments. */
  private skipTrivia(): void {
    while (!this.atEnd()) {
      if (/\s/.test(this.peek())) {
        this.pos++;
      } else if (this.startsWith('//')) {
        const eol = this.source.indexOf('\n', this.pos);
        this.pos = eol === -1 ? this.source.length : eol + 1;
      } else {
        return;
      }
    }
  }

  /** Like skipTrivia, but at least one character must be skipped. */
  private skipSeparator(): boolean {
    const start = this.pos;
    this.skipTrivia();
    return this.pos > start;
  }

  // ==================================================================
  // Values & expressions
  // ==================================================================

  private parseValue(): LogoValue | null {
    const ch = this.peek();

    if (ch === '"') {
      this.pos++;
      const text = this.takeWhile(WORD_CHAR);
      return text.length > 0 ? mkString(text) : null;
    }

    if (ch === '-' || (ch >= '0' && ch <= '9')) {
      NUMBER.lastIndex = this.pos;
      const match = NUMBER.exec(this.source);
      if (match === null) return null;
      this.pos += match[0].length;
      if (IDENT_CHAR.test(this.peek())) return null;
      const n = parseInt32(match[0]);
      return n === null ? null : mkNumber(n);
    }

    if (ch === ':') {
      this.pos++;
      const name = this.takeWhile(IDENT_CHAR);
      return name.length > 0 ? mkVariable(name) : null;
    }

    if (this.matchWord('TRUE')) return mkBool(true);
    if (this.matchWord('FALSE')) return mkBool(false);
    return null;
  }

  private parseOperator(): Operator | null {
    const ch = this.peek();
    for (const op of SYMBOL_OPERATORS) {
      if (ch === op) {
        this.pos++;
        return op;
      }
    }
    for (const op of WORD_OPERATORS) {
      if (this.matchWord(op)) return op;
    }
    return null;
  }

  private parseBinary(): Expression | null {
    const op = this.parseOperator();
    if (op === null || !this.skipSeparator()) return null;
    const left = this.parseExpression();
    if (left === null || !this.skipSeparator()) return null;
    const right = this.parseExpression();
    return right === null ? null : binaryExpr(op, left, right);
  }

  private parseQuery(): Expression | null {
    for (const name of QUERIES) {
      if (this.matchWord(name)) return queryExpr(name);
    }
    return null;
  }

  private parseExpression(): Expression | null {
    const value = this.attempt(() => this.parseValue());
    if (value !== null) return valueExpr(value);
    return this.attempt(() => this.parseBinary()) ?? this.attempt(() => this.parseQuery());
  }

  /** An expression separated from what precedes it, or nothing (cursor untouched). */
  private parseSeparatedExpression(): Expression | null {
    return this.attempt(() => (this.skipSeparator() ? this.parseExpression() : null));
  }

  // ==================================================================
  // Commands
  // ==================================================================

  private parseCommand(): Command | null {
    const start = this.pos;
    if (this.matchWord('END')) {
      const line = this.source.slice(0, start).split('\n').length;
      throw this.error(
        start,
        this.pos,
        `Found 'END' on line ${line} without a matching 'TO' procedure definition`,
        'unmatched-end',
      );
    }
    return this.attempt(() => this.parseProcedureDefinition()) ?? this.parseRegularCommand();
  }

  private parseRegularCommand(): Command | null {
    return (
      this.attempt(() => this.parsePen()) ??
      this.attempt(() => this.parseUnary()) ??
      this.attempt(() => this.parseMake()) ??
      this.attempt(() => this.parseAddAssign()) ??
      this.attempt(() => this.parseConditional('IF')) ??
      this.attempt(() => this.parseConditional('WHILE')) ??
      this.attempt(() => this.parseExpressionStatement()) ??
      this.attempt(() => this.parseProcedureCall())
    );
  }

  private rejectExtraArgument(command: string, expected: string): void {
    const extra = this.parseSeparatedExpression();
    if (extra !== null) {
      throw new LogoInvalidArgumentError(command, formatExpression(extra), expected);
    }
  }

  private parsePen(): Command | null {
    for (const [word, down] of [['PENUP', false], ['PENDOWN', true]] as const) {
      if (this.matchWord(word)) {
        this.rejectExtraArgument(word, 'no arguments');
        return { kind: 'pen', down };
      }
    }
    return null;
  }

  private parseUnary(): Command | null {
    for (const command of UNARY_COMMANDS) {
      const argument = this.attempt(() =>
        this.matchWord(command) && this.skipSeparator() ? this.parseExpression() : null,
      );
      if (argument !== null) {
        this.rejectExtraArgument(command, 'only one argument');
        return { kind: 'unary', command, argument };
      }
    }
    return null;
  }

  private parseMake(): Command | null {
    if (!this.matchWord('MAKE') || !this.skipSeparator()) return null;
    const name = this.parseExpression();
    if (name === null || !this.skipSeparator()) return null;
    const value = this.parseExpression();
    return value === null ? null : { kind: 'make', name, value };
  }

  private parseAddAssign(): Command | null {
    if (!this.matchWord('ADDASSIGN') || !this.skipSeparator()) return null;
    const prefix = this.peek();
    if (prefix !== '"' && prefix !== ':') return null;
    this.pos++;
    const name = this.takeWhile(IDENT_CHAR);
    if (name.length === 0 || !this.skipSeparator()) return null;
    const amount = this.parseExpression();
    if (amount === null) return null;
    this.rejectExtraArgument('ADDASSIGN', 'only two arguments');
    const target: AssignTarget = { name, indirect: prefix === ':' };
    return { kind: 'addAssign', target, amount };
  }

  private parseConditional(keyword: 'IF' | 'WHILE'): Command | null {
    if (!this.matchWord(keyword) || !this.skipSeparator()) return null;
    const condition = this.parseExpression();
    if (condition === null) return null;
    this.skipTrivia();
    const body = this.parseBlock();
    if (body === null) return null;
    return keyword === 'IF'
      ? { kind: 'if', condition, body }
      : { kind: 'while', condition, body };
  }

  /** `[ commands ]`, or null when the cursor is not at `[`. */
  private parseBlock(): Command[] | null {
    if (this.peek() !== '[') return null;
    const open = this.pos;
    this.pos++;
    const body: Command[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.peek() === ']') {
        this.pos++;
        return body;
      }
      if (this.atEnd()) {
        throw this.error(open, this.source.length, "Unterminated command block: expected ']'", 'unterminated-block');
      }
      const start = this.pos;
      const command = this.parseCommand();
      if (command === null) {
        throw this.error(start, this.source.length, `expected a command or ']' but found '${this.snippet(start)}'`);
      }
      body.push(command);
    }
  }

  private parseExpressionStatement(): Command | null {
    const expression = this.parseExpression();
    return expression === null ? null : { kind: 'expression', expression };
  }

  private parseProcedureCall(): Command | null {
    if (/\d/.test(this.peek())) return null;
    const name = this.takeWhile(IDENT_CHAR);
    if (name.length === 0 || name === 'TO' || name === 'END') return null;
    const args: Expression[] = [];
    for (let arg = this.parseSeparatedExpression(); arg !== null; arg = this.parseSeparatedExpression()) {
      args.push(arg);
    }
    return { kind: 'procedureCall', name, arguments: args };
  }

  // ==================================================================
  // Procedure definitions
  // ==================================================================

  private parseParameter(): ParameterDecl | null {
    const prefix = this.peek();
    if (prefix !== ':' && prefix !== '"') return null;
    this.pos++;
    const name = this.takeWhile(IDENT_CHAR);
    if (name.length === 0) return null;
    return { name, style: prefix === ':' ? 'variable' : 'literal' };
  }

  private parseProcedureDefinition(): Command | null {
    if (!this.matchWord('TO') || !this.skipSeparator()) return null;
    const name = this.takeWhile(IDENT_CHAR);
    if (name.length === 0) return null;

    const parameters: ParameterDecl[] = [];
    for (;;) {
      const param = this.attempt(() => {
        this.skipTrivia();
        return this.parseParameter();
      });
      if (param === null) break;
      parameters.push(param);
    }

    this.skipTrivia();
    const bodyStart = this.pos;
    const body: Command[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.matchWord('END')) {
        return { kind: 'procedureDefinition', name, parameters, body };
      }
      const step = this.parseBodyStep();
      if (step === null) {
        throw this.error(
          bodyStart,
          this.source.length,
          `Unterminated procedure definition '${name}': expected 'END' keyword after ${body.length} commands`,
          'unterminated-procedure',
        );
      }
      body.push(...step);
    }
  }

  /**
   * The next command of a TO body, or the commands of a bracketed block.
   * Null when the body cannot continue, including input that runs out
   * inside a block.
   */
  private parseBodyStep(): Command[] | null {
    try {
      const block = this.parseBlock();
      if (block !== null) return block;
      const command = this.atEnd() ? null : this.parseRegularCommand();
      return command === null ? null : [command];
    } catch (e) {
      if (e instanceof LogoParseError && e.code === 'unterminated-block') return null;
      throw e;
    }
  }

  // ==================================================================
  // Errors
  // ==================================================================

  private byteOffset(index: number): number {
    return Buffer.byteLength(this.source.slice(0, index), 'utf-8');
  }

  private error(start: number, end: number, reason: string, code: ParseErrorCode = 'syntax'): LogoParseError {
    const startByte = this.byteOffset(start);
    return new LogoParseError(
      this.source,
      { start: startByte, length: this.byteOffset(end) - startByte },
      reason,
      code,
    );
  }

  private snippet(start: number): string {
    const line = this.source.slice(start).split('\n')[0].trimEnd();
    return line.length > 20 ? `${line.slice(0, 20)}...` : line;
  }
}
