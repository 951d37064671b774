/**
 * Error types for the Logo interpreter.
 *
 * Every failure is fatal to a run, so each class carries enough structured
 * data for the caller to render it without re-deriving context.
 */

export interface Span {
  /** Byte offset into the UTF-8 encoded source. */
  start: number;
  /** Length in bytes. */
  length: number;
}

export type LogoErrorKind =
  | 'ParseError'
  | 'InvalidArgument'
  | 'UndefinedVariable'
  | 'StackUnderflow'
  | 'DivisionByZero'
  | 'TypeMismatch'
  | 'Overflow'
  | 'UnexpectedValue'
  | 'DrawError'
  | 'ImageSaveError'
  | 'IOError';

export abstract class LogoError extends Error {
  abstract readonly kind: LogoErrorKind;

  constructor(message: string) {
    super(message);
    this.name = 'LogoError';
  }
}

export type ParseErrorCode =
  | 'syntax'
  | 'unmatched-end'
  | 'unterminated-procedure'
  | 'unterminated-block';

export class LogoParseError extends LogoError {
  readonly kind = 'ParseError';
  public readonly code: ParseErrorCode;
  public readonly source: string;
  public readonly span: Span;
  public readonly reason: string;
  /** 1-based line of the span start. */
  public readonly line: number;
  /** 1-based column (in characters) of the span start. */
  public readonly column: number;

  constructor(source: string, span: Span, reason: string, code: ParseErrorCode = 'syntax') {
    const prefix = Buffer.from(source, 'utf-8').subarray(0, span.start).toString('utf-8');
    const line = prefix.split('\n').length;
    const column = prefix.length - (prefix.lastIndexOf('\n') + 1) + 1;
    super(`ParseError [line ${line}, col ${column}]: ${reason}`);
    this.name = 'LogoParseError';
    this.code = code;
    this.source = source;
    this.span = span;
    this.reason = reason;
    this.line = line;
    this.column = column;
  }
}

export class LogoInvalidArgumentError extends LogoError {
  readonly kind = 'InvalidArgument';
  public readonly command: string;
  public readonly argument: string;
  public readonly expected: string;

  constructor(command: string, argument: string, expected: string) {
    super(`InvalidArgument: invalid argument for command '${command}': got '${argument}', expected ${expected}`);
    this.name = 'LogoInvalidArgumentError';
    this.command = command;
    this.argument = argument;
    this.expected = expected;
  }
}

export class LogoUndefinedVariableError extends LogoError {
  readonly kind = 'UndefinedVariable';
  public readonly variableName: string;
  public readonly definedVariables: string[];

  constructor(variableName: string, definedVariables: string[]) {
    super(`NameError: undefined variable '${variableName}'`);
    this.name = 'LogoUndefinedVariableError';
    this.variableName = variableName;
    this.definedVariables = definedVariables;
  }
}

export class LogoStackUnderflowError extends LogoError {
  readonly kind = 'StackUnderflow';

  constructor() {
    super('StackUnderflow: attempted to pop from an empty stack');
    this.name = 'LogoStackUnderflowError';
  }
}

export class LogoDivisionByZeroError extends LogoError {
  readonly kind = 'DivisionByZero';

  constructor() {
    super('DivisionByZero: division by zero');
    this.name = 'LogoDivisionByZeroError';
  }
}

export class LogoTypeMismatchError extends LogoError {
  readonly kind = 'TypeMismatch';

  constructor() {
    super('TypeMismatch: operation not supported for given types');
    this.name = 'LogoTypeMismatchError';
  }
}

export class LogoOverflowError extends LogoError {
  readonly kind = 'Overflow';

  constructor() {
    super('Overflow: arithmetic overflow occurred');
    this.name = 'LogoOverflowError';
  }
}

export class LogoUnexpectedValueError extends LogoError {
  readonly kind = 'UnexpectedValue';
  public readonly expected: string;
  public readonly got: string;

  constructor(expected: string, got: string) {
    super(`UnexpectedValue: expected ${expected}, but got ${got}`);
    this.name = 'LogoUnexpectedValueError';
    this.expected = expected;
    this.got = got;
  }
}

export class LogoDrawError extends LogoError {
  readonly kind = 'DrawError';
  public readonly reason: string;

  constructor(reason: string) {
    super(`DrawError: ${reason}`);
    this.name = 'LogoDrawError';
    this.reason = reason;
  }
}

export class LogoImageSaveError extends LogoError {
  readonly kind = 'ImageSaveError';
  public readonly reason: string;

  constructor(reason: string) {
    super(`ImageSaveError: ${reason}`);
    this.name = 'LogoImageSaveError';
    this.reason = reason;
  }
}

export class LogoIOError extends LogoError {
  readonly kind = 'IOError';
  public readonly path: string;
  public readonly reason: string;

  constructor(path: string, reason: string) {
    super(`IOError: ${path}: ${reason}`);
    this.name = 'LogoIOError';
    this.path = path;
    this.reason = reason;
  }
}
