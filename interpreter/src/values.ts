/**
 * Runtime value representations for the Logo interpreter.
 *
 * Numbers are signed 32-bit integers; arithmetic helpers here refuse to
 * wrap and raise LogoOverflowError instead.
 */

import {
  LogoDivisionByZeroError,
  LogoOverflowError,
  LogoTypeMismatchError,
  LogoUnexpectedValueError,
} from './errors';

export type LogoValue =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'variable'; name: string }
  | { kind: 'bool'; value: boolean };

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

// ---- Value constructors ----

export function mkNumber(value: number): LogoValue {
  return { kind: 'number', value };
}

export function mkString(value: string): LogoValue {
  return { kind: 'string', value };
}

export function mkVariable(name: string): LogoValue {
  return { kind: 'variable', name };
}

export function mkBool(value: boolean): LogoValue {
  return { kind: 'bool', value };
}

// ---- Integer helpers ----

export function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= INT32_MIN && n <= INT32_MAX;
}

/**
 * Parse base-10 text as a signed 32-bit integer. Accepts an optional
 * leading sign and nothing but digits after it.
 */
export function parseInt32(text: string): number | null {
  if (!/^[+-]?\d+$/.test(text)) return null;
  const n = Number(text);
  return isInt32(n) ? n + 0 : null;
}

function checked(n: number): number {
  if (!isInt32(n)) throw new LogoOverflowError();
  // normalises -0
  return n | 0;
}

export function checkedAdd(a: number, b: number): number {
  return checked(a + b);
}

export function checkedSub(a: number, b: number): number {
  return checked(a - b);
}

export function checkedMul(a: number, b: number): number {
  // Any product too large to be exact is far outside the int32 range anyway.
  return checked(a * b);
}

export function checkedDiv(a: number, b: number): number {
  if (b === 0) throw new LogoDivisionByZeroError();
  return checked(Math.trunc(a / b));
}

// ---- Coercions ----

export function toInt(v: LogoValue): number {
  switch (v.kind) {
    case 'number': return v.value;
    case 'string': {
      const n = parseInt32(v.value);
      if (n === null) throw new LogoUnexpectedValueError('a number', v.value);
      return n;
    }
    case 'bool': return v.value ? 1 : 0;
    case 'variable': throw new LogoTypeMismatchError();
  }
}

export function toBool(v: LogoValue): boolean {
  switch (v.kind) {
    case 'bool': return v.value;
    case 'string': return v.value.toUpperCase() === 'TRUE';
    case 'number': return v.value !== 0;
    case 'variable': throw new LogoTypeMismatchError();
  }
}

/**
 * Textual form of a value. Variable references need the environment, so the
 * caller supplies the lookup.
 */
export function toText(v: LogoValue, resolveName: (name: string) => string): string {
  switch (v.kind) {
    case 'string': return v.value;
    case 'number': return String(v.value);
    case 'bool': return v.value ? 'true' : 'false';
    case 'variable': return resolveName(v.name);
  }
}

/**
 * Storage normalisation applied by MAKE: TRUE/FALSE text becomes a boolean,
 * integer text becomes a number.
 */
export function normalizeForStorage(v: LogoValue): LogoValue {
  if (v.kind !== 'string') return v;
  const upper = v.value.toUpperCase();
  if (upper === 'TRUE') return mkBool(true);
  if (upper === 'FALSE') return mkBool(false);
  const n = parseInt32(v.value);
  return n === null ? v : mkNumber(n);
}

/**
 * EQ semantics: numbers by value, strings case-insensitively, booleans
 * directly, and a number against a string by parsing the string.
 */
export function valuesEqual(a: LogoValue, b: LogoValue): boolean {
  if (a.kind === 'number' && b.kind === 'number') return a.value === b.value;
  if (a.kind === 'string' && b.kind === 'string') {
    return a.value.toUpperCase() === b.value.toUpperCase();
  }
  if (a.kind === 'bool' && b.kind === 'bool') return a.value === b.value;
  if (a.kind === 'number' && b.kind === 'string') return numberEqualsText(a.value, b.value);
  if (a.kind === 'string' && b.kind === 'number') return numberEqualsText(b.value, a.value);
  throw new LogoTypeMismatchError();
}

function numberEqualsText(n: number, text: string): boolean {
  const parsed = parseInt32(text);
  if (parsed === null) throw new LogoTypeMismatchError();
  return n === parsed;
}

/** Source-like rendering, used in diagnostics and logs. */
export function valueToString(v: LogoValue): string {
  switch (v.kind) {
    case 'number': return String(v.value);
    case 'string': return v.value;
    case 'variable': return `:${v.name}`;
    case 'bool': return v.value ? 'TRUE' : 'FALSE';
  }
}
