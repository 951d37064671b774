/**
 * Global variable environment for the Logo interpreter.
 *
 * Logo has a single flat global scope; procedure parameters live in
 * separate frames owned by the ProcedureRegistry.
 */

import { LogoValue, normalizeForStorage } from './values';
import { LogoUndefinedVariableError } from './errors';

export class VariableEnvironment {
  private vars: Map<string, LogoValue>;

  constructor() {
    this.vars = new Map();
  }

  /**
   * Look up a variable, or undefined if it has never been set.
   */
  get(name: string): LogoValue | undefined {
    return this.vars.get(name);
  }

  /**
   * Look up a variable that must exist.
   */
  require(name: string): LogoValue {
    const value = this.vars.get(name);
    if (value === undefined) {
      throw new LogoUndefinedVariableError(name, this.names());
    }
    return value;
  }

  has(name: string): boolean {
    return this.vars.has(name);
  }

  /**
   * Define or overwrite a variable. TRUE/FALSE text is stored as a
   * boolean and integer text as a number.
   */
  set(name: string, value: LogoValue): void {
    this.vars.set(name, normalizeForStorage(value));
  }

  /** Defined names, in definition order. */
  names(): string[] {
    return [...this.vars.keys()];
  }
}
