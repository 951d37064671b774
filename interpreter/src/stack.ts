/**
 * Operand stack shared by expression evaluation.
 */

import { LogoStackUnderflowError } from './errors';
import { LogoValue } from './values';

export class OperandStack {
  private items: LogoValue[] = [];

  push(value: LogoValue): void {
    this.items.push(value);
  }

  pop(): LogoValue {
    const value = this.items.pop();
    if (value === undefined) {
      throw new LogoStackUnderflowError();
    }
    return value;
  }

  get size(): number {
    return this.items.length;
  }

  /** Top of stack last. */
  snapshot(): LogoValue[] {
    return [...this.items];
  }
}
