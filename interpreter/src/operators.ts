/**
 * Binary operators. Operands come off the operand stack: right first,
 * then left.
 */

import { Operator } from './ast';
import { OperandStack } from './stack';
import {
  LogoValue,
  checkedAdd,
  checkedDiv,
  checkedMul,
  checkedSub,
  mkBool,
  mkNumber,
  toBool,
  toInt,
  valuesEqual,
} from './values';

export function applyOperator(op: Operator, stack: OperandStack): LogoValue {
  const right = stack.pop();
  const left = stack.pop();
  return evalOperator(op, left, right);
}

export function evalOperator(op: Operator, left: LogoValue, right: LogoValue): LogoValue {
  switch (op) {
    case '+': return mkNumber(checkedAdd(toInt(left), toInt(right)));
    case '-': return mkNumber(checkedSub(toInt(left), toInt(right)));
    case '*': return mkNumber(checkedMul(toInt(left), toInt(right)));
    case '/': return mkNumber(checkedDiv(toInt(left), toInt(right)));
    case 'EQ': return mkBool(valuesEqual(left, right));
    case 'NE': return mkBool(toInt(left) !== toInt(right));
    case 'GT': return mkBool(toInt(left) > toInt(right));
    case 'LT': return mkBool(toInt(left) < toInt(right));
    case 'AND':
    case 'OR': {
      // both sides are coerced, no short-circuit
      const l = toBool(left);
      const r = toBool(right);
      return mkBool(op === 'AND' ? l && r : l || r);
    }
  }
}
