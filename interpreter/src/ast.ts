/**
 * Syntax tree produced by the parser and walked by the interpreter.
 */

import { LogoValue, valueToString } from './values';

export type Operator =
  | '+'
  | '-'
  | '*'
  | '/'
  | 'EQ'
  | 'NE'
  | 'GT'
  | 'LT'
  | 'AND'
  | 'OR';

export type QueryName = 'XCOR' | 'YCOR' | 'HEADING' | 'COLOR';

export type Expression =
  | { kind: 'value'; value: LogoValue }
  | { kind: 'binary'; operator: Operator; left: Expression; right: Expression }
  | { kind: 'query'; name: QueryName };

/** Commands taking exactly one numeric argument. */
export type UnaryCommandName =
  | 'FORWARD'
  | 'BACK'
  | 'LEFT'
  | 'RIGHT'
  | 'SETPENCOLOR'
  | 'TURN'
  | 'SETHEADING'
  | 'SETX'
  | 'SETY';

/**
 * A TO parameter. `variable` parameters (`:x`) may be renamed at definition
 * time; `literal` ones (`"x`) never are.
 */
export interface ParameterDecl {
  name: string;
  style: 'variable' | 'literal';
}

/** ADDASSIGN target: `"name` is literal, `:name` names a variable holding the target. */
export interface AssignTarget {
  name: string;
  indirect: boolean;
}

export type Command =
  | { kind: 'pen'; down: boolean }
  | { kind: 'unary'; command: UnaryCommandName; argument: Expression }
  | { kind: 'make'; name: Expression; value: Expression }
  | { kind: 'addAssign'; target: AssignTarget; amount: Expression }
  | { kind: 'if'; condition: Expression; body: Command[] }
  | { kind: 'while'; condition: Expression; body: Command[] }
  | { kind: 'expression'; expression: Expression }
  | { kind: 'procedureDefinition'; name: string; parameters: ParameterDecl[]; body: Command[] }
  | { kind: 'procedureCall'; name: string; arguments: Expression[] };

export interface Program {
  commands: Command[];
}

// ---- Constructors ----

export function valueExpr(value: LogoValue): Expression {
  return { kind: 'value', value };
}

export function binaryExpr(operator: Operator, left: Expression, right: Expression): Expression {
  return { kind: 'binary', operator, left, right };
}

export function queryExpr(name: QueryName): Expression {
  return { kind: 'query', name };
}

// ---- Rendering ----

export function formatExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'value': {
      const v = expr.value;
      return v.kind === 'string' ? `"${v.value}` : valueToString(v);
    }
    case 'binary':
      return `(${expr.operator} ${formatExpression(expr.left)} ${formatExpression(expr.right)})`;
    case 'query':
      return expr.name;
  }
}

function formatBlock(body: Command[]): string {
  return `[${body.map(formatCommand).join(' ')}]`;
}

export function formatCommand(cmd: Command): string {
  switch (cmd.kind) {
    case 'pen': return cmd.down ? 'PENDOWN' : 'PENUP';
    case 'unary': return `${cmd.command} ${formatExpression(cmd.argument)}`;
    case 'make': return `MAKE ${formatExpression(cmd.name)} ${formatExpression(cmd.value)}`;
    case 'addAssign': {
      const target = `${cmd.target.indirect ? ':' : '"'}${cmd.target.name}`;
      return `ADDASSIGN ${target} ${formatExpression(cmd.amount)}`;
    }
    case 'if': return `IF ${formatExpression(cmd.condition)} ${formatBlock(cmd.body)}`;
    case 'while': return `WHILE ${formatExpression(cmd.condition)} ${formatBlock(cmd.body)}`;
    case 'expression': return formatExpression(cmd.expression);
    case 'procedureDefinition': {
      const params = cmd.parameters.map((p) => `${p.style === 'variable' ? ':' : '"'}${p.name} `).join('');
      return `TO ${cmd.name} ${params}${formatBlock(cmd.body)} END`;
    }
    case 'procedureCall':
      return [cmd.name, ...cmd.arguments.map(formatExpression)].join(' ');
  }
}
