/**
 * Tree-walking interpreter for Logo programs.
 *
 * All mutable state of a run lives in one ExecutionContext, created per
 * Interpreter, so separate runs never share variables or procedures.
 */

import { Command, Expression, Program, QueryName, UnaryCommandName } from './ast';
import { VariableEnvironment } from './environment';
import {
  LogoInvalidArgumentError,
  LogoUndefinedVariableError,
  LogoUnexpectedValueError,
} from './errors';
import { applyOperator } from './operators';
import { ProcedureRegistry } from './procedures';
import { OperandStack } from './stack';
import { CanvasTurtle, Turtle } from './turtle';
import {
  LogoValue,
  checkedAdd,
  mkBool,
  mkNumber,
  toBool,
  toInt,
  toText,
  valueToString,
} from './values';

export interface ExecutionContext {
  readonly variables: VariableEnvironment;
  readonly procedures: ProcedureRegistry;
  readonly stack: OperandStack;
  readonly turtle: Turtle;
}

export interface InterpreterOptions {
  /** Called before each command runs, nested ones included. */
  onCommand?: (command: Command, depth: number) => void;
}

export function createExecutionContext(turtle: Turtle): ExecutionContext {
  return {
    variables: new VariableEnvironment(),
    procedures: new ProcedureRegistry(),
    stack: new OperandStack(),
    turtle,
  };
}

export class Interpreter {
  private readonly context: ExecutionContext;
  private readonly onCommand: InterpreterOptions['onCommand'];
  private depth = 0;

  constructor(turtle: Turtle, options: InterpreterOptions = {}) {
    this.context = createExecutionContext(turtle);
    this.onCommand = options.onCommand;
  }

  /**
   * An interpreter drawing onto a fresh width × height image.
   */
  static withCanvas(width: number, height: number, options: InterpreterOptions = {}): Interpreter {
    return new Interpreter(new CanvasTurtle(width, height), options);
  }

  getContext(): ExecutionContext {
    return this.context;
  }

  /**
   * Run every top-level command in order. The first error aborts the run.
   */
  execute(program: Program): void {
    this.executeBlock(program.commands);
  }

  saveImage(filePath: string): void {
    this.context.turtle.saveImage(filePath);
  }

  // ==================================================================
  // Commands
  // ==================================================================

  private executeBlock(commands: readonly Command[]): void {
    for (const command of commands) {
      this.executeCommand(command);
    }
  }

  executeCommand(command: Command): void {
    this.onCommand?.(command, this.depth);
    this.depth++;
    try {
      this.dispatch(command);
    } finally {
      this.depth--;
    }
  }

  private dispatch(command: Command): void {
    const { turtle, variables, procedures } = this.context;

    switch (command.kind) {
      case 'pen':
        if (command.down) turtle.penDown();
        else turtle.penUp();
        return;

      case 'unary':
        return this.executeUnary(command.command, toInt(this.evaluateOperand(command.argument)));

      case 'make': {
        const name = toText(this.evaluateOperand(command.name), (n) => this.resolveNameText(n));
        const value = this.evaluateOperand(command.value);
        variables.set(name, value);
        return;
      }

      case 'addAssign':
        return this.executeAddAssign(command.target.name, command.target.indirect, command.amount);

      case 'if':
        if (toBool(this.evaluateOperand(command.condition))) {
          this.executeBlock(command.body);
        }
        return;

      case 'while':
        while (toBool(this.evaluateOperand(command.condition))) {
          this.executeBlock(command.body);
        }
        return;

      case 'expression':
        this.evaluateOperand(command.expression);
        return;

      case 'procedureDefinition':
        procedures.define(command.name, command.parameters, command.body, variables);
        return;

      case 'procedureCall':
        return this.callProcedure(command.name, command.arguments);
    }
  }

  private executeUnary(name: UnaryCommandName, amount: number): void {
    const { turtle } = this.context;
    switch (name) {
      case 'FORWARD': return turtle.forward(amount);
      case 'BACK': return turtle.back(amount);
      case 'LEFT': return turtle.left(amount);
      case 'RIGHT': return turtle.right(amount);
      case 'SETPENCOLOR': return turtle.setPenColor(amount);
      case 'TURN': return turtle.turn(amount);
      case 'SETHEADING': return turtle.setHeading(amount);
      case 'SETX': return turtle.setX(amount);
      case 'SETY': return turtle.setY(amount);
    }
  }

  /**
   * ADDASSIGN target resolution:
   *   `:name`  - global `name` holds the real target name
   *   `"name`  - if global `name` holds a string, that string is the target,
   *              otherwise `name` itself is
   */
  private executeAddAssign(written: string, indirect: boolean, amountExpr: Expression): void {
    const { variables } = this.context;
    const amount = toInt(this.evaluateOperand(amountExpr));

    let target: string;
    if (indirect) {
      target = this.resolveNameText(written);
    } else {
      const holder = variables.get(written);
      target = holder?.kind === 'string' ? holder.value : written;
    }

    const current = toInt(variables.require(target));
    variables.set(target, mkNumber(checkedAdd(current, amount)));
  }

  private callProcedure(name: string, argExprs: readonly Expression[]): void {
    const { procedures } = this.context;
    const procedure = procedures.get(name);
    if (procedure === undefined) {
      throw new LogoInvalidArgumentError('procedure call', name, 'a defined procedure name');
    }

    // Arguments see the caller's frame, not the new one.
    const args = argExprs.map((arg) => this.evaluateOperand(arg));
    procedures.pushFrame(procedure, args);
    try {
      this.executeBlock(procedure.body);
    } finally {
      procedures.popFrame();
    }
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  /**
   * Evaluate an expression. Every value produced, sub-expressions included,
   * is pushed onto the operand stack before it is returned; binary operators
   * pop their two operands back off.
   */
  evaluate(expr: Expression): LogoValue {
    const result = this.compute(expr);
    this.context.stack.push(result);
    return result;
  }

  /**
   * Evaluate a command's own operand and take its result back off the
   * stack, so a finished command leaves the stack as it found it.
   */
  private evaluateOperand(expr: Expression): LogoValue {
    this.evaluate(expr);
    return this.context.stack.pop();
  }

  private compute(expr: Expression): LogoValue {
    switch (expr.kind) {
      case 'value':
        return this.resolveValue(expr.value);
      case 'binary':
        this.evaluate(expr.left);
        this.evaluate(expr.right);
        return applyOperator(expr.operator, this.context.stack);
      case 'query':
        return this.query(expr.name);
    }
  }

  private query(name: QueryName): LogoValue {
    const { turtle } = this.context;
    switch (name) {
      case 'XCOR': return mkNumber(turtle.getX());
      case 'YCOR': return mkNumber(turtle.getY());
      case 'HEADING': return mkNumber(turtle.getHeading());
      case 'COLOR': return mkNumber(turtle.getPenColor());
    }
  }

  /**
   * Dereference variables and turn TRUE/FALSE text into booleans.
   *
   * Lookup order for `:name` is parameter frames (innermost first), then
   * globals. A global holding text that starts with `:` is followed once
   * more through the globals.
   */
  private resolveValue(value: LogoValue): LogoValue {
    const { variables, procedures } = this.context;

    if (value.kind === 'variable') {
      const param = procedures.lookupParameter(value.name);
      if (param !== undefined) return param;

      const global = variables.require(value.name);
      if (global.kind === 'string' && global.value.startsWith(':')) {
        return variables.require(global.value.slice(1));
      }
      return global;
    }

    if (value.kind === 'string') {
      const upper = value.value.toUpperCase();
      if (upper === 'TRUE') return mkBool(true);
      if (upper === 'FALSE') return mkBool(false);
    }
    return value;
  }

  /**
   * The text a variable holds, for places where a variable names another
   * variable. Globals are consulted before parameters here.
   */
  private resolveNameText(name: string): string {
    const { variables, procedures } = this.context;
    const global = variables.get(name);
    if (global !== undefined) {
      if (global.kind === 'string' || global.kind === 'number') return String(global.value);
      throw new LogoUnexpectedValueError('a string or number', valueToString(global));
    }
    const param = procedures.lookupParameter(name);
    if (param?.kind === 'string' || param?.kind === 'number') return String(param.value);
    throw new LogoUndefinedVariableError(name, variables.names());
  }
}
