/**
 * Procedure registry and the stack of per-call parameter frames.
 */

import { Command, ParameterDecl } from './ast';
import { VariableEnvironment } from './environment';
import { LogoInvalidArgumentError } from './errors';
import { LogoValue } from './values';

export interface Procedure {
  readonly name: string;
  /** Formal parameter names, fixed when the TO command ran. */
  readonly parameters: readonly string[];
  readonly body: readonly Command[];
}

export class ProcedureRegistry {
  private procedures = new Map<string, Procedure>();
  /** Innermost frame last. */
  private frames: Map<string, LogoValue>[] = [];

  /**
   * Register a procedure, replacing any previous definition of the name.
   *
   * A `:x` parameter is renamed to the current value of global `x` when
   * that value is a string; otherwise the written name is kept.
   */
  define(
    name: string,
    parameters: readonly ParameterDecl[],
    body: readonly Command[],
    variables: VariableEnvironment,
  ): Procedure {
    const formal = parameters.map((param) => {
      if (param.style !== 'variable') return param.name;
      const current = variables.get(param.name);
      return current?.kind === 'string' ? current.value : param.name;
    });
    const procedure: Procedure = { name, parameters: formal, body: [...body] };
    this.procedures.set(name, procedure);
    return procedure;
  }

  get(name: string): Procedure | undefined {
    return this.procedures.get(name);
  }

  has(name: string): boolean {
    return this.procedures.has(name);
  }

  names(): string[] {
    return [...this.procedures.keys()];
  }

  /**
   * Bind arguments to a procedure's formal parameters in a new frame.
   */
  pushFrame(procedure: Procedure, args: LogoValue[]): void {
    if (procedure.parameters.length !== args.length) {
      throw new LogoInvalidArgumentError(
        'procedure call',
        `${args.length} arguments`,
        `${procedure.parameters.length} arguments`,
      );
    }
    const frame = new Map<string, LogoValue>();
    procedure.parameters.forEach((param, i) => frame.set(param, args[i]));
    this.frames.push(frame);
  }

  popFrame(): void {
    this.frames.pop();
  }

  get depth(): number {
    return this.frames.length;
  }

  /**
   * Find a parameter binding, searching from the innermost frame outward.
   */
  lookupParameter(name: string): LogoValue | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const value = this.frames[i].get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }
}
