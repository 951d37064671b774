/**
 * Global variables, the procedure registry and parameter frames.
 */

import { VariableEnvironment } from '../src/environment';
import { ProcedureRegistry } from '../src/procedures';
import { LogoInvalidArgumentError, LogoUndefinedVariableError } from '../src/errors';
import { mkBool, mkNumber, mkString } from '../src/values';

// ==================================================================
// VariableEnvironment
// ==================================================================

describe('VariableEnvironment', () => {
  test('set and get a variable', () => {
    const env = new VariableEnvironment();
    env.set('x', mkNumber(42));
    expect(env.get('x')).toEqual(mkNumber(42));
    expect(env.has('x')).toBe(true);
  });

  test('unknown names are undefined', () => {
    const env = new VariableEnvironment();
    expect(env.get('nope')).toBeUndefined();
    expect(env.has('nope')).toBe(false);
  });

  test('set normalises text', () => {
    const env = new VariableEnvironment();
    env.set('n', mkString('5'));
    env.set('flag', mkString('TRUE'));
    env.set('word', mkString('abc'));
    expect(env.get('n')).toEqual(mkNumber(5));
    expect(env.get('flag')).toEqual(mkBool(true));
    expect(env.get('word')).toEqual(mkString('abc'));
  });

  test('set overwrites', () => {
    const env = new VariableEnvironment();
    env.set('x', mkNumber(1));
    env.set('x', mkNumber(2));
    expect(env.get('x')).toEqual(mkNumber(2));
  });

  test('require reports the defined names', () => {
    const env = new VariableEnvironment();
    env.set('b', mkNumber(1));
    env.set('a', mkNumber(2));
    try {
      env.require('c');
      throw new Error('expected require to fail');
    } catch (e) {
      expect(e).toBeInstanceOf(LogoUndefinedVariableError);
      if (e instanceof LogoUndefinedVariableError) {
        expect(e.variableName).toBe('c');
        expect(e.definedVariables).toEqual(['b', 'a']);
        expect(e.message).toBe("NameError: undefined variable 'c'");
      }
    }
  });
});

// ==================================================================
// ProcedureRegistry
// ==================================================================

describe('ProcedureRegistry', () => {
  test('define and look up', () => {
    const registry = new ProcedureRegistry();
    registry.define('square', [{ name: 'size', style: 'variable' }], [], new VariableEnvironment());
    expect(registry.has('square')).toBe(true);
    expect(registry.get('square')?.parameters).toEqual(['size']);
    expect(registry.names()).toEqual(['square']);
  });

  test('redefinition replaces the procedure', () => {
    const registry = new ProcedureRegistry();
    const env = new VariableEnvironment();
    registry.define('p', [], [], env);
    registry.define('p', [{ name: 'a', style: 'literal' }], [], env);
    expect(registry.get('p')?.parameters).toEqual(['a']);
  });

  test('a :param naming a global string takes that string as its name', () => {
    const env = new VariableEnvironment();
    env.set('pname', mkString('side'));
    const registry = new ProcedureRegistry();
    const proc = registry.define('box', [{ name: 'pname', style: 'variable' }], [], env);
    expect(proc.parameters).toEqual(['side']);
  });

  test('renaming only applies to string globals and :params', () => {
    const env = new VariableEnvironment();
    env.set('n', mkNumber(3));
    env.set('w', mkString('word'));
    const registry = new ProcedureRegistry();
    const proc = registry.define(
      'p',
      [
        { name: 'n', style: 'variable' },
        { name: 'w', style: 'literal' },
      ],
      [],
      env,
    );
    expect(proc.parameters).toEqual(['n', 'w']);
  });

  test('arity mismatch', () => {
    const registry = new ProcedureRegistry();
    const env = new VariableEnvironment();
    const proc = registry.define(
      'p',
      [
        { name: 'a', style: 'variable' },
        { name: 'b', style: 'variable' },
      ],
      [],
      env,
    );
    try {
      registry.pushFrame(proc, [mkNumber(1)]);
      throw new Error('expected pushFrame to fail');
    } catch (e) {
      expect(e).toBeInstanceOf(LogoInvalidArgumentError);
      if (e instanceof LogoInvalidArgumentError) {
        expect(e.command).toBe('procedure call');
        expect(e.argument).toBe('1 arguments');
        expect(e.expected).toBe('2 arguments');
      }
    }
    expect(registry.depth).toBe(0);
  });

  test('inner frames shadow outer ones', () => {
    const registry = new ProcedureRegistry();
    const env = new VariableEnvironment();
    const outer = registry.define('outer', [{ name: 'a', style: 'variable' }, { name: 'b', style: 'variable' }], [], env);
    const inner = registry.define('inner', [{ name: 'a', style: 'variable' }], [], env);

    registry.pushFrame(outer, [mkNumber(1), mkNumber(2)]);
    registry.pushFrame(inner, [mkNumber(10)]);
    expect(registry.depth).toBe(2);
    expect(registry.lookupParameter('a')).toEqual(mkNumber(10));
    expect(registry.lookupParameter('b')).toEqual(mkNumber(2));

    registry.popFrame();
    expect(registry.lookupParameter('a')).toEqual(mkNumber(1));

    registry.popFrame();
    expect(registry.lookupParameter('a')).toBeUndefined();
  });
});
