/**
 * CLI tests. Output goes to an in-memory CliIO; files live in a fresh
 * temporary directory per test.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CliIO, parseRunArgs, runCheck, runCli } from '../src/cli';

interface CapturedIO extends CliIO {
  stdout: string[];
  stderr: string[];
}

function captureIO(): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logo-cli-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeProgram(name: string, source: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, source);
  return file;
}

// ==================================================================
// Argument handling
// ==================================================================

describe('parseRunArgs', () => {
  test('positional order is input, output, height, width', () => {
    expect(parseRunArgs(['in.lg', 'out.svg', '100', '200'])).toEqual({
      input: 'in.lg',
      output: 'out.svg',
      height: 100,
      width: 200,
      verbose: false,
    });
  });

  test('--verbose may appear anywhere', () => {
    expect(parseRunArgs(['--verbose', 'in.lg', 'out.svg', '1', '2']).verbose).toBe(true);
  });
});

describe('runCli arguments', () => {
  test('no arguments prints usage and fails', () => {
    const io = captureIO();
    expect(runCli([], io)).toBe(1);
    expect(io.stdout[0]).toBe('Usage:');
  });

  test('--help prints usage', () => {
    const io = captureIO();
    expect(runCli(['--help'], io)).toBe(0);
    expect(io.stdout[0]).toBe('Usage:');
  });

  test('non-numeric height', () => {
    const io = captureIO();
    expect(runCli(['in.lg', 'out.svg', 'abc', '200'], io)).toBe(1);
    expect(io.stderr).toEqual(['Error: height: height must be a number']);
  });

  test('zero width', () => {
    const io = captureIO();
    expect(runCli(['in.lg', 'out.svg', '100', '0'], io)).toBe(1);
    expect(io.stderr).toEqual(['Error: width: width must be positive']);
  });

  test('unknown option', () => {
    const io = captureIO();
    expect(runCli(['in.lg', 'out.svg', '1', '1', '--fast'], io)).toBe(1);
    expect(io.stderr).toEqual(["Error: unknown option '--fast'"]);
  });

  test('too many positionals', () => {
    const io = captureIO();
    expect(runCli(['in.lg', 'out.svg', '1', '1', 'extra'], io)).toBe(1);
    expect(io.stderr).toEqual(["Error: unexpected argument 'extra'"]);
  });
});

// ==================================================================
// Running programs
// ==================================================================

describe('runCli run', () => {
  test('draws a program to SVG', () => {
    const input = writeProgram('line.lg', 'PENDOWN\nFORWARD 10');
    const output = path.join(dir, 'line.svg');
    const io = captureIO();

    expect(runCli([input, output, '20', '30'], io)).toBe(0);
    expect(io.stdout).toEqual(['Program executed successfully.', `Image written to ${output}`]);
    expect(io.stderr).toEqual([]);
    expect(fs.readFileSync(output, 'utf-8').split('\n')).toContain(
      '<line x1="15" y1="10" x2="15" y2="0" stroke="rgb(255, 255, 255)" stroke-width="1"/>',
    );
  });

  test('--verbose logs each step to stderr', () => {
    const input = writeProgram('line.lg', 'PENDOWN\nFORWARD 10');
    const output = path.join(dir, 'line.png');
    const io = captureIO();

    expect(runCli([input, output, '20', '30', '--verbose'], io)).toBe(0);
    expect(io.stderr).toEqual([
      `Reading input file ${input}...`,
      'Parsing program...',
      'Number of commands: 2',
      'Creating 30x20 canvas...',
      'Executing program...',
      '  PENDOWN',
      '  FORWARD 10',
      `Saving image to ${output}...`,
    ]);
    expect(fs.existsSync(output)).toBe(true);
  });

  test('runtime errors are reported', () => {
    const input = writeProgram('bad.lg', 'FORWARD :nope');
    const io = captureIO();

    expect(runCli([input, path.join(dir, 'out.svg'), '10', '10'], io)).toBe(1);
    expect(io.stderr).toEqual([
      [
        "Error: Undefined variable 'nope'",
        'No variables have been defined yet.',
        'Make sure to define variables using the MAKE command before using them.',
      ].join('\n'),
    ]);
    expect(io.stdout).toEqual([]);
  });

  test('unsupported output extension', () => {
    const input = writeProgram('ok.lg', 'FORWARD 1');
    const io = captureIO();

    expect(runCli([input, path.join(dir, 'out.gif'), '10', '10'], io)).toBe(1);
    expect(io.stderr).toEqual(['Failed to save image: File extension not supported']);
  });

  test('missing input file', () => {
    const missing = path.join(dir, 'missing.lg');
    const io = captureIO();

    expect(runCli([missing, path.join(dir, 'out.svg'), '10', '10'], io)).toBe(1);
    expect(io.stderr).toHaveLength(1);
    expect(io.stderr[0].startsWith(`Error: IOError: ${missing}: `)).toBe(true);
  });
});

// ==================================================================
// check
// ==================================================================

describe('runCheck', () => {
  test('reports command counts', () => {
    const one = writeProgram('one.lg', 'PENDOWN');
    const two = writeProgram('two.lg', 'FORWARD 10\nPENDOWN');
    const io = captureIO();

    expect(runCheck([one, two], io)).toBe(0);
    expect(io.stdout).toEqual([`✓ ${one}: 1 command`, `✓ ${two}: 2 commands`]);
  });

  test('a failing file fails the check', () => {
    const good = writeProgram('good.lg', 'PENUP');
    const bad = writeProgram('bad.lg', 'END');
    const io = captureIO();

    expect(runCheck([good, bad], io)).toBe(1);
    expect(io.stdout[0]).toBe(`✓ ${good}: 1 command`);
    expect(io.stdout[1]).toBe(`✗ ${bad}`);
    expect(io.stdout[2].split('\n')[0]).toBe(
      "Error: Found 'END' on line 1 without a matching 'TO' procedure definition",
    );
  });

  test('needs at least one file', () => {
    const io = captureIO();
    expect(runCli(['check'], io)).toBe(1);
    expect(io.stderr).toEqual(['Error: check requires at least one file argument']);
  });
});
