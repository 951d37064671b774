/**
 * Command-line front end: argument validation, file access and run
 * orchestration. Returns an exit status instead of exiting so it can be
 * driven from tests.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { formatCommand } from './ast';
import { formatError } from './diagnostics';
import { LogoError, LogoIOError } from './errors';
import { Interpreter } from './interpreter';
import { parse } from './parser';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const dimension = (label: string) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be an integer`)
    .positive(`${label} must be positive`);

export const RunOptionsSchema = z.object({
  input: z.string({ required_error: 'input path is required' }).min(1, 'input path is required'),
  output: z.string({ required_error: 'output path is required' }).min(1, 'output path is required'),
  height: dimension('height'),
  width: dimension('width'),
  verbose: z.boolean().default(false),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Turn `<input> <output> <height> <width> [--verbose]` into validated options.
 */
export function parseRunArgs(args: string[]): RunOptions {
  const positional = args.filter((a) => !a.startsWith('-'));
  const verbose = args.includes('--verbose') || args.includes('-v');
  const unknown = args.filter((a) => a.startsWith('-') && a !== '--verbose' && a !== '-v');
  if (unknown.length > 0) {
    throw new z.ZodError([
      { code: 'custom', path: [], message: `unknown option '${unknown[0]}'` },
    ]);
  }
  if (positional.length > 4) {
    throw new z.ZodError([
      { code: 'custom', path: [], message: `unexpected argument '${positional[4]}'` },
    ]);
  }
  const [input, output, height, width] = positional;
  return RunOptionsSchema.parse({ input, output, height, width, verbose });
}

export function readSource(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (e) {
    throw new LogoIOError(filePath, e instanceof Error ? e.message : String(e));
  }
}

/**
 * Read, parse and execute a program, then write the image.
 */
export function runProgram(options: RunOptions, io: CliIO = consoleIO): void {
  const log = (line: string) => {
    if (options.verbose) io.err(line);
  };

  log(`Reading input file ${options.input}...`);
  const source = readSource(options.input);

  log('Parsing program...');
  const program = parse(source);
  log(`Number of commands: ${program.commands.length}`);

  log(`Creating ${options.width}x${options.height} canvas...`);
  const interpreter = Interpreter.withCanvas(options.width, options.height, {
    onCommand: options.verbose
      ? (command, depth) => log(`${'  '.repeat(depth + 1)}${formatCommand(command)}`)
      : undefined,
  });

  log('Executing program...');
  interpreter.execute(program);

  log(`Saving image to ${options.output}...`);
  interpreter.saveImage(options.output);
}

/**
 * Parse-only validation of one or more files.
 * Returns 0 if every file parses, 1 otherwise.
 */
export function runCheck(files: string[], io: CliIO = consoleIO): number {
  if (files.length === 0) {
    io.err('Error: check requires at least one file argument');
    return 1;
  }
  let failed = false;
  for (const file of files) {
    try {
      const program = parse(readSource(file));
      const count = program.commands.length;
      io.out(`✓ ${file}: ${count} command${count === 1 ? '' : 's'}`);
    } catch (e) {
      if (!(e instanceof LogoError)) throw e;
      failed = true;
      io.out(`✗ ${file}`);
      io.out(formatError(e));
    }
  }
  return failed ? 1 : 0;
}

export function printUsage(io: CliIO = consoleIO): void {
  io.out('Usage:');
  io.out('  logo <input.lg> <output.svg|output.png> <height> <width> [--verbose]');
  io.out('  logo check <file.lg> [...]   Parse files without running them');
  io.out('  logo --help                  Show this help');
}

export function runCli(args: string[], io: CliIO = consoleIO): number {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage(io);
    return args.length === 0 ? 1 : 0;
  }

  if (args[0] === 'check') {
    return runCheck(args.slice(1), io);
  }

  let options: RunOptions;
  try {
    options = parseRunArgs(args);
  } catch (e) {
    if (!(e instanceof z.ZodError)) throw e;
    for (const issue of e.issues) {
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      io.err(`Error: ${where}${issue.message}`);
    }
    printUsage(io);
    return 1;
  }

  try {
    runProgram(options, io);
  } catch (e) {
    if (e instanceof LogoError) {
      io.err(formatError(e));
      return 1;
    }
    throw e;
  }

  io.out('Program executed successfully.');
  io.out(`Image written to ${options.output}`);
  return 0;
}
