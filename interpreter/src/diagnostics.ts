/**
 * Human-readable rendering of interpreter errors.
 */

import {
  LogoError,
  LogoImageSaveError,
  LogoInvalidArgumentError,
  LogoParseError,
  LogoUndefinedVariableError,
  LogoUnexpectedValueError,
} from './errors';

const CONTEXT_LINES = 2;

function gutter(lineNumber?: number): string {
  return lineNumber === undefined ? '     | ' : `${String(lineNumber).padStart(4)} | `;
}

/**
 * Render a parse error with the surrounding source and a caret line under
 * the offending span.
 */
export function formatParseError(err: LogoParseError): string {
  const out: string[] = [`Error: ${err.reason}`];
  if (err.source.length === 0) return out.join('\n');

  const bytes = Buffer.from(err.source, 'utf-8');
  const spanChars = bytes
    .subarray(err.span.start, err.span.start + err.span.length)
    .toString('utf-8').length;

  const lines = err.source.split('\n').map((l) => l.replace(/\r$/, ''));
  const errorLine = err.line - 1;
  const first = Math.max(0, errorLine - CONTEXT_LINES);
  const last = Math.min(lines.length, errorLine + CONTEXT_LINES + 1);

  out.push('', 'Relevant code:');
  for (let i = first; i < last; i++) {
    out.push(gutter(i + 1) + lines[i]);
    if (i !== errorLine) continue;

    const column = err.column - 1;
    const width = Math.max(1, Math.min(spanChars, lines[i].length - column));
    out.push(gutter() + ' '.repeat(column) + '^'.repeat(width));

    if (err.code === 'unmatched-end') {
      out.push(
        gutter(),
        "Hint: 'END' commands must be paired with a 'TO' procedure definition:",
        gutter() + 'TO procedure_name',
        gutter() + '   commands...',
        gutter() + 'END',
      );
    }
  }
  return out.join('\n');
}

/**
 * Render any interpreter error as one or more lines of text.
 */
export function formatError(err: LogoError): string {
  if (err instanceof LogoParseError) {
    return formatParseError(err);
  }
  if (err instanceof LogoInvalidArgumentError) {
    return `Invalid argument for command '${err.command}': got '${err.argument}', expected ${err.expected}`;
  }
  if (err instanceof LogoUndefinedVariableError) {
    const out = [`Error: Undefined variable '${err.variableName}'`];
    if (err.definedVariables.length === 0) {
      out.push('No variables have been defined yet.');
    } else {
      out.push('Currently defined variables are:');
      for (const name of err.definedVariables) out.push(`  - ${name}`);
    }
    out.push('Make sure to define variables using the MAKE command before using them.');
    return out.join('\n');
  }
  if (err instanceof LogoUnexpectedValueError) {
    return `Error: Unexpected value - expected ${err.expected}, got ${err.got}`;
  }
  if (err instanceof LogoImageSaveError) {
    return `Failed to save image: ${err.reason}`;
  }
  return `Error: ${err.message}`;
}
