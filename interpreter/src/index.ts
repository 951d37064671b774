#!/usr/bin/env node
/**
 * Logo interpreter CLI entry point.
 *
 * Usage: logo <input.lg> <output.svg|png> <height> <width> [--verbose]
 *        logo check <file.lg> [...]
 */

import { runCli } from './cli';

process.exitCode = runCli(process.argv.slice(2));
