#!/usr/bin/env node
/**
 * Lexemize CLI - Print the lexemes of a file or an inline snippet
 *
 * Usage:
 *   lexemize src/main.rs
 *   lexemize --eval 'let x = 1..=2;'
 *   lexemize --format json --edition 2018 src/main.rs
 */

import { lexemize } from './lexer/index.js';
import { formatLexemes, type OutputFormat } from './format.js';
import {
  collectPositionals,
  CONSOLE_IO,
  formatError,
  parseFormatFlag,
  readFlagValue,
  readSourceFile,
  readVersion,
  type CliIO,
} from './cli-shared.js';

/**
 * Parsed command-line arguments for lexemize
 */
export type ParsedLexemizeArgs =
  | {
      mode: 'file';
      file: string;
      format: OutputFormat;
      edition: string | undefined;
    }
  | {
      mode: 'eval';
      source: string;
      format: OutputFormat;
      edition: string | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

const KNOWN_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--format',
  '--edition',
  '--eval',
  '-e',
]);

const VALUE_FLAGS = new Set(['--format', '--edition', '--eval', '-e']);

/**
 * Parse command-line arguments for lexemize
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseLexemizeArgs(argv: string[]): ParsedLexemizeArgs {
  if (argv.length === 0) {
    return { mode: 'help' };
  }

  // The snippet is taken verbatim and removed before any flag is inspected
  const evalIndex = argv.findIndex((arg) => arg === '--eval' || arg === '-e');
  let source: string | undefined;
  let rest = argv;
  if (evalIndex !== -1) {
    source = argv[evalIndex + 1];
    if (source === undefined) {
      throw new Error('--eval requires argument: source text');
    }
    rest = [...argv.slice(0, evalIndex), ...argv.slice(evalIndex + 2)];
  }

  if (rest.includes('--help') || rest.includes('-h')) {
    return { mode: 'help' };
  }
  if (rest.includes('--version') || rest.includes('-v')) {
    return { mode: 'version' };
  }

  const format = parseFormatFlag(rest);
  const edition = readFlagValue(rest, '--edition', 'edition name');
  const positionals = collectPositionals(rest, KNOWN_FLAGS, VALUE_FLAGS);

  if (source !== undefined) {
    if (positionals.length > 0) {
      throw new Error('Cannot combine --eval with a file argument');
    }
    return { mode: 'eval', source, format, edition };
  }

  const file = positionals[0];
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (positionals.length > 1) {
    throw new Error(`Unexpected argument: ${positionals[1]}`);
  }
  return { mode: 'file', file, format, edition };
}

const HELP = `lexemize - Print the lexemes of a source file

Usage: lexemize [options] <file>
       lexemize [options] --eval <source>

Options:
  -e, --eval <source>  Lexemize the given text instead of a file
  --format <fmt>       Output format: text (default) or json
  --edition <name>     Language edition (default: 2018)
  -h, --help           Show this help message
  -v, --version        Show version number`;

/**
 * Run lexemize with the given arguments.
 *
 * @returns Exit code: 0 success, 1 usage or configuration error, 2 unreadable file
 */
export function runLexemize(argv: string[], io: CliIO = CONSOLE_IO): number {
  let args: ParsedLexemizeArgs;
  try {
    args = parseLexemizeArgs(argv);
  } catch (err) {
    io.stderr(formatError(err));
    return 1;
  }

  if (args.mode === 'help') {
    io.stdout(HELP);
    return 0;
  }
  if (args.mode === 'version') {
    io.stdout(readVersion());
    return 0;
  }

  let source: string;
  if (args.mode === 'eval') {
    source = args.source;
  } else {
    const result = readSourceFile(args.file);
    if (!result.ok) {
      io.stderr(result.message);
      return 2;
    }
    source = result.source;
  }

  try {
    const lexemes = lexemize(source, { edition: args.edition });
    io.stdout(formatLexemes(lexemes, args.format));
    return 0;
  } catch (err) {
    io.stderr(formatError(err));
    return 1;
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function main(): void {
  process.exitCode = runLexemize(process.argv.slice(2));
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
