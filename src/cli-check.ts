#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for lexemize-check.
 * Reports unknown characters, unterminated literals and malformed
 * literals found while lexemizing a source file.
 */

import type { Diagnostic } from './check/index.js';
import {
  VALIDATION_RULES,
  createDefaultConfig,
  loadConfig,
  validateSource,
} from './check/index.js';
import { explainError } from './cli-explain.js';
import type { OutputFormat } from './format.js';
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
 * Parsed command-line arguments for lexemize-check
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      file: string;
      verbose: boolean;
      format: OutputFormat;
      edition: string | undefined;
    }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' }
  | { mode: 'version' };

const KNOWN_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--verbose',
  '--format',
  '--edition',
  '--explain',
]);

const VALUE_FLAGS = new Set(['--format', '--edition', '--explain']);

/**
 * Parse command-line arguments for lexemize-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const errorId = readFlagValue(argv, '--explain', 'error ID');
  if (errorId !== undefined) {
    return { mode: 'explain', errorId };
  }

  const verbose = argv.includes('--verbose');
  const format = parseFormatFlag(argv);
  const edition = readFlagValue(argv, '--edition', 'edition name');

  const file = collectPositionals(argv, KNOWN_FLAGS, VALUE_FLAGS)[0];
  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', file, verbose, format, edition };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format diagnostics for output
 *
 * Text format: file:line:col: severity: message (code)
 * JSON format: complete schema with errors array and summary
 * Verbose mode: adds rule categories, and a summary line to text output
 */
export function formatDiagnostics(
  file: string,
  diagnostics: Diagnostic[],
  format: OutputFormat,
  verbose: boolean
): string {
  if (format === 'json') {
    return formatDiagnosticsJSON(file, diagnostics, verbose);
  }
  return formatDiagnosticsText(file, diagnostics, verbose);
}

const CATEGORY_MAP: ReadonlyMap<string, string> = new Map(
  VALIDATION_RULES.map((rule): [string, string] => [rule.code, rule.category])
);

function summarize(diagnostics: Diagnostic[]): {
  total: number;
  errors: number;
  warnings: number;
  info: number;
} {
  return {
    total: diagnostics.length,
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
    info: diagnostics.filter((d) => d.severity === 'info').length,
  };
}

/**
 * Format diagnostics as text
 * Pattern: file:line:col: severity: message (code)
 */
function formatDiagnosticsText(
  file: string,
  diagnostics: Diagnostic[],
  verbose: boolean
): string {
  const lines = diagnostics.map((d) => {
    const { line, column } = d.location;
    const base = `${file}:${line}:${column}: ${d.severity}: ${d.message} (${d.code})`;
    const category = CATEGORY_MAP.get(d.code);
    return verbose && category ? `${base} [${category}]` : base;
  });

  if (verbose) {
    const summary = summarize(diagnostics);
    lines.push(
      `${summary.total} problem${summary.total === 1 ? '' : 's'} (${summary.errors} errors, ${summary.warnings} warnings, ${summary.info} info)`
    );
  }
  return lines.join('\n');
}

/**
 * Format diagnostics as JSON
 * Includes file, errors array, and summary
 */
function formatDiagnosticsJSON(
  file: string,
  diagnostics: Diagnostic[],
  verbose: boolean
): string {
  const errors = diagnostics.map((d) => {
    const error: Record<string, unknown> = {
      location: {
        line: d.location.line,
        column: d.location.column,
        offset: d.location.offset,
      },
      severity: d.severity,
      code: d.code,
      errorId: d.errorId,
      message: d.message,
      context: d.context,
    };

    if (verbose) {
      const category = CATEGORY_MAP.get(d.code);
      if (category) {
        error['category'] = category;
      }
    }

    return error;
  });

  return JSON.stringify(
    { file, errors, summary: summarize(diagnostics) },
    null,
    2
  );
}

// ============================================================
// RUN
// ============================================================

const HELP = `lexemize-check - Report lexical problems in a source file

Usage: lexemize-check [options] <file>
       lexemize-check --explain <error-id>

Options:
  --format <fmt>    Output format: text (default) or json
  --edition <name>  Language edition (overrides the config file)
  --verbose         Include rule categories and a summary
  --explain <id>    Show documentation for an error ID (e.g. LEX-L005)
  -h, --help        Show this help message
  -v, --version     Show version number

Configuration is read from .lexemize-check.json or .lexemize-check.yaml
in the working directory.`;

/**
 * Run lexemize-check with the given arguments.
 *
 * @returns Exit code: 0 no errors, 1 errors found or invalid usage/config, 2 unreadable file
 */
export function runCheck(
  argv: string[],
  io: CliIO = CONSOLE_IO,
  cwd: string = process.cwd()
): number {
  try {
    const args = parseCheckArgs(argv);

    if (args.mode === 'help') {
      io.stdout(HELP);
      return 0;
    }
    if (args.mode === 'version') {
      io.stdout(readVersion());
      return 0;
    }
    if (args.mode === 'explain') {
      const documentation = explainError(args.errorId);
      if (documentation === null) {
        io.stderr(`Error: Unknown error ID: ${args.errorId}`);
        return 1;
      }
      io.stdout(documentation);
      return 0;
    }

    const loaded = loadConfig(cwd) ?? createDefaultConfig();
    const config = { ...loaded, edition: args.edition ?? loaded.edition };

    const result = readSourceFile(args.file);
    if (!result.ok) {
      io.stderr(result.message);
      return 2;
    }

    const diagnostics = validateSource(result.source, config);

    if (diagnostics.length === 0) {
      io.stdout(
        args.format === 'json'
          ? formatDiagnostics(args.file, [], 'json', args.verbose)
          : 'No issues found'
      );
      return 0;
    }

    io.stdout(
      formatDiagnostics(args.file, diagnostics, args.format, args.verbose)
    );
    return diagnostics.some((d) => d.severity === 'error') ? 1 : 0;
  } catch (err) {
    io.stderr(formatError(err));
    return 1;
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function main(): void {
  process.exitCode = runCheck(process.argv.slice(2));
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
