/**
 * CLI Shared Utilities
 * Argument helpers, file reading and error formatting for CLI tools
 */

import { readFileSync, statSync } from 'node:fs';
import type { OutputFormat } from './format.js';
import { LexemizerError } from './types.js';

// ============================================================
// OUTPUT
// ============================================================

/** Where a CLI writes; tests pass collectors */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const CONSOLE_IO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/**
 * Format error for stderr output
 */
export function formatError(err: unknown): string {
  if (err instanceof LexemizerError) {
    return err.format((data) => `Error [${data.errorId}]: ${data.message}`);
  }
  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}

/**
 * Package version string, read from package.json
 */
export function readVersion(): string {
  const url = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}

// ============================================================
// ARGUMENTS
// ============================================================

/**
 * Read the value following `flag`, or undefined when the flag is absent.
 * @throws Error when the flag has no value
 */
export function readFlagValue(
  argv: readonly string[],
  flag: string,
  expected: string
): string | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`${flag} requires argument: ${expected}`);
  }
  return value;
}

/**
 * Parse `--format text|json` (default text)
 */
export function parseFormatFlag(argv: readonly string[]): OutputFormat {
  const value = readFlagValue(argv, '--format', 'text or json');
  if (value === undefined) return 'text';
  if (value === 'text' || value === 'json') return value;
  throw new Error(`Invalid format: ${value}. Expected text or json`);
}

/**
 * Reject flags not in `knownFlags`; values of `valueFlags` are skipped.
 * Returns the positional arguments.
 */
export function collectPositionals(
  argv: readonly string[],
  knownFlags: ReadonlySet<string>,
  valueFlags: ReadonlySet<string>
): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-')) {
      positionals.push(arg);
      continue;
    }
    if (!knownFlags.has(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (valueFlags.has(arg)) {
      i++;
    }
  }
  return positionals;
}

// ============================================================
// FILES
// ============================================================

export type SourceFileResult =
  | { readonly ok: true; readonly source: string }
  | { readonly ok: false; readonly message: string };

/**
 * Read a source file, describing why it could not be read.
 */
export function readSourceFile(file: string): SourceFileResult {
  try {
    if (statSync(file).isDirectory()) {
      return { ok: false, message: `Error: Path is a directory: ${file}` };
    }
    return { ok: true, source: readFileSync(file, 'utf-8') };
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { ok: false, message: `Error: File not found: ${file}` };
    }
    return { ok: false, message: `Error: Cannot read file: ${file}` };
  }
}
