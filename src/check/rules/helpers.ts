/**
 * Shared Helper Functions
 * Common utilities used across lexeme rules.
 */

import type { Lexeme, SourceLocation } from '../../types.js';
import { createError } from '../../types.js';
import type {
  CheckConfig,
  Diagnostic,
  LexemeRule,
  Severity,
  ValidationContext,
} from '../types.js';

/**
 * Extract source line at location for context display.
 * Retrieves the specified line (1-indexed) and trims it.
 */
export function extractContextLine(
  line: number,
  lines: readonly string[]
): string {
  const sourceLine = lines[line - 1];
  return sourceLine ? sourceLine.trim() : '';
}

/**
 * Location of the code unit at `index` within a lexeme's text.
 */
export function locationWithin(lexeme: Lexeme, index: number): SourceLocation {
  let { line, column, offset } = lexeme.span.start;
  for (const ch of lexeme.text.slice(0, index)) {
    offset += Buffer.byteLength(ch, 'utf8');
    if (ch === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column, offset };
}

/**
 * Severity a rule reports at: 'warn' state downgrades to warning,
 * then the configured override, then the rule default.
 */
export function effectiveSeverity(
  code: string,
  defaultSeverity: Severity,
  config: CheckConfig
): Severity {
  if (config.rules[code] === 'warn') return 'warning';
  return config.severity[code] ?? defaultSeverity;
}

/**
 * Build a diagnostic for `rule` from the registry error it reports.
 * @throws TypeError if the rule's errorId is not registered
 */
export function createDiagnostic(
  rule: LexemeRule,
  context: ValidationContext,
  location: SourceLocation,
  params: Record<string, unknown>
): Diagnostic {
  const error = createError(rule.errorId, params, location).toData();

  return {
    location,
    severity: effectiveSeverity(rule.code, rule.severity, context.config),
    code: rule.code,
    errorId: error.errorId,
    message: error.message,
    context: extractContextLine(location.line, context.lines),
  };
}

/** Quote a character for a message, showing control characters as escapes */
export function quoteChar(ch: string): string {
  const cp = ch.codePointAt(0) ?? 0;
  if (cp < 0x20 || cp === 0x7f || (cp >= 0x80 && cp < 0xa0)) {
    return `'\\u{${cp.toString(16)}}'`;
  }
  return `'${ch}'`;
}
