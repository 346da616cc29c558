/**
 * Lexeme Validator
 * Runs enabled rules over a lexeme sequence.
 */

import type { Lexeme } from '../types.js';
import { resolveEdition, type Edition } from '../lexer/edition.js';
import { lexemize } from '../lexer/tokenizer.js';
import type { CheckConfig, Diagnostic, ValidationContext } from './types.js';
import { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// VALIDATION ORCHESTRATOR
// ============================================================

/**
 * Validate lexemes against all enabled rules.
 * Returns diagnostics sorted by line number, then column.
 *
 * @param source - Original source text for context extraction
 * @param edition - Defaults to the configured edition
 */
export function validateLexemes(
  lexemes: readonly Lexeme[],
  source: string,
  config: CheckConfig,
  edition: Edition = resolveEdition(config.edition)
): Diagnostic[] {
  const context: ValidationContext = {
    source,
    lines: source.split('\n'),
    edition,
    config,
  };
  const diagnostics: Diagnostic[] = [];

  const enabled = VALIDATION_RULES.filter((rule) =>
    isRuleEnabled(rule.code, config)
  );

  for (const lexeme of lexemes) {
    for (const rule of enabled) {
      if (!rule.kinds.includes(lexeme.kind.tag)) {
        continue;
      }
      diagnostics.push(...rule.validate(lexeme, context));
    }
  }

  return sortDiagnostics(diagnostics);
}

/**
 * Lexemize `source` with the configured edition and validate the result.
 *
 * @throws ConfigurationError for an unsupported edition
 */
export function validateSource(
  source: string,
  config: CheckConfig
): Diagnostic[] {
  const edition = resolveEdition(config.edition);
  return validateLexemes(
    lexemize(source, { edition }),
    source,
    config,
    edition
  );
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Rules are enabled if state is 'on' or 'warn'.
 */
function isRuleEnabled(ruleCode: string, config: CheckConfig): boolean {
  const state = config.rules[ruleCode];
  return state === 'on' || state === 'warn';
}

/**
 * Sort diagnostics by line number first, then column number.
 * Stable sort preserves original order for diagnostics at same location.
 */
function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort((a, b) => {
    if (a.location.line !== b.location.line) {
      return a.location.line - b.location.line;
    }
    return a.location.column - b.location.column;
  });
}
