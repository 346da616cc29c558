/**
 * Check Types
 * Type definitions for the lexeme checker.
 */

import type { Lexeme, LexemeTag, SourceLocation } from '../types.js';
import type { Edition } from '../lexer/edition.js';

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Rule state configuration */
export type RuleState = 'on' | 'off' | 'warn';

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/**
 * A single issue found in the lexeme sequence.
 */
export interface Diagnostic {
  /** Location of the issue in source */
  readonly location: SourceLocation;
  readonly severity: Severity;
  /** Rule code (e.g., UNKNOWN_CHARACTER) */
  readonly code: string;
  /** Registry error ID (e.g., LEX-L001) */
  readonly errorId: string;
  readonly message: string;
  /** Source line containing the issue, trimmed */
  readonly context: string;
}

// ============================================================
// CHECK CONFIGURATION
// ============================================================

/**
 * Configuration for check rules and severity overrides.
 */
export interface CheckConfig {
  /** Per-rule enable/disable/warn state */
  readonly rules: Record<string, RuleState>;
  /** Severity overrides by rule code */
  readonly severity: Record<string, Severity>;
  /** Edition to lexemize with (default: '2018') */
  readonly edition?: string | undefined;
}

// ============================================================
// VALIDATION CONTEXT
// ============================================================

export interface ValidationContext {
  /** Original source text */
  readonly source: string;
  /** Source split on '\n', shared by every diagnostic */
  readonly lines: readonly string[];
  readonly edition: Edition;
  readonly config: CheckConfig;
}

// ============================================================
// VALIDATION RULES
// ============================================================

/** Rule category for grouping and organization */
export type RuleCategory = 'lexical' | 'numbers' | 'literals' | 'keywords';

/**
 * Lexeme rule interface.
 * Rules are stateless and return diagnostics, never throw.
 */
export interface LexemeRule {
  /** Unique rule code (e.g., UNKNOWN_CHARACTER) */
  readonly code: string;

  readonly category: RuleCategory;

  /** Default severity level */
  readonly severity: Severity;

  /** Registry error ID whose template renders the message */
  readonly errorId: string;

  /** Lexeme kinds this rule applies to */
  readonly kinds: readonly LexemeTag[];

  validate(lexeme: Lexeme, context: ValidationContext): Diagnostic[];
}
