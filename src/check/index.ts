/**
 * Check Module
 * Lexeme diagnostics for lexemize-check
 */

export type {
  CheckConfig,
  Diagnostic,
  LexemeRule,
  RuleCategory,
  RuleState,
  Severity,
  ValidationContext,
} from './types.js';
export {
  CONFIG_FILE_NAMES,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from './config.js';
export { validateLexemes, validateSource } from './validator.js';
export { VALIDATION_RULES } from './rules/index.js';
export { effectiveSeverity, extractContextLine } from './rules/helpers.js';
