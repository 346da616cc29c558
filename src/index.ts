/**
 * Lexemizer Module
 * Exports the lexer, lexeme types, errors, highlighting and checks
 */

export {
  createEdition,
  createLexerState,
  DEFAULT_EDITION,
  isKeyword,
  isPrimitiveType,
  isReservedKeyword,
  lexemize,
  loadEdition,
  nextLexeme,
  parseEditionDefinition,
  resolveEdition,
  scanLexemes,
  SUPPORTED_EDITIONS,
  type Edition,
  type EditionDefinition,
  type EditionName,
  type LexemizeOptions,
  type LexerState,
} from './lexer/index.js';
export * from './types.js';
export {
  describeKind,
  escapeSnippet,
  formatLexemes,
  type OutputFormat,
} from './format.js';
export {
  highlightCategory,
  PUNCTUATION_HIGHLIGHT_MAP,
  type HighlightCategory,
} from './highlight-map.js';
export {
  createDefaultConfig,
  loadConfig,
  parseConfig,
  validateLexemes,
  validateSource,
  VALIDATION_RULES,
  type CheckConfig,
  type Diagnostic,
  type LexemeRule,
  type RuleCategory,
  type RuleState,
  type Severity,
} from './check/index.js';
