/**
 * Lexemizer Types
 * Lexeme model, source locations and error taxonomy
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export {
  LEXEME_KINDS,
  OPERATORS,
  PUNCTUATION,
  type Lexeme,
  type LexemeKind,
  type LexemeKindOf,
  type LexemeTag,
  type LiteralKind,
  type LiteralType,
  type NumberBase,
  type OperatorSymbol,
  type PunctuationSymbol,
} from './lexeme-types.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type ErrorSeverity,
} from './error-registry.js';
export {
  ConfigurationError,
  createError,
  LexemizerError,
  type LexemizerErrorData,
} from './error-classes.js';
