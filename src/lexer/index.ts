/**
 * Lexer Module
 */

export {
  lexemize,
  nextLexeme,
  scanLexemes,
  type LexemizeOptions,
} from './tokenizer.js';
export {
  createEdition,
  DEFAULT_EDITION,
  isKeyword,
  isPrimitiveType,
  isReservedKeyword,
  loadEdition,
  parseEditionDefinition,
  resolveEdition,
  SUPPORTED_EDITIONS,
  type Edition,
  type EditionDefinition,
  type EditionName,
} from './edition.js';
export { createLexerState, type LexerState } from './state.js';
export {
  isIdentifierChar,
  isIdentifierStart,
  isWhitespace,
} from './helpers.js';
