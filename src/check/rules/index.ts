/**
 * Lexeme Rules Registry
 * Barrel export for all lexeme rules.
 */

import type { LexemeRule } from '../types.js';
import {
  UNKNOWN_CHARACTER,
  UNTERMINATED_BLOCK_COMMENT,
  UNTERMINATED_LITERAL,
} from './lexical.js';
import {
  NUMBER_EMPTY_EXPONENT,
  NUMBER_INVALID_DIGIT,
  NUMBER_INVALID_SUFFIX,
  NUMBER_MISSING_DIGITS,
  NUMBER_NON_DECIMAL_FLOAT,
  NUMBER_SEPARATOR_STYLE,
} from './numbers.js';
import {
  CHAR_LITERAL_LENGTH,
  INVALID_ESCAPE,
  NON_ASCII_BYTE_LITERAL,
  RAW_STRING_HASH_LIMIT,
} from './literals.js';
import { RESERVED_KEYWORD } from './keywords.js';

// ============================================================
// RE-EXPORT INDIVIDUAL RULES
// ============================================================

export {
  UNKNOWN_CHARACTER,
  UNTERMINATED_BLOCK_COMMENT,
  UNTERMINATED_LITERAL,
} from './lexical.js';
export {
  NUMBER_EMPTY_EXPONENT,
  NUMBER_INVALID_DIGIT,
  NUMBER_INVALID_SUFFIX,
  NUMBER_MISSING_DIGITS,
  NUMBER_NON_DECIMAL_FLOAT,
  NUMBER_SEPARATOR_STYLE,
  splitNumber,
} from './numbers.js';
export {
  CHAR_LITERAL_LENGTH,
  countCharacters,
  findEscapes,
  INVALID_ESCAPE,
  NON_ASCII_BYTE_LITERAL,
  parseEscape,
  RAW_STRING_HASH_LIMIT,
  type Escape,
} from './literals.js';
export { RESERVED_KEYWORD } from './keywords.js';

// ============================================================
// RULE REGISTRY
// ============================================================

/** All lexeme rules, in reporting order */
export const VALIDATION_RULES: readonly LexemeRule[] = [
  UNKNOWN_CHARACTER,
  UNTERMINATED_LITERAL,
  UNTERMINATED_BLOCK_COMMENT,
  NUMBER_MISSING_DIGITS,
  NUMBER_INVALID_DIGIT,
  NUMBER_EMPTY_EXPONENT,
  NUMBER_INVALID_SUFFIX,
  NUMBER_NON_DECIMAL_FLOAT,
  NUMBER_SEPARATOR_STYLE,
  INVALID_ESCAPE,
  NON_ASCII_BYTE_LITERAL,
  CHAR_LITERAL_LENGTH,
  RAW_STRING_HASH_LIMIT,
  RESERVED_KEYWORD,
];
