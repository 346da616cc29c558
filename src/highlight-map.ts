import type { Lexeme, PunctuationSymbol } from './types.js';
import { PUNCTUATION } from './types.js';
import { isPrimitiveType, type Edition } from './lexer/edition.js';

// ============================================================
// HIGHLIGHT CATEGORIES
// ============================================================

export type HighlightCategory =
  | 'keyword'
  | 'operator'
  | 'string'
  | 'number'
  | 'bool'
  | 'comment'
  | 'docComment'
  | 'variableName'
  | 'typeName'
  | 'labelName'
  | 'punctuation'
  | 'bracket'
  | 'meta'
  | 'invalid';

// ============================================================
// PUNCTUATION HIGHLIGHT MAP
// ============================================================

export const PUNCTUATION_HIGHLIGHT_MAP: ReadonlyMap<
  PunctuationSymbol,
  HighlightCategory
> = new Map<PunctuationSymbol, HighlightCategory>([
  [PUNCTUATION.DOT, 'punctuation'],
  [PUNCTUATION.COMMA, 'punctuation'],
  [PUNCTUATION.SEMI, 'punctuation'],
  [PUNCTUATION.COLON, 'punctuation'],
  [PUNCTUATION.PATH_SEP, 'punctuation'],
  [PUNCTUATION.UNDERSCORE, 'punctuation'],

  // Arrows read as operators
  [PUNCTUATION.R_ARROW, 'operator'],
  [PUNCTUATION.FAT_ARROW, 'operator'],
  [PUNCTUATION.AT, 'operator'],

  // Brackets
  [PUNCTUATION.OPEN_PAREN, 'bracket'],
  [PUNCTUATION.CLOSE_PAREN, 'bracket'],
  [PUNCTUATION.OPEN_BRACKET, 'bracket'],
  [PUNCTUATION.CLOSE_BRACKET, 'bracket'],
  [PUNCTUATION.OPEN_BRACE, 'bracket'],
  [PUNCTUATION.CLOSE_BRACE, 'bracket'],

  // Attributes and macro variables
  [PUNCTUATION.POUND, 'meta'],
  [PUNCTUATION.DOLLAR, 'meta'],
]);

// ============================================================
// LEXEME CATEGORY
// ============================================================

/** Highlight category for a lexeme; null for whitespace */
export function highlightCategory(
  lexeme: Lexeme,
  edition: Edition
): HighlightCategory | null {
  const kind = lexeme.kind;
  switch (kind.tag) {
    case 'Whitespace':
      return null;
    case 'LineComment':
      return kind.isDoc ? 'docComment' : 'comment';
    case 'BlockComment':
      if (!kind.terminated) return 'invalid';
      return kind.isDoc ? 'docComment' : 'comment';
    case 'Keyword':
      return lexeme.text === 'true' || lexeme.text === 'false'
        ? 'bool'
        : 'keyword';
    case 'Identifier':
      return !kind.isRaw && isPrimitiveType(edition, lexeme.text)
        ? 'typeName'
        : 'variableName';
    case 'Lifetime':
      return 'labelName';
    case 'Literal':
      if (!kind.terminated) return 'invalid';
      return kind.literal.type === 'Integer' || kind.literal.type === 'Float'
        ? 'number'
        : 'string';
    case 'Operator':
      return 'operator';
    case 'Punctuation':
      return PUNCTUATION_HIGHLIGHT_MAP.get(kind.symbol) ?? 'punctuation';
    case 'Unknown':
      return 'invalid';
    default: {
      const _exhaustive: never = kind;
      return _exhaustive;
    }
  }
}
