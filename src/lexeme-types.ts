import type { SourceSpan } from './source-location.js';

// ============================================================
// LEXEME TAGS
// ============================================================

export const LEXEME_KINDS = {
  WHITESPACE: 'Whitespace',
  LINE_COMMENT: 'LineComment',
  BLOCK_COMMENT: 'BlockComment',
  IDENTIFIER: 'Identifier',
  KEYWORD: 'Keyword',
  LIFETIME: 'Lifetime',
  LITERAL: 'Literal',
  OPERATOR: 'Operator',
  PUNCTUATION: 'Punctuation',
  UNKNOWN: 'Unknown',
} as const;

export type LexemeTag = (typeof LEXEME_KINDS)[keyof typeof LEXEME_KINDS];

// ============================================================
// SYMBOLS
// ============================================================

export const OPERATORS = {
  PLUS: 'Plus', // +
  MINUS: 'Minus', // -
  STAR: 'Star', // *
  SLASH: 'Slash', // /
  PERCENT: 'Percent', // %
  CARET: 'Caret', // ^
  NOT: 'Not', // !
  AND: 'And', // &
  OR: 'Or', // |
  AND_AND: 'AndAnd', // &&
  OR_OR: 'OrOr', // ||
  SHL: 'Shl', // <<
  SHR: 'Shr', // >>
  PLUS_EQ: 'PlusEq', // +=
  MINUS_EQ: 'MinusEq', // -=
  STAR_EQ: 'StarEq', // *=
  SLASH_EQ: 'SlashEq', // /=
  PERCENT_EQ: 'PercentEq', // %=
  CARET_EQ: 'CaretEq', // ^=
  AND_EQ: 'AndEq', // &=
  OR_EQ: 'OrEq', // |=
  SHL_EQ: 'ShlEq', // <<=
  SHR_EQ: 'ShrEq', // >>=
  EQ: 'Eq', // =
  EQ_EQ: 'EqEq', // ==
  NE: 'Ne', // !=
  GT: 'Gt', // >
  LT: 'Lt', // <
  GE: 'Ge', // >=
  LE: 'Le', // <=
  DOT_DOT: 'DotDot', // ..
  DOT_DOT_DOT: 'DotDotDot', // ...
  DOT_DOT_EQ: 'DotDotEq', // ..=
  QUESTION: 'Question', // ?
} as const;

export type OperatorSymbol = (typeof OPERATORS)[keyof typeof OPERATORS];

export const PUNCTUATION = {
  AT: 'At', // @
  UNDERSCORE: 'Underscore', // _
  DOT: 'Dot', // .
  COMMA: 'Comma', // ,
  SEMI: 'Semi', // ;
  COLON: 'Colon', // :
  PATH_SEP: 'PathSep', // ::
  R_ARROW: 'RArrow', // ->
  FAT_ARROW: 'FatArrow', // =>
  POUND: 'Pound', // #
  DOLLAR: 'Dollar', // $
  OPEN_PAREN: 'OpenParen',
  CLOSE_PAREN: 'CloseParen',
  OPEN_BRACKET: 'OpenBracket',
  CLOSE_BRACKET: 'CloseBracket',
  OPEN_BRACE: 'OpenBrace',
  CLOSE_BRACE: 'CloseBrace',
} as const;

export type PunctuationSymbol = (typeof PUNCTUATION)[keyof typeof PUNCTUATION];

// ============================================================
// LITERAL KINDS
// ============================================================

export type NumberBase = 'decimal' | 'binary' | 'octal' | 'hexadecimal';

export type LiteralKind =
  | {
      readonly type: 'Integer';
      readonly base: NumberBase;
      readonly suffix: string;
    }
  | {
      readonly type: 'Float';
      readonly base: NumberBase;
      readonly suffix: string;
    }
  | { readonly type: 'Char' }
  | { readonly type: 'ByteChar' }
  | { readonly type: 'String' }
  | { readonly type: 'ByteString' }
  | { readonly type: 'RawString'; readonly hashCount: number }
  | { readonly type: 'RawByteString'; readonly hashCount: number };

export type LiteralType = LiteralKind['type'];

// ============================================================
// LEXEME KINDS
// ============================================================

export type LexemeKind =
  | { readonly tag: 'Whitespace' }
  | { readonly tag: 'LineComment'; readonly isDoc: boolean }
  | {
      readonly tag: 'BlockComment';
      readonly isDoc: boolean;
      readonly terminated: boolean;
    }
  | { readonly tag: 'Identifier'; readonly isRaw: boolean }
  | { readonly tag: 'Keyword' }
  | { readonly tag: 'Lifetime' }
  | {
      readonly tag: 'Literal';
      readonly literal: LiteralKind;
      readonly terminated: boolean;
    }
  | { readonly tag: 'Operator'; readonly symbol: OperatorSymbol }
  | { readonly tag: 'Punctuation'; readonly symbol: PunctuationSymbol }
  | { readonly tag: 'Unknown' };

/** Narrow a lexeme kind by its tag */
export type LexemeKindOf<T extends LexemeTag> = Extract<LexemeKind, { tag: T }>;

// ============================================================
// LEXEME
// ============================================================

/**
 * One classified run of input text.
 * `text` is the exact slice of the input covered by `span`.
 */
export interface Lexeme {
  readonly kind: LexemeKind;
  readonly text: string;
  readonly span: SourceSpan;
}
