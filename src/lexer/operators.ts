/**
 * Operator and Punctuation Lookup Tables
 */

import type {
  LexemeKindOf,
  OperatorSymbol,
  PunctuationSymbol,
} from '../types.js';
import { OPERATORS, PUNCTUATION } from '../types.js';

export type SymbolKind = LexemeKindOf<'Operator'> | LexemeKindOf<'Punctuation'>;

function op(symbol: OperatorSymbol): SymbolKind {
  return { tag: 'Operator', symbol };
}

function punct(symbol: PunctuationSymbol): SymbolKind {
  return { tag: 'Punctuation', symbol };
}

/** Three-character symbol lookup table */
export const THREE_CHAR_SYMBOLS: Readonly<Record<string, SymbolKind>> = {
  '...': op(OPERATORS.DOT_DOT_DOT),
  '..=': op(OPERATORS.DOT_DOT_EQ),
  '<<=': op(OPERATORS.SHL_EQ),
  '>>=': op(OPERATORS.SHR_EQ),
};

/** Two-character symbol lookup table */
export const TWO_CHAR_SYMBOLS: Readonly<Record<string, SymbolKind>> = {
  '-=': op(OPERATORS.MINUS_EQ),
  '->': punct(PUNCTUATION.R_ARROW),
  '::': punct(PUNCTUATION.PATH_SEP),
  '!=': op(OPERATORS.NE),
  '..': op(OPERATORS.DOT_DOT),
  '*=': op(OPERATORS.STAR_EQ),
  '/=': op(OPERATORS.SLASH_EQ),
  '&&': op(OPERATORS.AND_AND),
  '&=': op(OPERATORS.AND_EQ),
  '%=': op(OPERATORS.PERCENT_EQ),
  '^=': op(OPERATORS.CARET_EQ),
  '+=': op(OPERATORS.PLUS_EQ),
  '<<': op(OPERATORS.SHL),
  '<=': op(OPERATORS.LE),
  '==': op(OPERATORS.EQ_EQ),
  '=>': punct(PUNCTUATION.FAT_ARROW),
  '>=': op(OPERATORS.GE),
  '>>': op(OPERATORS.SHR),
  '|=': op(OPERATORS.OR_EQ),
  '||': op(OPERATORS.OR_OR),
};

/** Single-character symbol lookup table ('_' is matched by the identifier reader) */
export const SINGLE_CHAR_SYMBOLS: Readonly<Record<string, SymbolKind>> = {
  '-': op(OPERATORS.MINUS),
  ',': punct(PUNCTUATION.COMMA),
  ';': punct(PUNCTUATION.SEMI),
  ':': punct(PUNCTUATION.COLON),
  '!': op(OPERATORS.NOT),
  '?': op(OPERATORS.QUESTION),
  '.': punct(PUNCTUATION.DOT),
  '(': punct(PUNCTUATION.OPEN_PAREN),
  ')': punct(PUNCTUATION.CLOSE_PAREN),
  '[': punct(PUNCTUATION.OPEN_BRACKET),
  ']': punct(PUNCTUATION.CLOSE_BRACKET),
  '{': punct(PUNCTUATION.OPEN_BRACE),
  '}': punct(PUNCTUATION.CLOSE_BRACE),
  '@': punct(PUNCTUATION.AT),
  '*': op(OPERATORS.STAR),
  '/': op(OPERATORS.SLASH),
  '&': op(OPERATORS.AND),
  '#': punct(PUNCTUATION.POUND),
  '%': op(OPERATORS.PERCENT),
  '^': op(OPERATORS.CARET),
  '+': op(OPERATORS.PLUS),
  '<': op(OPERATORS.LT),
  '=': op(OPERATORS.EQ),
  '>': op(OPERATORS.GT),
  '|': op(OPERATORS.OR),
  $: punct(PUNCTUATION.DOLLAR),
};

/** Longest symbol starting at the given characters, or null */
export function matchSymbol(
  lookahead: string
): { readonly kind: SymbolKind; readonly length: number } | null {
  for (const [length, table] of [
    [3, THREE_CHAR_SYMBOLS],
    [2, TWO_CHAR_SYMBOLS],
    [1, SINGLE_CHAR_SYMBOLS],
  ] as const) {
    if (lookahead.length < length) continue;
    const kind = table[lookahead.slice(0, length)];
    if (kind) return { kind, length };
  }
  return null;
}
