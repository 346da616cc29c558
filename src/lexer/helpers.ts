/**
 * Lexer Helper Functions
 * Character classification and lexeme construction
 */

import type { Lexeme, LexemeKind, SourceLocation } from '../types.js';
import {
  advanceBy,
  currentLocation,
  isAtEnd,
  peek,
  type LexerState,
} from './state.js';

// ============================================================
// CHARACTER CLASSES
// ============================================================

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

const XID_START = /^\p{XID_Start}$/u;
const XID_CONTINUE = /^\p{XID_Continue}$/u;

export function isIdentifierStart(ch: string): boolean {
  if (ch === '_') return true;
  if (ch < '\x80') {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
  }
  return XID_START.test(ch);
}

export function isIdentifierChar(ch: string): boolean {
  if (ch === '') return false;
  if (ch < '\x80') {
    return isIdentifierStart(ch) || isDigit(ch);
  }
  return XID_CONTINUE.test(ch);
}

/** Pattern_White_Space */
const WHITESPACE = new Set([
  ' ',
  '\t',
  '\n',
  '\v',
  '\f',
  '\r',
  '\u0085',
  '\u200e',
  '\u200f',
  '\u2028',
  '\u2029',
]);

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.has(ch);
}

// ============================================================
// SCANNING
// ============================================================

/** Consume characters while `predicate` holds */
export function eatWhile(
  state: LexerState,
  predicate: (ch: string) => boolean
): void {
  while (!isAtEnd(state) && predicate(peek(state))) {
    advanceBy(state, 1);
  }
}

// ============================================================
// LEXEME CONSTRUCTION
// ============================================================

export function makeLexeme(
  state: LexerState,
  kind: LexemeKind,
  startPos: number,
  start: SourceLocation
): Lexeme {
  return {
    kind,
    text: state.source.slice(startPos, state.pos),
    span: { start, end: currentLocation(state) },
  };
}

/** Advance n characters and return a lexeme covering them */
export function advanceAndMakeLexeme(
  state: LexerState,
  n: number,
  kind: LexemeKind
): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  advanceBy(state, n);
  return makeLexeme(state, kind, startPos, start);
}
