/**
 * Comment Readers
 * Line comments, nested block comments and shebang lines
 */

import type { Lexeme } from '../types.js';
import { isWhitespace, makeLexeme } from './helpers.js';
import {
  advance,
  advanceBy,
  currentLocation,
  isAtEnd,
  peek,
  peekString,
  startsWith,
  type LexerState,
} from './state.js';

/** Consume up to, not including, the line terminator (`\n` or `\r\n`) */
function eatToLineEnd(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (ch === '\n') return;
    if (ch === '\r' && peek(state, 1) === '\n') return;
    advance(state);
  }
}

/** `///` (but not `////`) and `//!` open doc comments */
function isLineDoc(opener: string): boolean {
  if (opener.startsWith('//!')) return true;
  return opener.startsWith('///') && opener !== '////';
}

/** `/*!` and `/**` open doc comments, unless `/**` is followed by `*` or `/` */
function isBlockDoc(opener: string): boolean {
  if (opener.startsWith('/*!')) return true;
  return opener.startsWith('/**') && opener !== '/***' && opener !== '/**/';
}

export function readLineComment(state: LexerState): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  const isDoc = isLineDoc(peekString(state, 4));
  eatToLineEnd(state);
  return makeLexeme(state, { tag: 'LineComment', isDoc }, startPos, start);
}

/** Read a nested block comment; it closes when the depth returns to zero */
export function readBlockComment(state: LexerState): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  const isDoc = isBlockDoc(peekString(state, 4));

  advanceBy(state, 2);
  let depth = 1;
  while (!isAtEnd(state)) {
    if (startsWith(state, '/*')) {
      advanceBy(state, 2);
      depth++;
    } else if (startsWith(state, '*/')) {
      advanceBy(state, 2);
      depth--;
      if (depth === 0) break;
    } else {
      advance(state);
    }
  }

  return makeLexeme(
    state,
    { tag: 'BlockComment', isDoc, terminated: depth === 0 },
    startPos,
    start
  );
}

/**
 * `#!` at the very start is a shebang line, unless the next
 * non-whitespace character is `[` (an inner attribute, `#![...]`).
 */
export function isShebang(state: LexerState): boolean {
  if (state.pos !== 0 || !startsWith(state, '#!')) return false;
  let ahead = 2;
  while (isWhitespace(peek(state, ahead))) ahead++;
  return peek(state, ahead) !== '[';
}

export function readShebang(state: LexerState): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  eatToLineEnd(state);
  return makeLexeme(
    state,
    { tag: 'LineComment', isDoc: false },
    startPos,
    start
  );
}
