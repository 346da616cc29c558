/**
 * Lexer State
 * Forward-only cursor over the source text with position tracking
 */

import type { SourceLocation } from '../types.js';

/**
 * `pos` indexes UTF-16 code units and is used for slicing.
 * `offset` is the matching UTF-8 byte offset reported in locations.
 */
export interface LexerState {
  readonly source: string;
  pos: number;
  offset: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    offset: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.offset };
}

/** Character (code point) `ahead` characters past the cursor, '' past the end */
export function peek(state: LexerState, ahead = 0): string {
  let index = state.pos;
  for (let i = 0; i < ahead; i++) {
    const cp = state.source.codePointAt(index);
    if (cp === undefined) return '';
    index += cp > 0xffff ? 2 : 1;
  }
  const cp = state.source.codePointAt(index);
  return cp === undefined ? '' : String.fromCodePoint(cp);
}

/** Next `length` code units; symbols and prefixes are ASCII */
export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function startsWith(state: LexerState, text: string): boolean {
  return state.source.startsWith(text, state.pos);
}

function utf8Width(cp: number): number {
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

/** Consume one character; no-op at end of input */
export function advance(state: LexerState): string {
  const cp = state.source.codePointAt(state.pos);
  if (cp === undefined) return '';

  const ch = String.fromCodePoint(cp);
  state.pos += ch.length;
  state.offset += utf8Width(cp);
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function advanceBy(state: LexerState, count: number): void {
  for (let i = 0; i < count; i++) advance(state);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
