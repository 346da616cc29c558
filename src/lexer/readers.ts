/**
 * Literal and Identifier Readers
 * Each reader starts at the first character of its lexeme and consumes all of it
 */

import type { Lexeme, LiteralKind, NumberBase } from '../types.js';
import { PUNCTUATION } from '../types.js';
import { isKeyword, type Edition } from './edition.js';
import {
  eatWhile,
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeLexeme,
} from './helpers.js';
import {
  advance,
  advanceBy,
  currentLocation,
  isAtEnd,
  peek,
  startsWith,
  type LexerState,
} from './state.js';

// ============================================================
// NUMBERS
// ============================================================

function eatDecimalDigits(state: LexerState): boolean {
  let hasDigits = false;
  while (true) {
    const ch = peek(state);
    if (ch === '_') {
      advance(state);
    } else if (isDigit(ch)) {
      hasDigits = true;
      advance(state);
    } else {
      return hasDigits;
    }
  }
}

function eatHexDigits(state: LexerState): boolean {
  let hasDigits = false;
  while (true) {
    const ch = peek(state);
    if (ch === '_') {
      advance(state);
    } else if (isHexDigit(ch)) {
      hasDigits = true;
      advance(state);
    } else {
      return hasDigits;
    }
  }
}

/** Exponent marker, optional sign and digits; the cursor is on the marker */
function eatExponent(state: LexerState): void {
  advance(state);
  const sign = peek(state);
  if (sign === '+' || sign === '-') advance(state);
  eatDecimalDigits(state);
}

const BASE_PREFIXES: Readonly<Record<string, NumberBase>> = {
  b: 'binary',
  o: 'octal',
  x: 'hexadecimal',
};

/**
 * Read an integer or float literal, suffix included.
 * Digits invalid for the base, empty exponents and unknown suffixes
 * stay inside the literal; the check rules report them.
 */
export function readNumber(state: LexerState): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  let base: NumberBase = 'decimal';
  let type: 'Integer' | 'Float' = 'Integer';

  const first = advance(state);
  const prefixed = first === '0' ? BASE_PREFIXES[peek(state)] : undefined;

  if (prefixed) {
    base = prefixed;
    advance(state);
    if (base === 'hexadecimal') {
      eatHexDigits(state);
    } else {
      eatDecimalDigits(state);
    }
  } else {
    eatDecimalDigits(state);
  }

  // A '.' must be followed by a digit, so `1.foo()` and `1..2` keep their dots
  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    type = 'Float';
    advance(state);
    eatDecimalDigits(state);
  }

  const marker = peek(state);
  if (base !== 'hexadecimal' && (marker === 'e' || marker === 'E')) {
    type = 'Float';
    eatExponent(state);
  }

  const suffixPos = state.pos;
  if (isIdentifierStart(peek(state))) {
    eatWhile(state, isIdentifierChar);
  }
  const suffix = state.source.slice(suffixPos, state.pos);

  return makeLexeme(
    state,
    { tag: 'Literal', literal: { type, base, suffix }, terminated: true },
    startPos,
    start
  );
}

// ============================================================
// STRINGS
// ============================================================

/**
 * Read a string body after its opening quote, through the closing quote.
 * A backslash consumes the character after it.
 * Returns false at end of input.
 */
function eatQuotedBody(state: LexerState): boolean {
  while (!isAtEnd(state)) {
    const ch = advance(state);
    if (ch === '"') return true;
    if (ch === '\\') advance(state);
  }
  return false;
}

/** Read `"..."` or `b"..."` */
export function readString(state: LexerState, byte: boolean): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  advanceBy(state, byte ? 2 : 1);
  const terminated = eatQuotedBody(state);
  const literal: LiteralKind = byte
    ? { type: 'ByteString' }
    : { type: 'String' };
  return makeLexeme(
    state,
    { tag: 'Literal', literal, terminated },
    startPos,
    start
  );
}

/**
 * Count the hashes of a raw string opener starting `prefixLength`
 * characters ahead (after `r` or `br`).
 * Returns null when the hashes are not followed by a quote.
 */
export function rawStringHashes(
  state: LexerState,
  prefixLength: number
): number | null {
  let hashes = 0;
  while (peek(state, prefixLength + hashes) === '#') hashes++;
  return peek(state, prefixLength + hashes) === '"' ? hashes : null;
}

/** Read `r#"..."#` or `br#"..."#`; no escapes, closes on a quote plus the same hashes */
export function readRawString(
  state: LexerState,
  byte: boolean,
  hashCount: number
): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  advanceBy(state, (byte ? 2 : 1) + hashCount + 1);

  const closing = '"' + '#'.repeat(hashCount);
  let terminated = false;
  while (!isAtEnd(state)) {
    if (startsWith(state, closing)) {
      advanceBy(state, closing.length);
      terminated = true;
      break;
    }
    advance(state);
  }

  const literal: LiteralKind = byte
    ? { type: 'RawByteString', hashCount }
    : { type: 'RawString', hashCount };
  return makeLexeme(
    state,
    { tag: 'Literal', literal, terminated },
    startPos,
    start
  );
}

// ============================================================
// CHARACTERS AND LIFETIMES
// ============================================================

/**
 * Read a single-quoted body after its opening quote.
 * Gives up at '/', at a newline not followed by a quote, and at end of input.
 */
function eatSingleQuotedBody(state: LexerState): boolean {
  if (peek(state, 1) === "'" && peek(state) !== '\\') {
    advanceBy(state, 2);
    return true;
  }

  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (ch === "'") {
      advance(state);
      return true;
    }
    if (ch === '/') return false;
    if (ch === '\n' && peek(state, 1) !== "'") return false;
    if (ch === '\\') {
      advanceBy(state, 2);
    } else {
      advance(state);
    }
  }
  return false;
}

/** Read `b'x'` */
export function readByteChar(state: LexerState): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  advanceBy(state, 2);
  const terminated = eatSingleQuotedBody(state);
  return makeLexeme(
    state,
    { tag: 'Literal', literal: { type: 'ByteChar' }, terminated },
    startPos,
    start
  );
}

/**
 * Read a lifetime (`'a`) or a char literal (`'a'`, `'\n'`).
 * `'ab'` is kept as one char literal so the check rules can report its length.
 */
export function readLifetimeOrChar(state: LexerState): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);
  advance(state);

  const canBeLifetime =
    peek(state, 1) !== "'" && isIdentifierStart(peek(state));
  if (!canBeLifetime) {
    const terminated = eatSingleQuotedBody(state);
    return makeLexeme(
      state,
      { tag: 'Literal', literal: { type: 'Char' }, terminated },
      startPos,
      start
    );
  }

  eatWhile(state, isIdentifierChar);
  if (peek(state) === "'") {
    advance(state);
    return makeLexeme(
      state,
      { tag: 'Literal', literal: { type: 'Char' }, terminated: true },
      startPos,
      start
    );
  }
  return makeLexeme(state, { tag: 'Lifetime' }, startPos, start);
}

// ============================================================
// IDENTIFIERS
// ============================================================

/** Read an identifier, raw identifier (`r#match`), keyword or lone `_` */
export function readIdentifier(state: LexerState, edition: Edition): Lexeme {
  const startPos = state.pos;
  const start = currentLocation(state);

  if (startsWith(state, 'r#') && isIdentifierStart(peek(state, 2))) {
    advanceBy(state, 2);
    eatWhile(state, isIdentifierChar);
    return makeLexeme(
      state,
      { tag: 'Identifier', isRaw: true },
      startPos,
      start
    );
  }

  eatWhile(state, isIdentifierChar);
  const text = state.source.slice(startPos, state.pos);

  if (text === '_') {
    return makeLexeme(
      state,
      { tag: 'Punctuation', symbol: PUNCTUATION.UNDERSCORE },
      startPos,
      start
    );
  }
  if (isKeyword(edition, text)) {
    return makeLexeme(state, { tag: 'Keyword' }, startPos, start);
  }
  return makeLexeme(
    state,
    { tag: 'Identifier', isRaw: false },
    startPos,
    start
  );
}
