/**
 * Lexemizer
 * First-character dispatch; one lexeme per call, covering the whole input
 */

import type { Lexeme } from '../types.js';
import { resolveEdition, type Edition } from './edition.js';
import {
  isShebang,
  readBlockComment,
  readLineComment,
  readShebang,
} from './comments.js';
import {
  advanceAndMakeLexeme,
  eatWhile,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeLexeme,
} from './helpers.js';
import { matchSymbol } from './operators.js';
import {
  rawStringHashes,
  readByteChar,
  readIdentifier,
  readLifetimeOrChar,
  readNumber,
  readRawString,
  readString,
} from './readers.js';
import {
  createLexerState,
  currentLocation,
  isAtEnd,
  peek,
  peekString,
  type LexerState,
} from './state.js';

export interface LexemizeOptions {
  /** Edition name or a prebuilt edition (default: '2018') */
  readonly edition?: string | Edition | undefined;
}

/** Lookahead long enough for the longest symbol */
const SYMBOL_LOOKAHEAD = 3;

/**
 * Scan the lexeme at the cursor.
 * Returns null only at end of input.
 */
export function nextLexeme(
  state: LexerState,
  edition: Edition
): Lexeme | null {
  if (isAtEnd(state)) return null;

  if (isShebang(state)) {
    return readShebang(state);
  }

  const ch = peek(state);

  if (isWhitespace(ch)) {
    const startPos = state.pos;
    const start = currentLocation(state);
    eatWhile(state, isWhitespace);
    return makeLexeme(state, { tag: 'Whitespace' }, startPos, start);
  }

  // Comments
  const two = peekString(state, 2);
  if (two === '//') return readLineComment(state);
  if (two === '/*') return readBlockComment(state);

  // Lifetime or char
  if (ch === "'") {
    return readLifetimeOrChar(state);
  }

  // Strings and byte literals
  if (ch === '"') {
    return readString(state, false);
  }
  if (ch === 'b') {
    const next = peek(state, 1);
    if (next === '"') return readString(state, true);
    if (next === "'") return readByteChar(state);
    if (next === 'r') {
      const hashes = rawStringHashes(state, 2);
      if (hashes !== null) return readRawString(state, true, hashes);
    }
  }
  if (ch === 'r') {
    const hashes = rawStringHashes(state, 1);
    if (hashes !== null) return readRawString(state, false, hashes);
  }

  // Number
  if (isDigit(ch)) {
    return readNumber(state);
  }

  // Raw identifier, identifier or keyword
  if (
    isIdentifierStart(ch) ||
    (two === 'r#' && isIdentifierStart(peek(state, 2)))
  ) {
    return readIdentifier(state, edition);
  }

  const symbol = matchSymbol(peekString(state, SYMBOL_LOOKAHEAD));
  if (symbol) {
    return advanceAndMakeLexeme(state, symbol.length, symbol.kind);
  }

  return advanceAndMakeLexeme(state, 1, { tag: 'Unknown' });
}

/**
 * Lazily scan `source`.
 * The edition is resolved before the first lexeme is requested, so an
 * unsupported edition throws here rather than on iteration.
 *
 * @throws ConfigurationError for an unsupported or invalid edition
 */
export function scanLexemes(
  source: string,
  options: LexemizeOptions = {}
): IterableIterator<Lexeme> {
  const edition = resolveEdition(options.edition);
  return generateLexemes(createLexerState(source), edition);
}

function* generateLexemes(
  state: LexerState,
  edition: Edition
): IterableIterator<Lexeme> {
  let lexeme = nextLexeme(state, edition);
  while (lexeme !== null) {
    yield lexeme;
    lexeme = nextLexeme(state, edition);
  }
}

/** Scan `source` into an array of lexemes */
export function lexemize(
  source: string,
  options: LexemizeOptions = {}
): Lexeme[] {
  return [...scanLexemes(source, options)];
}
