/**
 * Character and String Literal Rules
 * Escapes, byte literal contents, char literal length and raw string hashes.
 */

import type { Lexeme } from '../../types.js';
import type { Diagnostic, LexemeRule } from '../types.js';
import { createDiagnostic, locationWithin, quoteChar } from './helpers.js';

/** Most hashes a raw string may use */
export const RAW_STRING_HASH_LIMIT_COUNT = 255;

// ============================================================
// QUOTED BODIES
// ============================================================

interface QuotedBody {
  readonly text: string;
  /** Index of the body within the lexeme text */
  readonly start: number;
  readonly isByte: boolean;
  readonly isChar: boolean;
}

/** Text between the quotes of a terminated escaped literal */
function quotedBody(lexeme: Lexeme): QuotedBody | null {
  const kind = lexeme.kind;
  if (kind.tag !== 'Literal' || !kind.terminated) return null;

  switch (kind.literal.type) {
    case 'Char':
    case 'String':
      return {
        text: lexeme.text.slice(1, -1),
        start: 1,
        isByte: false,
        isChar: kind.literal.type === 'Char',
      };
    case 'ByteChar':
    case 'ByteString':
      return {
        text: lexeme.text.slice(2, -1),
        start: 2,
        isByte: true,
        isChar: kind.literal.type === 'ByteChar',
      };
    default:
      return null;
  }
}

// ============================================================
// ESCAPES
// ============================================================

export interface Escape {
  /** Index of the backslash within the body */
  readonly index: number;
  readonly length: number;
  /** Why the escape is invalid, or null */
  readonly reason: string | null;
}

const SIMPLE_ESCAPES = new Set(['n', 'r', 't', '\\', '0', "'", '"']);

function unicodeEscape(text: string, index: number, isByte: boolean): Escape {
  if (text.charAt(index + 2) !== '{') {
    return { index, length: 2, reason: 'expected { after \\u' };
  }
  const close = text.indexOf('}', index + 3);
  if (close === -1) {
    return {
      index,
      length: text.length - index,
      reason: 'unclosed unicode escape',
    };
  }

  const length = close + 1 - index;
  if (isByte) {
    return {
      index,
      length,
      reason: 'unicode escapes are not allowed in byte literals',
    };
  }

  const digits = text.slice(index + 3, close);
  if (!/^[0-9a-fA-F][0-9a-fA-F_]*$/.test(digits)) {
    return { index, length, reason: 'expected hex digits' };
  }
  const hex = digits.replace(/_/g, '');
  if (hex.length > 6) {
    return { index, length, reason: 'at most 6 hex digits allowed' };
  }

  const value = parseInt(hex, 16);
  if (value > 0x10ffff) {
    return { index, length, reason: 'code point above 10FFFF' };
  }
  if (value >= 0xd800 && value <= 0xdfff) {
    return { index, length, reason: 'surrogate code point' };
  }
  return { index, length, reason: null };
}

/**
 * Parse the escape whose backslash is at `index`.
 * `\x` takes exactly two hex digits; `\u{...}` takes up to six.
 */
export function parseEscape(
  text: string,
  index: number,
  isByte: boolean,
  isChar: boolean
): Escape {
  const next = text.charAt(index + 1);

  if (SIMPLE_ESCAPES.has(next)) {
    return { index, length: 2, reason: null };
  }

  // Line continuation, strings only
  if (!isChar && next === '\n') {
    return { index, length: 2, reason: null };
  }
  if (!isChar && next === '\r' && text.charAt(index + 2) === '\n') {
    return { index, length: 3, reason: null };
  }

  if (next === 'x') {
    const digits = text.slice(index + 2, index + 4);
    if (!/^[0-9a-fA-F]{2}$/.test(digits)) {
      const taken = /^[0-9a-fA-F]*/.exec(digits)?.[0].length ?? 0;
      return {
        index,
        length: 2 + taken,
        reason: 'expected two hex digits',
      };
    }
    if (!isByte && parseInt(digits, 16) > 0x7f) {
      return { index, length: 4, reason: 'value above \\x7F' };
    }
    return { index, length: 4, reason: null };
  }

  if (next === 'u') {
    return unicodeEscape(text, index, isByte);
  }

  const cp = text.codePointAt(index + 1);
  const width = cp !== undefined && cp > 0xffff ? 2 : 1;
  return { index, length: 1 + width, reason: 'unknown character escape' };
}

/** Walk a literal body, returning every escape */
export function findEscapes(
  text: string,
  isByte: boolean,
  isChar: boolean
): Escape[] {
  const escapes: Escape[] = [];
  let i = 0;
  while (i < text.length) {
    if (text.charAt(i) === '\\') {
      const escape = parseEscape(text, i, isByte, isChar);
      escapes.push(escape);
      i += escape.length;
    } else {
      i++;
    }
  }
  return escapes;
}

/** Characters in a literal body, counting each escape as one */
export function countCharacters(
  text: string,
  isByte: boolean,
  isChar: boolean
): number {
  let count = 0;
  let i = 0;
  while (i < text.length) {
    if (text.charAt(i) === '\\') {
      i += parseEscape(text, i, isByte, isChar).length;
    } else {
      const cp = text.codePointAt(i) ?? 0;
      i += cp > 0xffff ? 2 : 1;
    }
    count++;
  }
  return count;
}

// ============================================================
// INVALID_ESCAPE
// ============================================================

export const INVALID_ESCAPE: LexemeRule = {
  code: 'INVALID_ESCAPE',
  category: 'literals',
  severity: 'error',
  errorId: 'LEX-L010',
  kinds: ['Literal'],

  validate(lexeme, context) {
    const body = quotedBody(lexeme);
    if (!body) return [];

    const diagnostics: Diagnostic[] = [];
    for (const escape of findEscapes(body.text, body.isByte, body.isChar)) {
      if (escape.reason === null) continue;
      diagnostics.push(
        createDiagnostic(
          INVALID_ESCAPE,
          context,
          locationWithin(lexeme, body.start + escape.index),
          {
            escape: body.text.slice(escape.index, escape.index + escape.length),
            reason: escape.reason,
          }
        )
      );
    }
    return diagnostics;
  },
};

// ============================================================
// NON_ASCII_BYTE_LITERAL
// ============================================================

export const NON_ASCII_BYTE_LITERAL: LexemeRule = {
  code: 'NON_ASCII_BYTE_LITERAL',
  category: 'literals',
  severity: 'error',
  errorId: 'LEX-L011',
  kinds: ['Literal'],

  validate(lexeme, context) {
    const kind = lexeme.kind;
    if (kind.tag !== 'Literal') return [];
    const type = kind.literal.type;
    if (
      type !== 'ByteChar' &&
      type !== 'ByteString' &&
      type !== 'RawByteString'
    ) {
      return [];
    }

    const index = lexeme.text.search(/[^\x00-\x7f]/);
    if (index === -1) return [];

    const cp = lexeme.text.codePointAt(index) ?? 0;
    return [
      createDiagnostic(
        NON_ASCII_BYTE_LITERAL,
        context,
        locationWithin(lexeme, index),
        { char: quoteChar(String.fromCodePoint(cp)) }
      ),
    ];
  },
};

// ============================================================
// CHAR_LITERAL_LENGTH
// ============================================================

export const CHAR_LITERAL_LENGTH: LexemeRule = {
  code: 'CHAR_LITERAL_LENGTH',
  category: 'literals',
  severity: 'error',
  errorId: 'LEX-L012',
  kinds: ['Literal'],

  validate(lexeme, context) {
    const body = quotedBody(lexeme);
    if (!body || !body.isChar) return [];

    const count = countCharacters(body.text, body.isByte, body.isChar);
    if (count === 1) return [];

    return [
      createDiagnostic(CHAR_LITERAL_LENGTH, context, lexeme.span.start, {
        literal: body.isByte ? 'Byte' : 'Character',
        count,
      }),
    ];
  },
};

// ============================================================
// RAW_STRING_HASH_LIMIT
// ============================================================

export const RAW_STRING_HASH_LIMIT: LexemeRule = {
  code: 'RAW_STRING_HASH_LIMIT',
  category: 'literals',
  severity: 'error',
  errorId: 'LEX-L013',
  kinds: ['Literal'],

  validate(lexeme, context) {
    const kind = lexeme.kind;
    if (kind.tag !== 'Literal') return [];
    const literal = kind.literal;
    if (literal.type !== 'RawString' && literal.type !== 'RawByteString') {
      return [];
    }
    if (literal.hashCount <= RAW_STRING_HASH_LIMIT_COUNT) return [];

    return [
      createDiagnostic(RAW_STRING_HASH_LIMIT, context, lexeme.span.start, {
        count: literal.hashCount,
        limit: RAW_STRING_HASH_LIMIT_COUNT,
      }),
    ];
  },
};
