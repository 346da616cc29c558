/**
 * Character and String Literal Rules Tests
 */

import { describe, it, expect } from 'vitest';
import { validateSource } from '../../../src/check/validator.js';
import {
  countCharacters,
  findEscapes,
  parseEscape,
} from '../../../src/check/rules/index.js';
import type { CheckConfig } from '../../../src/check/types.js';

// ============================================================
// TEST HELPERS
// ============================================================

function createConfig(): CheckConfig {
  return {
    rules: {
      INVALID_ESCAPE: 'on',
      NON_ASCII_BYTE_LITERAL: 'on',
      CHAR_LITERAL_LENGTH: 'on',
      RAW_STRING_HASH_LIMIT: 'on',
    },
    severity: {},
  };
}

function getMessages(source: string): string[] {
  return validateSource(source, createConfig()).map((d) => d.message);
}

// ============================================================
// ESCAPE PARSING
// ============================================================

describe('parseEscape', () => {
  it('accepts simple escapes', () => {
    expect(parseEscape('\\n', 0, false, false)).toEqual({
      index: 0,
      length: 2,
      reason: null,
    });
  });

  it('measures unicode escapes', () => {
    expect(parseEscape('a\\u{1F_600}b', 1, false, true)).toEqual({
      index: 1,
      length: 10,
      reason: null,
    });
  });

  it('accepts line continuations in strings only', () => {
    expect(parseEscape('\\\r\n', 0, false, false).reason).toBeNull();
    expect(parseEscape('\\\n', 0, false, true).reason).toBe(
      'unknown character escape'
    );
  });
});

describe('findEscapes', () => {
  it('skips over escaped backslashes', () => {
    expect(findEscapes('\\\\q\\t', false, false)).toEqual([
      { index: 0, length: 2, reason: null },
      { index: 3, length: 2, reason: null },
    ]);
  });
});

describe('countCharacters', () => {
  it('counts escapes and astral characters once', () => {
    expect(countCharacters('\\u{41}', false, true)).toBe(1);
    expect(countCharacters('😀', false, true)).toBe(1);
    expect(countCharacters('a\\n', false, true)).toBe(2);
  });
});

// ============================================================
// INVALID_ESCAPE
// ============================================================

describe('INVALID_ESCAPE', () => {
  it('reports unknown escapes at the backslash', () => {
    const diagnostics = validateSource("'\\q'", createConfig());
    expect(diagnostics.map((d) => [d.message, d.location.column])).toEqual([
      ['Invalid escape \\q: unknown character escape', 2],
    ]);
  });

  it.each([
    ['"\\x80"', 'Invalid escape \\x80: value above \\x7F'],
    ['"\\x4"', 'Invalid escape \\x4: expected two hex digits'],
    ['"\\u1234"', 'Invalid escape \\u: expected { after \\u'],
    ['"\\u{}"', 'Invalid escape \\u{}: expected hex digits'],
    [
      '"\\u{1234567}"',
      'Invalid escape \\u{1234567}: at most 6 hex digits allowed',
    ],
    ['"\\u{110000}"', 'Invalid escape \\u{110000}: code point above 10FFFF'],
    ['"\\u{D800}"', 'Invalid escape \\u{D800}: surrogate code point'],
    [
      'b"\\u{41}"',
      'Invalid escape \\u{41}: unicode escapes are not allowed in byte literals',
    ],
  ])('reports %s', (source, message) => {
    expect(getMessages(source)).toEqual([message]);
  });

  it('allows high bytes in byte literals', () => {
    expect(getMessages('b"\\x80" b\'\\xff\'')).toEqual([]);
  });

  it('accepts valid escapes and line continuations', () => {
    expect(getMessages('"\\n\\t\\0\\\\\\"\\u{1F600}\\\n  x"')).toEqual([]);
  });

  it('ignores raw strings', () => {
    expect(getMessages('r"\\q"')).toEqual([]);
  });

  it('locates escapes on later lines', () => {
    const [diagnostic] = validateSource('"a\n \\q"', createConfig());
    expect(diagnostic?.location).toEqual({ line: 2, column: 2, offset: 4 });
  });
});

// ============================================================
// NON_ASCII_BYTE_LITERAL
// ============================================================

describe('NON_ASCII_BYTE_LITERAL', () => {
  it('reports the first non-ASCII character', () => {
    const diagnostics = validateSource('b"café ü"', createConfig());
    expect(diagnostics.map((d) => [d.message, d.location.column])).toEqual([
      ["Non-ASCII character 'é' in byte literal", 6],
    ]);
  });

  it('checks byte chars and raw byte strings', () => {
    expect(getMessages("b'é'")).toEqual([
      "Non-ASCII character 'é' in byte literal",
    ]);
    expect(getMessages('br"ü"')).toEqual([
      "Non-ASCII character 'ü' in byte literal",
    ]);
  });

  it('ignores other literals', () => {
    expect(getMessages('"café" \'é\'')).toEqual([]);
  });
});

// ============================================================
// CHAR_LITERAL_LENGTH
// ============================================================

describe('CHAR_LITERAL_LENGTH', () => {
  it('reports chars with more or fewer than one character', () => {
    expect(getMessages("'ab'")).toEqual([
      'Character literal must contain exactly one character, found 2',
    ]);
    expect(getMessages("''")).toEqual([
      'Character literal must contain exactly one character, found 0',
    ]);
    expect(getMessages("b'ab'")).toEqual([
      'Byte literal must contain exactly one character, found 2',
    ]);
  });

  it('accepts single characters and escapes', () => {
    expect(getMessages("'a' '\\n' '\\u{1F600}' '😀' b'\\''")).toEqual([]);
  });
});

// ============================================================
// RAW_STRING_HASH_LIMIT
// ============================================================

describe('RAW_STRING_HASH_LIMIT', () => {
  it('reports more than 255 hashes', () => {
    const hashes = '#'.repeat(256);
    expect(getMessages(`r${hashes}"x"${hashes}`)).toEqual([
      'Raw string uses 256 hashes (maximum 255)',
    ]);
  });

  it('accepts 255 hashes', () => {
    const hashes = '#'.repeat(255);
    expect(getMessages(`br${hashes}"x"${hashes}`)).toEqual([]);
  });
});
