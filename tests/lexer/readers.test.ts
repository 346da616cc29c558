/**
 * Literal and Identifier Reader Tests
 */

import { describe, expect, it } from 'vitest';
import { lexemize } from '../../src/index.js';
import { onlyKind, tagged } from '../helpers/lexemes.js';

describe('numbers', () => {
  it('reads a decimal integer', () => {
    expect(onlyKind('1_000')).toEqual({
      tag: 'Literal',
      literal: { type: 'Integer', base: 'decimal', suffix: '' },
      terminated: true,
    });
  });

  it('reads prefixed integers with suffixes', () => {
    expect(onlyKind('0x1F_u8')).toEqual({
      tag: 'Literal',
      literal: { type: 'Integer', base: 'hexadecimal', suffix: 'u8' },
      terminated: true,
    });
    expect(onlyKind('0b1010i32')).toEqual({
      tag: 'Literal',
      literal: { type: 'Integer', base: 'binary', suffix: 'i32' },
      terminated: true,
    });
    expect(onlyKind('0o77')).toEqual({
      tag: 'Literal',
      literal: { type: 'Integer', base: 'octal', suffix: '' },
      terminated: true,
    });
  });

  it('reads floats with fractions and exponents', () => {
    expect(onlyKind('1.5e-3f32')).toEqual({
      tag: 'Literal',
      literal: { type: 'Float', base: 'decimal', suffix: 'f32' },
      terminated: true,
    });
    expect(onlyKind('2E10')).toEqual({
      tag: 'Literal',
      literal: { type: 'Float', base: 'decimal', suffix: '' },
      terminated: true,
    });
  });

  it('keeps a dot not followed by a digit out of the literal', () => {
    expect(tagged('1.foo')).toEqual([
      ['1', 'Literal'],
      ['.', 'Punctuation'],
      ['foo', 'Identifier'],
    ]);
    expect(tagged('1..2')).toEqual([
      ['1', 'Literal'],
      ['..', 'Operator'],
      ['2', 'Literal'],
    ]);
  });

  it('treats e in a hexadecimal literal as a digit', () => {
    expect(onlyKind('0x1e5')).toEqual({
      tag: 'Literal',
      literal: { type: 'Integer', base: 'hexadecimal', suffix: '' },
      terminated: true,
    });
  });

  it('keeps out-of-range digits inside the literal', () => {
    expect(tagged('0b102')).toEqual([['0b102', 'Literal']]);
  });

  it('keeps an empty exponent inside the literal', () => {
    expect(tagged('1e+')).toEqual([['1e+', 'Literal']]);
  });

  it('reads a bare prefix as a literal', () => {
    expect(onlyKind('0x')).toEqual({
      tag: 'Literal',
      literal: { type: 'Integer', base: 'hexadecimal', suffix: '' },
      terminated: true,
    });
  });

  it('reads a float on a binary literal so the checker can reject it', () => {
    expect(onlyKind('0b1.0')).toEqual({
      tag: 'Literal',
      literal: { type: 'Float', base: 'binary', suffix: '' },
      terminated: true,
    });
  });
});

describe('strings', () => {
  it('reads a string with escapes', () => {
    expect(tagged('"a\\"b" x')).toEqual([
      ['"a\\"b"', 'Literal'],
      [' ', 'Whitespace'],
      ['x', 'Identifier'],
    ]);
  });

  it('reads multi-line strings', () => {
    const [lexeme] = lexemize('"a\nb"');
    expect(lexeme?.span.end).toEqual({ line: 2, column: 3, offset: 5 });
  });

  it('marks an unterminated string', () => {
    expect(onlyKind('"abc')).toEqual({
      tag: 'Literal',
      literal: { type: 'String' },
      terminated: false,
    });
  });

  it('reads byte strings', () => {
    expect(onlyKind('b"hi"')).toEqual({
      tag: 'Literal',
      literal: { type: 'ByteString' },
      terminated: true,
    });
  });
});

describe('raw strings', () => {
  it('closes on a quote followed by the same number of hashes', () => {
    expect(tagged('r#"a"b"# x')[0]).toEqual(['r#"a"b"#', 'Literal']);
    expect(onlyKind('r##"x"#y"##')).toEqual({
      tag: 'Literal',
      literal: { type: 'RawString', hashCount: 2 },
      terminated: true,
    });
  });

  it('does not treat backslashes as escapes', () => {
    expect(tagged('r"\\" x')).toEqual([
      ['r"\\"', 'Literal'],
      [' ', 'Whitespace'],
      ['x', 'Identifier'],
    ]);
  });

  it('marks a raw string missing its closing hashes', () => {
    expect(onlyKind('r#"a"')).toEqual({
      tag: 'Literal',
      literal: { type: 'RawString', hashCount: 1 },
      terminated: false,
    });
  });

  it('reads raw byte strings', () => {
    expect(onlyKind('br#"a"#')).toEqual({
      tag: 'Literal',
      literal: { type: 'RawByteString', hashCount: 1 },
      terminated: true,
    });
  });

  it('reads r# without a quote as an identifier and punctuation', () => {
    expect(tagged('r##x')).toEqual([
      ['r', 'Identifier'],
      ['#', 'Punctuation'],
      ['#', 'Punctuation'],
      ['x', 'Identifier'],
    ]);
  });
});

describe('chars and lifetimes', () => {
  it('reads a lifetime', () => {
    expect(tagged("'a x")).toEqual([
      ["'a", 'Lifetime'],
      [' ', 'Whitespace'],
      ['x', 'Identifier'],
    ]);
  });

  it('reads a char literal', () => {
    expect(onlyKind("'a'")).toEqual({
      tag: 'Literal',
      literal: { type: 'Char' },
      terminated: true,
    });
  });

  it('reads escaped and quote chars', () => {
    expect(tagged("'\\n'")).toEqual([["'\\n'", 'Literal']]);
    expect(tagged("'\\''")).toEqual([["'\\''", 'Literal']]);
    expect(tagged("'\\u{1F600}'")).toEqual([["'\\u{1F600}'", 'Literal']]);
  });

  it('reads non-identifier chars', () => {
    expect(tagged("'1'")).toEqual([["'1'", 'Literal']]);
    expect(tagged("' '")).toEqual([["' '", 'Literal']]);
    expect(tagged("'😀'")).toEqual([["'😀'", 'Literal']]);
  });

  it('keeps a multi-character char literal whole', () => {
    expect(tagged("'ab'")).toEqual([["'ab'", 'Literal']]);
  });

  it('stops an unterminated char at a newline', () => {
    expect(tagged("'1\nx")).toEqual([
      ["'1", 'Literal'],
      ['\n', 'Whitespace'],
      ['x', 'Identifier'],
    ]);
    expect(lexemize("'1\nx")[0]?.kind).toEqual({
      tag: 'Literal',
      literal: { type: 'Char' },
      terminated: false,
    });
  });

  it('reads byte chars', () => {
    expect(onlyKind("b'x'")).toEqual({
      tag: 'Literal',
      literal: { type: 'ByteChar' },
      terminated: true,
    });
    expect(onlyKind("b'\\x7f'")).toEqual({
      tag: 'Literal',
      literal: { type: 'ByteChar' },
      terminated: true,
    });
  });
});

describe('identifiers', () => {
  it('reads raw identifiers', () => {
    expect(tagged('r#match')).toEqual([['r#match', 'Identifier']]);
    expect(onlyKind('r#match')).toEqual({ tag: 'Identifier', isRaw: true });
  });

  it('reads a lone underscore as punctuation', () => {
    expect(onlyKind('_')).toEqual({ tag: 'Punctuation', symbol: 'Underscore' });
    expect(onlyKind('_x')).toEqual({ tag: 'Identifier', isRaw: false });
  });

  it('reads Unicode identifiers', () => {
    expect(tagged('größe')).toEqual([['größe', 'Identifier']]);
  });

  it('reads strict and reserved keywords as keywords', () => {
    expect(onlyKind('async')).toEqual({ tag: 'Keyword' });
    expect(onlyKind('yield')).toEqual({ tag: 'Keyword' });
    expect(onlyKind('Self')).toEqual({ tag: 'Keyword' });
  });

  it('reads weak keywords as identifiers', () => {
    expect(onlyKind('union')).toEqual({ tag: 'Identifier', isRaw: false });
  });
});
