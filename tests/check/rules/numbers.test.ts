/**
 * Number Literal Rules Tests
 */

import { describe, it, expect } from 'vitest';
import { validateSource } from '../../../src/check/validator.js';
import { splitNumber } from '../../../src/check/rules/index.js';
import type { CheckConfig } from '../../../src/check/types.js';

// ============================================================
// TEST HELPERS
// ============================================================

function createConfig(rules: Record<string, 'on' | 'off'> = {}): CheckConfig {
  return {
    rules: {
      NUMBER_MISSING_DIGITS: 'on',
      NUMBER_INVALID_DIGIT: 'on',
      NUMBER_EMPTY_EXPONENT: 'on',
      NUMBER_INVALID_SUFFIX: 'on',
      NUMBER_NON_DECIMAL_FLOAT: 'on',
      NUMBER_SEPARATOR_STYLE: 'on',
      ...rules,
    },
    severity: {},
  };
}

function findings(source: string): Array<[string, string, number]> {
  return validateSource(source, createConfig()).map(
    (d): [string, string, number] => [d.code, d.message, d.location.column]
  );
}

// ============================================================
// splitNumber
// ============================================================

describe('splitNumber', () => {
  it('splits a float', () => {
    expect(
      splitNumber('1_0.5e-3f64', {
        type: 'Float',
        base: 'decimal',
        suffix: 'f64',
      })
    ).toEqual({
      prefix: '',
      integer: '1_0',
      fraction: '5',
      exponent: '3',
      exponentIndex: 5,
      suffix: 'f64',
    });
  });

  it('treats e as a digit in hexadecimal', () => {
    expect(
      splitNumber('0x1e_u8', {
        type: 'Integer',
        base: 'hexadecimal',
        suffix: 'u8',
      })
    ).toEqual({
      prefix: '0x',
      integer: '1e_',
      fraction: null,
      exponent: null,
      exponentIndex: -1,
      suffix: 'u8',
    });
  });
});

// ============================================================
// RULES
// ============================================================

describe('NUMBER_MISSING_DIGITS', () => {
  it('reports a bare prefix', () => {
    expect(findings('0x')).toEqual([
      ['NUMBER_MISSING_DIGITS', 'Missing digits after 0x prefix', 1],
    ]);
  });

  it('does not count separators as digits', () => {
    expect(findings('0o__ ').map(([code]) => code)).toEqual([
      'NUMBER_MISSING_DIGITS',
      'NUMBER_SEPARATOR_STYLE',
    ]);
  });
});

describe('NUMBER_INVALID_DIGIT', () => {
  it('reports digits outside the base', () => {
    expect(findings('0b102')).toEqual([
      ['NUMBER_INVALID_DIGIT', 'Invalid digit 2 in binary literal', 5],
    ]);
    expect(findings('0o78')).toEqual([
      ['NUMBER_INVALID_DIGIT', 'Invalid digit 8 in octal literal', 4],
    ]);
  });

  it('reports every invalid digit', () => {
    expect(findings('0b29').map(([, message]) => message)).toEqual([
      'Invalid digit 2 in binary literal',
      'Invalid digit 9 in binary literal',
    ]);
  });

  it('accepts valid literals', () => {
    expect(findings('0b1010 0o17 0xFF 42')).toEqual([]);
  });
});

describe('NUMBER_EMPTY_EXPONENT', () => {
  it('reports at the exponent marker', () => {
    expect(findings('1e')).toEqual([
      [
        'NUMBER_EMPTY_EXPONENT',
        'Expected at least one digit in exponent of 1e',
        2,
      ],
    ]);
    expect(findings('x = 2.5E+;').map(([, , column]) => column)).toEqual([8]);
  });

  it('accepts exponents with digits', () => {
    expect(findings('1e10 1E-3 2.5e+7f32')).toEqual([]);
  });
});

describe('NUMBER_INVALID_SUFFIX', () => {
  it('reports unknown integer suffixes at the suffix', () => {
    expect(findings('1u7')).toEqual([
      ['NUMBER_INVALID_SUFFIX', 'Invalid suffix u7 for integer literal', 2],
    ]);
  });

  it('rejects integer suffixes on floats', () => {
    expect(findings('1.0u8')).toEqual([
      ['NUMBER_INVALID_SUFFIX', 'Invalid suffix u8 for float literal', 4],
    ]);
  });

  it('allows float suffixes on decimal integers only', () => {
    expect(findings('1f32')).toEqual([]);
    expect(findings('0b1f32')).toEqual([
      ['NUMBER_INVALID_SUFFIX', 'Invalid suffix f32 for integer literal', 4],
    ]);
  });

  it('accepts known suffixes', () => {
    expect(findings('1u8 2i128 3usize 0x1F_u64 4.0f64')).toEqual([]);
  });
});

describe('NUMBER_NON_DECIMAL_FLOAT', () => {
  it('reports fractions on prefixed literals', () => {
    expect(findings('0b1.0')).toEqual([
      ['NUMBER_NON_DECIMAL_FLOAT', 'binary float literal is not supported', 1],
    ]);
  });
});

describe('NUMBER_SEPARATOR_STYLE', () => {
  it('warns about consecutive underscores', () => {
    const [diagnostic] = validateSource('1__000', createConfig());
    expect(diagnostic?.severity).toBe('warning');
    expect(diagnostic?.message).toBe(
      'Number literal 1__000 has consecutive underscores'
    );
  });

  it('warns about trailing underscores', () => {
    expect(findings('1_ 1_.5').map(([, message]) => message)).toEqual([
      'Number literal 1_ has a trailing underscore',
      'Number literal 1_.5 has a trailing underscore',
    ]);
  });

  it('accepts a separator before a suffix', () => {
    expect(findings('1_u8 1_000')).toEqual([]);
  });

  it('can be turned off', () => {
    expect(
      validateSource('1__000', createConfig({ NUMBER_SEPARATOR_STYLE: 'off' }))
    ).toEqual([]);
  });
});
