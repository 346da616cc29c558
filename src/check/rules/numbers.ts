/**
 * Number Literal Rules
 * Digits, exponents, suffixes and separators of integer and float literals.
 */

import type { Lexeme, LexemeKindOf, NumberBase } from '../../types.js';
import type { Diagnostic, LexemeRule, ValidationContext } from '../types.js';
import { createDiagnostic, locationWithin } from './helpers.js';

// ============================================================
// LITERAL PARTS
// ============================================================

const INTEGER_SUFFIXES = new Set([
  'u8',
  'u16',
  'u32',
  'u64',
  'u128',
  'usize',
  'i8',
  'i16',
  'i32',
  'i64',
  'i128',
  'isize',
]);

const FLOAT_SUFFIXES = new Set(['f32', 'f64']);

const PREFIXES: Readonly<Record<NumberBase, string>> = {
  decimal: '',
  binary: '0b',
  octal: '0o',
  hexadecimal: '0x',
};

interface NumberParts {
  readonly prefix: string;
  /** Digits before any '.' or exponent, separators included */
  readonly integer: string;
  readonly fraction: string | null;
  /** Exponent digits after the marker and optional sign */
  readonly exponent: string | null;
  /** Index of the exponent marker in the literal text */
  readonly exponentIndex: number;
  readonly suffix: string;
}

type NumberLiteral = Extract<
  LexemeKindOf<'Literal'>['literal'],
  { type: 'Integer' | 'Float' }
>;

/** Split the text of a number literal into its parts */
export function splitNumber(text: string, literal: NumberLiteral): NumberParts {
  const prefix = PREFIXES[literal.base];
  const body = text.slice(prefix.length, text.length - literal.suffix.length);

  let exponentAt = -1;
  if (literal.base !== 'hexadecimal') {
    exponentAt = body.search(/[eE]/);
  }
  const mantissa = exponentAt === -1 ? body : body.slice(0, exponentAt);
  const dot = mantissa.indexOf('.');

  return {
    prefix,
    integer: dot === -1 ? mantissa : mantissa.slice(0, dot),
    fraction: dot === -1 ? null : mantissa.slice(dot + 1),
    exponent:
      exponentAt === -1
        ? null
        : body.slice(exponentAt + 1).replace(/^[+-]/, ''),
    exponentIndex: exponentAt === -1 ? -1 : prefix.length + exponentAt,
    suffix: literal.suffix,
  };
}

function numberLiteral(lexeme: Lexeme): NumberLiteral | null {
  if (lexeme.kind.tag !== 'Literal') return null;
  const literal = lexeme.kind.literal;
  return literal.type === 'Integer' || literal.type === 'Float'
    ? literal
    : null;
}

function hasDigits(digits: string, base: NumberBase): boolean {
  return base === 'hexadecimal'
    ? /[0-9a-fA-F]/.test(digits)
    : /[0-9]/.test(digits);
}

/** Shared shape of the number rules */
function numberRule(
  definition: Omit<LexemeRule, 'kinds' | 'validate'>,
  check: (
    rule: LexemeRule,
    lexeme: Lexeme,
    literal: NumberLiteral,
    parts: NumberParts,
    context: ValidationContext
  ) => Diagnostic[]
): LexemeRule {
  const built: LexemeRule = {
    ...definition,
    kinds: ['Literal'],
    validate(lexeme, context) {
      const literal = numberLiteral(lexeme);
      if (!literal) return [];
      return check(
        built,
        lexeme,
        literal,
        splitNumber(lexeme.text, literal),
        context
      );
    },
  };
  return built;
}

// ============================================================
// RULES
// ============================================================

export const NUMBER_MISSING_DIGITS = numberRule(
  {
    code: 'NUMBER_MISSING_DIGITS',
    category: 'numbers',
    severity: 'error',
    errorId: 'LEX-L004',
  },
  (rule, lexeme, literal, parts, context) => {
    if (literal.base === 'decimal' || hasDigits(parts.integer, literal.base)) {
      return [];
    }
    return [
      createDiagnostic(rule, context, lexeme.span.start, {
        prefix: parts.prefix,
      }),
    ];
  }
);

export const NUMBER_INVALID_DIGIT = numberRule(
  {
    code: 'NUMBER_INVALID_DIGIT',
    category: 'numbers',
    severity: 'error',
    errorId: 'LEX-L005',
  },
  (rule, lexeme, literal, parts, context) => {
    const valid =
      literal.base === 'binary'
        ? /[01_]/
        : literal.base === 'octal'
          ? /[0-7_]/
          : null;
    if (!valid) return [];

    const diagnostics: Diagnostic[] = [];
    for (let i = 0; i < parts.integer.length; i++) {
      const digit = parts.integer.charAt(i);
      if (!valid.test(digit)) {
        diagnostics.push(
          createDiagnostic(
            rule,
            context,
            locationWithin(lexeme, parts.prefix.length + i),
            { digit, base: literal.base }
          )
        );
      }
    }
    return diagnostics;
  }
);

export const NUMBER_EMPTY_EXPONENT = numberRule(
  {
    code: 'NUMBER_EMPTY_EXPONENT',
    category: 'numbers',
    severity: 'error',
    errorId: 'LEX-L006',
  },
  (rule, lexeme, _literal, parts, context) => {
    if (parts.exponent === null || /[0-9]/.test(parts.exponent)) return [];
    return [
      createDiagnostic(
        rule,
        context,
        locationWithin(lexeme, parts.exponentIndex),
        { text: lexeme.text }
      ),
    ];
  }
);

export const NUMBER_INVALID_SUFFIX = numberRule(
  {
    code: 'NUMBER_INVALID_SUFFIX',
    category: 'numbers',
    severity: 'error',
    errorId: 'LEX-L007',
  },
  (rule, lexeme, literal, parts, context) => {
    const suffix = parts.suffix;
    if (suffix === '') return [];

    const valid =
      literal.type === 'Float'
        ? FLOAT_SUFFIXES.has(suffix)
        : INTEGER_SUFFIXES.has(suffix) ||
          (literal.base === 'decimal' && FLOAT_SUFFIXES.has(suffix));
    if (valid) return [];

    return [
      createDiagnostic(
        rule,
        context,
        locationWithin(lexeme, lexeme.text.length - suffix.length),
        { suffix, literal: literal.type === 'Float' ? 'float' : 'integer' }
      ),
    ];
  }
);

export const NUMBER_NON_DECIMAL_FLOAT = numberRule(
  {
    code: 'NUMBER_NON_DECIMAL_FLOAT',
    category: 'numbers',
    severity: 'error',
    errorId: 'LEX-L008',
  },
  (rule, lexeme, literal, _parts, context) => {
    if (literal.type !== 'Float' || literal.base === 'decimal') return [];
    return [
      createDiagnostic(rule, context, lexeme.span.start, {
        base: literal.base,
      }),
    ];
  }
);

export const NUMBER_SEPARATOR_STYLE = numberRule(
  {
    code: 'NUMBER_SEPARATOR_STYLE',
    category: 'numbers',
    severity: 'warning',
    errorId: 'LEX-L009',
  },
  (rule, lexeme, _literal, parts, context) => {
    const body = lexeme.text.slice(
      parts.prefix.length,
      lexeme.text.length - parts.suffix.length
    );

    let issue: string | null = null;
    if (body.includes('__')) {
      issue = 'consecutive underscores';
    } else if (
      body.includes('_.') ||
      // `1_u8` keeps its separator before a suffix
      (body.endsWith('_') && parts.suffix === '')
    ) {
      issue = 'a trailing underscore';
    }
    if (!issue) return [];

    return [
      createDiagnostic(rule, context, lexeme.span.start, {
        text: lexeme.text,
        issue,
      }),
    ];
  }
);
