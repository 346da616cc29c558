/**
 * Lexeme Formatting
 * Text table and JSON renderings of a lexeme sequence
 */

import type { Lexeme, LexemeKind, LiteralKind } from './types.js';

export type OutputFormat = 'text' | 'json';

// ============================================================
// KIND LABELS
// ============================================================

function describeLiteral(literal: LiteralKind): string {
  switch (literal.type) {
    case 'Integer':
    case 'Float': {
      const details = [
        literal.base === 'decimal' ? '' : literal.base,
        literal.suffix,
      ].filter((part) => part !== '');
      return details.length > 0
        ? `${literal.type}:${details.join(':')}`
        : literal.type;
    }
    case 'RawString':
    case 'RawByteString':
      return `${literal.type}#${literal.hashCount}`;
    case 'Char':
    case 'ByteChar':
    case 'String':
    case 'ByteString':
      return literal.type;
    default: {
      const _exhaustive: never = literal;
      return _exhaustive;
    }
  }
}

/**
 * Short label for a lexeme kind.
 * @example describeKind({ tag: 'Operator', symbol: 'DotDotEq' }) // "Operator(DotDotEq)"
 */
export function describeKind(kind: LexemeKind): string {
  switch (kind.tag) {
    case 'Whitespace':
    case 'Keyword':
    case 'Lifetime':
    case 'Unknown':
      return kind.tag;
    case 'LineComment':
      return kind.isDoc ? 'LineComment(doc)' : 'LineComment';
    case 'BlockComment': {
      const flags = [
        kind.isDoc ? 'doc' : '',
        kind.terminated ? '' : 'unterminated',
      ].filter((flag) => flag !== '');
      return flags.length > 0
        ? `BlockComment(${flags.join(',')})`
        : 'BlockComment';
    }
    case 'Identifier':
      return kind.isRaw ? 'Identifier(raw)' : 'Identifier';
    case 'Literal': {
      const label = describeLiteral(kind.literal);
      return kind.terminated
        ? `Literal(${label})`
        : `Literal(${label},unterminated)`;
    }
    case 'Operator':
    case 'Punctuation':
      return `${kind.tag}(${kind.symbol})`;
    default: {
      const _exhaustive: never = kind;
      return _exhaustive;
    }
  }
}

// ============================================================
// OUTPUT
// ============================================================

/** Make line terminators visible inside a table row */
export function escapeSnippet(text: string): string {
  return text.replace(/\r/g, '<CR>').replace(/\n/g, '<NL>');
}

/**
 * One row per lexeme: kind label padded to 16, byte offset right-aligned
 * to 4, then the lexeme text.
 */
function formatLexemesText(lexemes: readonly Lexeme[]): string {
  const rows = lexemes.map(
    (lexeme) =>
      `${describeKind(lexeme.kind).padEnd(16)} ${String(lexeme.span.start.offset).padStart(4)}  ${escapeSnippet(lexeme.text)}`
  );
  return [`Lexemes: ${lexemes.length}`, ...rows].join('\n');
}

function formatLexemesJSON(lexemes: readonly Lexeme[]): string {
  return JSON.stringify(
    {
      count: lexemes.length,
      lexemes: lexemes.map((lexeme) => ({
        kind: lexeme.kind,
        text: lexeme.text,
        span: lexeme.span,
      })),
    },
    null,
    2
  );
}

export function formatLexemes(
  lexemes: readonly Lexeme[],
  format: OutputFormat
): string {
  if (format === 'json') {
    return formatLexemesJSON(lexemes);
  }
  return formatLexemesText(lexemes);
}
