/**
 * Lexical Rules
 * Unknown characters and unterminated literals or comments.
 */

import type { LiteralType } from '../../types.js';
import type { LexemeRule } from '../types.js';
import { createDiagnostic, quoteChar } from './helpers.js';

/** Literal names as they read in messages */
export const LITERAL_NAMES: Readonly<Record<LiteralType, string>> = {
  Integer: 'integer',
  Float: 'float',
  Char: 'character',
  ByteChar: 'byte',
  String: 'string',
  ByteString: 'byte string',
  RawString: 'raw string',
  RawByteString: 'raw byte string',
};

// ============================================================
// UNKNOWN_CHARACTER
// ============================================================

export const UNKNOWN_CHARACTER: LexemeRule = {
  code: 'UNKNOWN_CHARACTER',
  category: 'lexical',
  severity: 'error',
  errorId: 'LEX-L001',
  kinds: ['Unknown'],

  validate(lexeme, context) {
    return [
      createDiagnostic(UNKNOWN_CHARACTER, context, lexeme.span.start, {
        char: quoteChar(lexeme.text),
      }),
    ];
  },
};

// ============================================================
// UNTERMINATED_LITERAL
// ============================================================

export const UNTERMINATED_LITERAL: LexemeRule = {
  code: 'UNTERMINATED_LITERAL',
  category: 'lexical',
  severity: 'error',
  errorId: 'LEX-L002',
  kinds: ['Literal'],

  validate(lexeme, context) {
    const kind = lexeme.kind;
    if (kind.tag !== 'Literal' || kind.terminated) return [];
    return [
      createDiagnostic(UNTERMINATED_LITERAL, context, lexeme.span.start, {
        literal: LITERAL_NAMES[kind.literal.type],
      }),
    ];
  },
};

// ============================================================
// UNTERMINATED_BLOCK_COMMENT
// ============================================================

export const UNTERMINATED_BLOCK_COMMENT: LexemeRule = {
  code: 'UNTERMINATED_BLOCK_COMMENT',
  category: 'lexical',
  severity: 'error',
  errorId: 'LEX-L003',
  kinds: ['BlockComment'],

  validate(lexeme, context) {
    if (lexeme.kind.tag !== 'BlockComment' || lexeme.kind.terminated) {
      return [];
    }
    return [
      createDiagnostic(
        UNTERMINATED_BLOCK_COMMENT,
        context,
        lexeme.span.start,
        {}
      ),
    ];
  },
};
