/**
 * Keyword Rules
 */

import { isReservedKeyword } from '../../lexer/edition.js';
import type { LexemeRule } from '../types.js';
import { createDiagnostic } from './helpers.js';

/** Keywords the edition reserves without giving them a meaning */
export const RESERVED_KEYWORD: LexemeRule = {
  code: 'RESERVED_KEYWORD',
  category: 'keywords',
  severity: 'warning',
  errorId: 'LEX-L014',
  kinds: ['Keyword'],

  validate(lexeme, context) {
    if (!isReservedKeyword(context.edition, lexeme.text)) return [];
    return [
      createDiagnostic(RESERVED_KEYWORD, context, lexeme.span.start, {
        keyword: lexeme.text,
      }),
    ];
  },
};
