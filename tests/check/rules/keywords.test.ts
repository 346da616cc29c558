/**
 * Keyword Rules Tests
 */

import { describe, it, expect } from 'vitest';
import { validateSource } from '../../../src/check/validator.js';
import type { CheckConfig } from '../../../src/check/types.js';

function createConfig(
  overrides: Partial<Pick<CheckConfig, 'rules' | 'severity'>> = {}
): CheckConfig {
  return {
    rules: { RESERVED_KEYWORD: 'on', ...overrides.rules },
    severity: { ...overrides.severity },
  };
}

describe('RESERVED_KEYWORD', () => {
  it('warns about reserved keywords', () => {
    expect(validateSource('  let yield = 1;', createConfig())).toEqual([
      {
        location: { line: 1, column: 7, offset: 6 },
        severity: 'warning',
        code: 'RESERVED_KEYWORD',
        errorId: 'LEX-L014',
        message: 'Keyword yield is reserved for future use',
        context: 'let yield = 1;',
      },
    ]);
  });

  it('ignores keywords in use and raw identifiers', () => {
    expect(validateSource('fn r#try() {}', createConfig())).toEqual([]);
  });

  it('takes a severity override', () => {
    const [diagnostic] = validateSource(
      'box',
      createConfig({ severity: { RESERVED_KEYWORD: 'error' } })
    );
    expect(diagnostic?.severity).toBe('error');
  });

  it('can be turned off', () => {
    expect(
      validateSource(
        'box',
        createConfig({ rules: { RESERVED_KEYWORD: 'off' } })
      )
    ).toEqual([]);
  });
});
