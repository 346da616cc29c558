/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'config' | 'lexer';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/** Input demonstrating an error condition */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LEX-{C|L}{3-digit} (e.g., LEX-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Severity level (defaults to 'error' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Configuration Errors (LEX-C0xx)
  {
    errorId: 'LEX-C001',
    category: 'config',
    description: 'Unsupported edition',
    messageTemplate: 'Unsupported edition {edition} (supported: {supported})',
    cause: 'The requested edition has no keyword table bundled with the lexer.',
    resolution:
      'Pass one of the supported edition names, or build an edition with createEdition().',
    examples: [
      {
        description: 'Misspelled edition name',
        code: "lexemize(source, { edition: '2081' })",
      },
    ],
  },
  {
    errorId: 'LEX-C002',
    category: 'config',
    description: 'Invalid edition definition',
    messageTemplate: 'Invalid edition definition: {details}',
    cause:
      'An edition definition is missing a field, or lists a word that is not an identifier.',
    resolution:
      'Give the definition a name and string arrays for strict, reserved and primitiveTypes.',
  },
  {
    errorId: 'LEX-C003',
    category: 'config',
    description: 'Invalid check configuration',
    messageTemplate: 'Invalid configuration: {details}',
    cause: 'Configuration file contains invalid values or structure.',
    resolution:
      'Fix the configuration syntax and use only known rule codes, rule states and severities.',
    examples: [
      {
        description: 'Unknown rule state',
        code: '{ "rules": { "UNKNOWN_CHARACTER": "maybe" } }',
      },
    ],
  },

  // Lexeme Diagnostics (LEX-L0xx)
  {
    errorId: 'LEX-L001',
    category: 'lexer',
    description: 'Unknown character',
    messageTemplate: 'Unknown character {char}',
    cause: 'Character does not start any lexeme of the edition.',
    examples: [{ description: 'Tilde operator', code: 'let x = ~y;' }],
  },
  {
    errorId: 'LEX-L002',
    category: 'lexer',
    description: 'Unterminated literal',
    messageTemplate: 'Unterminated {literal} literal',
    cause: 'Literal opened with a quote but never closed before end of input.',
    resolution:
      'Add the closing quote. Raw strings close with a quote followed by the same number of hashes that opened them.',
    examples: [
      { description: 'Missing closing quote', code: 'let s = "hello;' },
      { description: 'Too few closing hashes', code: 'let s = r##"a"#;' },
    ],
  },
  {
    errorId: 'LEX-L003',
    category: 'lexer',
    description: 'Unterminated block comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'Block comments nest; every /* needs its own */.',
    examples: [{ description: 'Nested opener', code: '/* a /* b */' }],
  },
  {
    errorId: 'LEX-L004',
    category: 'lexer',
    description: 'Number has no digits',
    messageTemplate: 'Missing digits after {prefix} prefix',
  },
  {
    errorId: 'LEX-L005',
    category: 'lexer',
    description: 'Invalid digit for base',
    messageTemplate: 'Invalid digit {digit} in {base} literal',
    examples: [{ description: 'Two in a binary literal', code: '0b102' }],
  },
  {
    errorId: 'LEX-L006',
    category: 'lexer',
    description: 'Exponent has no digits',
    messageTemplate: 'Expected at least one digit in exponent of {text}',
  },
  {
    errorId: 'LEX-L007',
    category: 'lexer',
    description: 'Invalid number suffix',
    messageTemplate: 'Invalid suffix {suffix} for {literal} literal',
    resolution:
      'Use one of the integer types (u8..u128, usize, i8..i128, isize) or float types (f32, f64).',
  },
  {
    errorId: 'LEX-L008',
    category: 'lexer',
    description: 'Non-decimal float literal',
    messageTemplate: '{base} float literal is not supported',
  },
  {
    errorId: 'LEX-L009',
    category: 'lexer',
    severity: 'warning',
    description: 'Digit separator style',
    messageTemplate: 'Number literal {text} has {issue}',
  },
  {
    errorId: 'LEX-L010',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape {escape}: {reason}',
    examples: [
      { description: 'Unknown escape letter', code: "'\\q'" },
      { description: 'Out of range code point', code: '"\\u{110000}"' },
    ],
  },
  {
    errorId: 'LEX-L011',
    category: 'lexer',
    description: 'Non-ASCII character in byte literal',
    messageTemplate: 'Non-ASCII character {char} in byte literal',
    resolution: 'Use a \\x escape for bytes above 0x7F.',
  },
  {
    errorId: 'LEX-L012',
    category: 'lexer',
    description: 'Character literal length',
    messageTemplate:
      '{literal} literal must contain exactly one character, found {count}',
    resolution: 'Use a string literal for more than one character.',
  },
  {
    errorId: 'LEX-L013',
    category: 'lexer',
    description: 'Too many raw string hashes',
    messageTemplate: 'Raw string uses {count} hashes (maximum {limit})',
  },
  {
    errorId: 'LEX-L014',
    category: 'lexer',
    severity: 'warning',
    description: 'Reserved keyword',
    messageTemplate: 'Keyword {keyword} is reserved for future use',
    resolution: 'Rename the item, or use a raw identifier such as r#{keyword}.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Invalid digit {digit} in {base} literal", { digit: "2", base: "binary" })
 * // Returns: "Invalid digit 2 in binary literal"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
