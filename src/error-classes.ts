/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LexemizerErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry.
 * Renders the definition's message template with `context`.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("LEX-C001", { edition: "2081", supported: "2018" })
 * // ConfigurationError: "Unsupported edition 2081 (supported: 2018)"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): LexemizerError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  if (definition.category === 'config') {
    return new ConfigurationError(errorId, message, context);
  }
  return new LexemizerError({ errorId, message, location, context });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all lexemizer errors.
 * Provides structured data for host applications to format as needed.
 */
export class LexemizerError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LexemizerErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'LexemizerError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LexemizerErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LexemizerErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Invalid editions, edition definitions and check configuration */
export class ConfigurationError extends LexemizerError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'config') {
      throw new TypeError(`Expected config error ID, got: ${errorId}`);
    }

    super({ errorId, message, context });
    this.name = 'ConfigurationError';
  }
}
