/**
 * CLI Error Explanation
 * Renders registry documentation for `lexemize-check --explain`
 */

import { ERROR_REGISTRY } from './types.js';

const ERROR_ID_PATTERN = /^LEX-[CL]\d{3}$/;

/**
 * Render full documentation for an error ID: description, severity,
 * then cause, resolution and examples where the definition has them.
 *
 * @returns Formatted documentation, or null for a malformed or unknown ID
 *
 * @example
 * explainError('LEX-L005')
 * // "LEX-L005: Invalid digit for base\nSeverity: error\n\nExamples: ..."
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];

  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push(`Severity: ${definition.severity ?? 'error'}`);
  sections.push('');

  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push('');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
