/**
 * Editions
 * Immutable keyword tables, loaded from data/editions/<name>.json
 */

import { readFileSync } from 'node:fs';
import { ConfigurationError, createError } from '../types.js';

// ============================================================
// TYPES
// ============================================================

/** Edition data as stored on disk */
export interface EditionDefinition {
  readonly name: string;
  readonly strict: readonly string[];
  readonly reserved: readonly string[];
  readonly primitiveTypes: readonly string[];
}

export interface Edition {
  readonly name: string;
  /** Keywords in use by the language */
  readonly strictKeywords: ReadonlySet<string>;
  /** Keywords reserved for future use */
  readonly reservedKeywords: ReadonlySet<string>;
  readonly primitiveTypes: ReadonlySet<string>;
}

export const SUPPORTED_EDITIONS = ['2018'] as const;

export type EditionName = (typeof SUPPORTED_EDITIONS)[number];

export const DEFAULT_EDITION: EditionName = '2018';

// ============================================================
// VALIDATION
// ============================================================

const IDENTIFIER = /^[\p{XID_Start}_]\p{XID_Continue}*$/u;

function invalid(details: string): ConfigurationError {
  return new ConfigurationError(
    'LEX-C002',
    `Invalid edition definition: ${details}`,
    { details }
  );
}

function readWordList(
  data: Record<string, unknown>,
  field: string
): readonly string[] {
  const value = data[field];
  if (!Array.isArray(value)) {
    throw invalid(`${field} must be an array`);
  }

  const words: string[] = [];
  for (const word of value) {
    if (typeof word !== 'string' || !IDENTIFIER.test(word)) {
      throw invalid(
        `${field} contains ${JSON.stringify(word)}, which is not an identifier`
      );
    }
    words.push(word);
  }
  return words;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate raw edition data.
 * @throws ConfigurationError (LEX-C002) on missing fields or non-identifier words
 */
export function parseEditionDefinition(data: unknown): EditionDefinition {
  if (!isRecord(data)) {
    throw invalid('must be an object');
  }
  const name = data['name'];
  if (typeof name !== 'string' || name === '') {
    throw invalid('name must be a non-empty string');
  }
  return {
    name,
    strict: readWordList(data, 'strict'),
    reserved: readWordList(data, 'reserved'),
    primitiveTypes: readWordList(data, 'primitiveTypes'),
  };
}

// ============================================================
// CONSTRUCTION
// ============================================================

/**
 * Build an edition from a definition.
 * Accepts unvalidated data, so test fixtures and hosts can supply their own tables.
 */
export function createEdition(definition: unknown): Edition {
  const parsed = parseEditionDefinition(definition);
  const strict = new Set(parsed.strict);
  const overlap = parsed.reserved.find((word) => strict.has(word));
  if (overlap !== undefined) {
    throw invalid(`${overlap} is listed as both strict and reserved`);
  }
  return Object.freeze({
    name: parsed.name,
    strictKeywords: strict,
    reservedKeywords: new Set(parsed.reserved),
    primitiveTypes: new Set(parsed.primitiveTypes),
  });
}

function isEditionName(name: string): name is EditionName {
  return SUPPORTED_EDITIONS.some((supported) => supported === name);
}

const editionCache = new Map<EditionName, Edition>();

/**
 * Load a bundled edition by name.
 * @throws ConfigurationError (LEX-C001) for an unsupported name
 */
export function loadEdition(name: string): Edition {
  if (!isEditionName(name)) {
    throw createError('LEX-C001', {
      edition: name,
      supported: SUPPORTED_EDITIONS.join(', '),
    });
  }

  const cached = editionCache.get(name);
  if (cached) return cached;

  const url = new URL(`../../data/editions/${name}.json`, import.meta.url);
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(url, 'utf-8'));
  } catch (err) {
    throw invalid(
      `cannot read edition ${name} (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const edition = createEdition(data);
  editionCache.set(name, edition);
  return edition;
}

/** Resolve an edition selector; an Edition value passes through unchanged */
export function resolveEdition(
  selector: string | Edition = DEFAULT_EDITION
): Edition {
  return typeof selector === 'string' ? loadEdition(selector) : selector;
}

// ============================================================
// LOOKUPS
// ============================================================

export function isKeyword(edition: Edition, word: string): boolean {
  return edition.strictKeywords.has(word) || edition.reservedKeywords.has(word);
}

export function isReservedKeyword(edition: Edition, word: string): boolean {
  return edition.reservedKeywords.has(word);
}

export function isPrimitiveType(edition: Edition, word: string): boolean {
  return edition.primitiveTypes.has(word);
}
