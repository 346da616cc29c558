/**
 * Configuration Loader for lexemize-check
 * Loads and validates .lexemize-check.json / .lexemize-check.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../types.js';
import type { CheckConfig, RuleState, Severity } from './types.js';
import { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file names, in lookup order */
export const CONFIG_FILE_NAMES = [
  '.lexemize-check.json',
  '.lexemize-check.yaml',
  '.lexemize-check.yml',
] as const;

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create default configuration with all rules enabled.
 */
export function createDefaultConfig(): CheckConfig {
  const rules: Record<string, RuleState> = {};
  const severity: Record<string, Severity> = {};

  for (const rule of VALIDATION_RULES) {
    rules[rule.code] = 'on';
    severity[rule.code] = rule.severity;
  }

  return { rules, severity };
}

// ============================================================
// VALIDATION
// ============================================================

function invalidConfig(details: string): ConfigurationError {
  return new ConfigurationError(
    'LEX-C003',
    `Invalid configuration: ${details}`,
    { details }
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

const KNOWN_KEYS = new Set(['rules', 'severity', 'edition']);

/**
 * Read a `{ CODE: value }` section, checking every code and value.
 */
function readSection<T>(
  data: Record<string, unknown>,
  field: 'rules' | 'severity',
  isValue: (value: unknown) => value is T,
  expected: string
): Record<string, T> {
  const section = data[field];
  if (section === undefined) return {};
  if (!isRecord(section)) {
    throw invalidConfig(`${field} must be an object`);
  }

  const knownRules = new Set(VALIDATION_RULES.map((r) => r.code));
  const result: Record<string, T> = {};
  for (const [code, value] of Object.entries(section)) {
    if (!knownRules.has(code)) {
      throw invalidConfig(`unknown rule ${code}`);
    }
    if (!isValue(value)) {
      throw invalidConfig(
        `rule ${code} has invalid ${field === 'rules' ? 'state' : 'severity'} "${String(value)}" (must be ${expected})`
      );
    }
    result[code] = value;
  }
  return result;
}

/**
 * Validate parsed configuration data and merge it over the defaults.
 *
 * @throws ConfigurationError (LEX-C003) on unknown keys, unknown rule codes or invalid values
 */
export function parseConfig(data: unknown): CheckConfig {
  // An empty YAML document parses to null
  if (data === null || data === undefined) {
    return createDefaultConfig();
  }
  if (!isRecord(data)) {
    throw invalidConfig('must be an object');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalidConfig(`unknown option ${key}`);
    }
  }

  let edition: string | undefined;
  const rawEdition = data['edition'];
  if (typeof rawEdition === 'string') {
    edition = rawEdition;
  } else if (rawEdition !== undefined) {
    throw invalidConfig('edition must be a string');
  }

  const defaults = createDefaultConfig();
  return {
    rules: {
      ...defaults.rules,
      ...readSection(data, 'rules', isRuleState, "'on', 'off', or 'warn'"),
    },
    severity: {
      ...defaults.severity,
      ...readSection(
        data,
        'severity',
        isSeverity,
        "'error', 'warning', or 'info'"
      ),
    },
    edition,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from the first config file found in `cwd`.
 *
 * @returns CheckConfig object, or null if no file is present
 * @throws ConfigurationError (LEX-C003) if the file cannot be read, parsed or validated
 */
export function loadConfig(cwd: string): CheckConfig | null {
  const configPath = CONFIG_FILE_NAMES.map((name) => join(cwd, name)).find(
    (path) => existsSync(path)
  );
  if (configPath === undefined) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw invalidConfig(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = configPath.endsWith('.json')
      ? JSON.parse(fileContent)
      : parseYaml(fileContent);
  } catch (err) {
    const format = configPath.endsWith('.json') ? 'JSON' : 'YAML';
    throw invalidConfig(
      `invalid ${format} (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(parsedData);
}
