/**
 * Config
 *
 * Preprocessor settings, merged from built-in defaults, the optional
 * `pocket-reference.yaml` in the book root and the `[preprocessor.pocket-reference]`
 * table of book.toml (later sources win).
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import yaml from 'js-yaml';

export const PREPROCESSOR_NAME = 'pocket-reference';
export const CONFIG_FILE_NAME = 'pocket-reference.yaml';

export interface PocketReferenceConfig {
  wordsPerMinute: number;
  footer: boolean;
  issueUrl: string;
  colabBaseUrl: string;
}

export const DEFAULT_CONFIG: Readonly<PocketReferenceConfig> = {
  wordsPerMinute: 200,
  footer: true,
  issueUrl: 'https://github.com/VectorInstitute/ai-pocket-reference/issues/new?template=edit-request.yml',
  colabBaseUrl: 'https://colab.research.google.com/github/VectorInstitute/ai-pocket-reference-code/blob/main/notebooks/',
};

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface ResolvedConfig {
  config: PocketReferenceConfig;
  warnings: string[];
}

// Keys mdbook itself reads from a preprocessor table
const MDBOOK_KEYS = new Set(['command', 'renderers', 'before', 'after', 'optional']);

type FieldReader = (value: unknown) => Partial<PocketReferenceConfig> | null;

const FIELDS: Record<string, FieldReader> = {
  'words-per-minute': value =>
    typeof value === 'number' && Number.isFinite(value) && value > 0 ? { wordsPerMinute: value } : null,
  footer: value => (typeof value === 'boolean' ? { footer: value } : null),
  'issue-url': value => (typeof value === 'string' && value.length > 0 ? { issueUrl: value } : null),
  'colab-base-url': value => (typeof value === 'string' && value.length > 0 ? { colabBaseUrl: value } : null),
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Layer config sources over the defaults.
 * Values of the wrong type are skipped with a warning and the previous value stays.
 */
export function resolveConfig(...sources: Array<{ label: string; values: Record<string, unknown> }>): ResolvedConfig {
  let config: PocketReferenceConfig = { ...DEFAULT_CONFIG };
  const warnings: string[] = [];

  for (const { label, values } of sources) {
    for (const [key, value] of Object.entries(values)) {
      if (MDBOOK_KEYS.has(key)) continue;

      if (!Object.hasOwn(FIELDS, key)) {
        warnings.push(`${label}: unknown key "${key}" ignored`);
        continue;
      }

      const update = FIELDS[key](value);
      if (!update) {
        warnings.push(`${label}: invalid value for "${key}" ignored (${JSON.stringify(value)})`);
        continue;
      }
      config = { ...config, ...update };
    }
  }

  return { config, warnings };
}

/**
 * Read `pocket-reference.yaml` from a directory.
 * A missing file yields an empty table; an unreadable or malformed one throws.
 */
export async function readConfigFile(dir: string): Promise<Record<string, unknown>> {
  const configPath = join(dir, CONFIG_FILE_NAME);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return {};
    throw new ConfigError(`Cannot read ${configPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${configPath}`, { cause: error });
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a mapping of settings`);
  }
  return parsed;
}

/**
 * Load config for a book: defaults, then the YAML file in `root`, then
 * the preprocessor table from book.toml.
 */
export async function loadConfig(root: string, bookTable: Record<string, unknown> = {}): Promise<ResolvedConfig> {
  const fileValues = await readConfigFile(root);
  return resolveConfig(
    { label: CONFIG_FILE_NAME, values: fileValues },
    { label: `book.toml [preprocessor.${PREPROCESSOR_NAME}]`, values: bookTable }
  );
}

/**
 * YAML document written by `init`.
 */
export function dumpDefaultConfig(): string {
  const body = yaml.dump(
    {
      'words-per-minute': DEFAULT_CONFIG.wordsPerMinute,
      footer: DEFAULT_CONFIG.footer,
      'issue-url': DEFAULT_CONFIG.issueUrl,
      'colab-base-url': DEFAULT_CONFIG.colabBaseUrl,
    },
    { indent: 2, lineWidth: 120, noRefs: true }
  );

  return `# Pocket reference preprocessor settings
# Values in book.toml [preprocessor.${PREPROCESSOR_NAME}] take precedence.

${body}`;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
