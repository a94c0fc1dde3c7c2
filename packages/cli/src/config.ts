/**
 * @ledgerwork/cli configuration file support.
 *
 * Reads `ledgerwork.config.json`, found by walking up from the working
 * directory, and validates it field by field.
 *
 * @packageDocumentation
 */

import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import {
  LedgerError,
  LedgerErrorCode,
  isNonNegativeInteger,
  isPlainObject,
} from '@ledgerwork/types';

// ─── Types ────────────────────────────────────────────────────────────────────

export type OutputFormat = 'json' | 'text';

/** Shape of a `ledgerwork.config.json` configuration file. */
export interface LedgerworkConfig {
  /** Default chain difficulty. */
  difficulty?: number;
  /** Default number of replicas per scenario. */
  replicas?: number;
  /** Default number of blocks appended after genesis. */
  blocks?: number;
  /** Default genesis timestamp. */
  genesisTimestamp?: number;
  /** Default output format for all commands. */
  outputFormat?: OutputFormat;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'ledgerwork.config.json';

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'difficulty',
  'replicas',
  'blocks',
  'genesisTimestamp',
  'outputFormat',
]);

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for a `ledgerwork.config.json` starting from `cwd` and walking up to
 * the filesystem root.  Returns the absolute path if found, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return undefined;
}

/**
 * Load the configuration. An explicit `path` must exist; otherwise the file
 * is searched for from `cwd` and `undefined` is returned when there is none.
 *
 * @throws {LedgerError} `CONFIG_INVALID` when the file is missing, is not
 *   JSON, or holds a field of the wrong type.
 */
export function loadConfig(cwd?: string, path?: string): LedgerworkConfig | undefined {
  let filePath: string | undefined;
  if (path !== undefined) {
    filePath = resolve(cwd ?? '.', path);
    if (!existsSync(filePath)) {
      throw new LedgerError(LedgerErrorCode.CONFIG_INVALID, `Config file not found: ${filePath}`);
    }
  } else {
    filePath = findConfigFile(cwd);
  }
  if (!filePath) return undefined;

  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new LedgerError(LedgerErrorCode.CONFIG_INVALID, `${filePath} is not valid JSON`, {
      cause: err instanceof Error ? err : undefined,
      context: { path: filePath },
    });
  }
  return validateConfig(parsed, filePath);
}

/**
 * Check a parsed configuration value and return it typed.
 *
 * @param source - File name used in error messages.
 */
export function validateConfig(value: unknown, source: string = CONFIG_FILE_NAME): LedgerworkConfig {
  if (!isPlainObject(value)) {
    throw invalid(source, 'must contain a JSON object');
  }

  for (const key of Object.keys(value)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(source, `has unknown key "${key}"`);
    }
  }

  const config: LedgerworkConfig = {};
  const { difficulty, replicas, blocks, genesisTimestamp, outputFormat } = value;

  if (difficulty !== undefined) {
    if (!isNonNegativeInteger(difficulty) || difficulty > 64) {
      throw invalid(source, 'difficulty must be an integer from 0 to 64');
    }
    config.difficulty = difficulty;
  }
  if (replicas !== undefined) {
    if (!isNonNegativeInteger(replicas) || replicas === 0) {
      throw invalid(source, 'replicas must be a positive integer');
    }
    config.replicas = replicas;
  }
  if (blocks !== undefined) {
    if (!isNonNegativeInteger(blocks)) {
      throw invalid(source, 'blocks must be a non-negative integer');
    }
    config.blocks = blocks;
  }
  if (genesisTimestamp !== undefined) {
    if (typeof genesisTimestamp !== 'number' || !Number.isFinite(genesisTimestamp)) {
      throw invalid(source, 'genesisTimestamp must be a finite number');
    }
    config.genesisTimestamp = genesisTimestamp;
  }
  if (outputFormat !== undefined) {
    if (outputFormat !== 'json' && outputFormat !== 'text') {
      throw invalid(source, 'outputFormat must be "json" or "text"');
    }
    config.outputFormat = outputFormat;
  }

  return config;
}

function invalid(source: string, problem: string): LedgerError {
  return new LedgerError(LedgerErrorCode.CONFIG_INVALID, `${source} ${problem}`, {
    hint: `Supported keys: ${[...KNOWN_KEYS].join(', ')}.`,
  });
}
