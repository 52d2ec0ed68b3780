// engine/config.ts — Config resolution, validation and defaults

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { CompactConfig } from './types.js';
import { ConfigError } from './errors.js';

export const DEFAULT_CONFIG: CompactConfig = {
  limits: {
    log: 5,
    opLog: 5,
    statusFiles: 10,
    bookmarks: 10,
  },
  diff: {
    hunkLines: 10,
    totalLines: 100,
  },
  truncation: {
    message: 60,
    opSummary: 12,
    shortId: 8,
    opId: 7,
  },
  fidelity: {
    maxUnparsedRatio: 0.3,
    minIdPrefix: 7,
  },
};

const CONFIG_FILENAME = '.vcs-compact.json';

export function resolveConfigPath(cwd: string, homeDir: string = os.homedir()): string | null {
  const localPath = path.join(cwd, CONFIG_FILENAME);
  if (fs.existsSync(localPath)) return localPath;

  const globalPath = path.join(homeDir, '.config', 'vcs-compact.json');
  if (fs.existsSync(globalPath)) return globalPath;

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function validateConfig(
  raw: unknown,
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!isRecord(raw)) {
    return { valid: false, errors: ['config: must be a JSON object'] };
  }

  for (const [section, defaults] of Object.entries(DEFAULT_CONFIG)) {
    const value = raw[section];
    if (value === undefined) continue;
    if (!isRecord(value)) {
      errors.push(`${section}: must be an object`);
      continue;
    }
    for (const key of Object.keys(value)) {
      if (!(key in defaults)) {
        errors.push(`${section}.${key}: unknown option`);
        continue;
      }
      const option = value[key];
      if (section === 'fidelity' && key === 'maxUnparsedRatio') {
        if (typeof option !== 'number' || option < 0 || option > 1) {
          errors.push(`${section}.${key}: must be a number between 0 and 1`);
        }
      } else if (!isPositiveInteger(option)) {
        errors.push(`${section}.${key}: must be a positive integer`);
      }
    }
  }

  for (const section of Object.keys(raw)) {
    if (!(section in DEFAULT_CONFIG)) errors.push(`${section}: unknown section`);
  }

  // Shortened ids narrower than the guard's minimum prefix could never pass it
  const minPrefix = pickNumber(sectionOf(raw, 'fidelity'), 'minIdPrefix', DEFAULT_CONFIG.fidelity.minIdPrefix);
  const opId = pickNumber(sectionOf(raw, 'truncation'), 'opId', DEFAULT_CONFIG.truncation.opId);
  const shortId = pickNumber(sectionOf(raw, 'truncation'), 'shortId', DEFAULT_CONFIG.truncation.shortId);
  if (opId < minPrefix) errors.push(`truncation.opId: must be at least fidelity.minIdPrefix (${minPrefix})`);
  if (shortId < minPrefix) errors.push(`truncation.shortId: must be at least fidelity.minIdPrefix (${minPrefix})`);

  return { valid: errors.length === 0, errors };
}

function pickNumber(section: Record<string, unknown> | undefined, key: string, fallback: number): number {
  const value = section?.[key];
  return typeof value === 'number' ? value : fallback;
}

function sectionOf(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = raw[key];
  return isRecord(value) ? value : undefined;
}

/**
 * Merge a validated raw config over the defaults, section by section.
 */
export function mergeConfig(raw: Record<string, unknown>): CompactConfig {
  const limits = sectionOf(raw, 'limits');
  const diff = sectionOf(raw, 'diff');
  const truncation = sectionOf(raw, 'truncation');
  const fidelity = sectionOf(raw, 'fidelity');
  const d = DEFAULT_CONFIG;

  return {
    limits: {
      log: pickNumber(limits, 'log', d.limits.log),
      opLog: pickNumber(limits, 'opLog', d.limits.opLog),
      statusFiles: pickNumber(limits, 'statusFiles', d.limits.statusFiles),
      bookmarks: pickNumber(limits, 'bookmarks', d.limits.bookmarks),
    },
    diff: {
      hunkLines: pickNumber(diff, 'hunkLines', d.diff.hunkLines),
      totalLines: pickNumber(diff, 'totalLines', d.diff.totalLines),
    },
    truncation: {
      message: pickNumber(truncation, 'message', d.truncation.message),
      opSummary: pickNumber(truncation, 'opSummary', d.truncation.opSummary),
      shortId: pickNumber(truncation, 'shortId', d.truncation.shortId),
      opId: pickNumber(truncation, 'opId', d.truncation.opId),
    },
    fidelity: {
      maxUnparsedRatio: pickNumber(fidelity, 'maxUnparsedRatio', d.fidelity.maxUnparsedRatio),
      minIdPrefix: pickNumber(fidelity, 'minIdPrefix', d.fidelity.minIdPrefix),
    },
  };
}

export function loadConfig(configPath: string): CompactConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(configPath, [err instanceof Error ? err.message : String(err)]);
  }

  const validation = validateConfig(raw);
  if (!validation.valid || !isRecord(raw)) {
    throw new ConfigError(configPath, validation.errors);
  }

  return mergeConfig(raw);
}

/**
 * Apply CLI overrides and freeze the result so nothing downstream can
 * mutate it mid-invocation.
 */
export function finalizeConfig(
  config: CompactConfig,
  overrides: { limit?: number } = {},
): Readonly<CompactConfig> {
  const limits = overrides.limit !== undefined
    ? { ...config.limits, log: overrides.limit, opLog: overrides.limit }
    : { ...config.limits };

  return Object.freeze({
    limits: Object.freeze(limits),
    diff: Object.freeze({ ...config.diff }),
    truncation: Object.freeze({ ...config.truncation }),
    fidelity: Object.freeze({ ...config.fidelity }),
  });
}
