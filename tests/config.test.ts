import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  loadConfig,
  resolveConfigPath,
  validateConfig,
  finalizeConfig,
  DEFAULT_CONFIG,
} from '../engine/config.js';
import { ConfigError } from '../engine/errors.js';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

describe('config', () => {
  const tmpDir = path.join(os.tmpdir(), 'vcs-compact-test-config');
  const fakeHome = path.join(os.tmpdir(), 'vcs-compact-test-fake-home');

  beforeEach(() => { fs.mkdirSync(tmpDir, { recursive: true }); });
  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    fs.rmSync(fakeHome, { recursive: true, force: true });
  });

  it('resolveConfigPath finds local .vcs-compact.json first', () => {
    const localConfig = path.join(tmpDir, '.vcs-compact.json');
    fs.writeFileSync(localConfig, '{}');
    expect(resolveConfigPath(tmpDir, fakeHome)).toBe(localConfig);
  });

  it('resolveConfigPath falls back to ~/.config/vcs-compact.json', () => {
    const globalConfig = path.join(fakeHome, '.config', 'vcs-compact.json');
    fs.mkdirSync(path.dirname(globalConfig), { recursive: true });
    fs.writeFileSync(globalConfig, '{}');
    expect(resolveConfigPath(tmpDir, fakeHome)).toBe(globalConfig);
  });

  it('resolveConfigPath returns null if no config found', () => {
    expect(resolveConfigPath(tmpDir, fakeHome)).toBeNull();
  });

  it('validateConfig accepts an empty object', () => {
    expect(validateConfig({})).toEqual({ valid: true, errors: [] });
  });

  it('validateConfig rejects non-objects', () => {
    expect(validateConfig([])).toEqual({ valid: false, errors: ['config: must be a JSON object'] });
  });

  it('validateConfig rejects unknown sections and options', () => {
    const result = validateConfig({ colors: {}, limits: { lg: 3 } });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('colors: unknown section');
    expect(result.errors).toContain('limits.lg: unknown option');
  });

  it('validateConfig rejects non-positive limits', () => {
    const result = validateConfig({ limits: { log: 0 }, diff: { hunkLines: 2.5 } });
    expect(result.errors).toEqual([
      'limits.log: must be a positive integer',
      'diff.hunkLines: must be a positive integer',
    ]);
  });

  it('validateConfig bounds the unparsed ratio to 0..1', () => {
    const result = validateConfig({ fidelity: { maxUnparsedRatio: 1.5 } });
    expect(result.errors).toEqual(['fidelity.maxUnparsedRatio: must be a number between 0 and 1']);
  });

  it('validateConfig keeps shortened ids at least as long as the guard prefix', () => {
    const result = validateConfig({ truncation: { opId: 5 } });
    expect(result.errors).toEqual(['truncation.opId: must be at least fidelity.minIdPrefix (7)']);
  });

  it('loadConfig merges with defaults', () => {
    const configPath = path.join(tmpDir, '.vcs-compact.json');
    fs.writeFileSync(configPath, JSON.stringify({ limits: { log: 12 } }));
    const config = loadConfig(configPath);
    expect(config.limits.log).toBe(12);
    expect(config.limits.opLog).toBe(DEFAULT_CONFIG.limits.opLog);
    expect(config.diff).toEqual(DEFAULT_CONFIG.diff);
  });

  it('loadConfig throws ConfigError on invalid JSON', () => {
    const configPath = path.join(tmpDir, '.vcs-compact.json');
    fs.writeFileSync(configPath, 'not json');
    expect(() => loadConfig(configPath)).toThrow(ConfigError);
  });

  it('loadConfig throws ConfigError listing validation errors', () => {
    const configPath = path.join(tmpDir, '.vcs-compact.json');
    fs.writeFileSync(configPath, JSON.stringify({ limits: { log: -1 } }));
    try {
      loadConfig(configPath);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.configPath).toBe(configPath);
        expect(err.errors).toEqual(['limits.log: must be a positive integer']);
      }
    }
  });

  it('finalizeConfig applies --limit to log and op log only', () => {
    const config = finalizeConfig(DEFAULT_CONFIG, { limit: 3 });
    expect(config.limits).toEqual({ log: 3, opLog: 3, statusFiles: 10, bookmarks: 10 });
  });

  it('finalizeConfig freezes every section', () => {
    const config = finalizeConfig(DEFAULT_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.truncation)).toBe(true);
    expect(DEFAULT_CONFIG.limits.log).toBe(5);
  });
});
