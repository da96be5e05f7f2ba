/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  applyConfigUpdates,
  clearConfigCache,
  getConfigForDisplay,
  getConfigPath,
  loadConfig,
  resetConfig,
  updateConfig,
  validateConfig,
} from '../src/config/index.js';
import { DEFAULT_CONFIG } from '../src/types.js';

const ENV_KEYS = [
  'SPARSE_MEMORY_HOME',
  'SPARSE_MEMORY_ADDRESS_COUNT',
  'SPARSE_MEMORY_CHUNK_SIZE',
  'SPARSE_MEMORY_RADIUS_FRACTION',
  'SPARSE_MEMORY_ADDRESS_SEED',
  'SPARSE_MEMORY_KEY_SEED',
  'SPARSE_MEMORY_STRATEGY',
  'SPARSE_MEMORY_THRESHOLD',
  'SPARSE_MEMORY_BACKEND',
];

describe('Configuration', () => {
  let tempDir: string;
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sparse-memory-config-'));
    process.env.SPARSE_MEMORY_HOME = tempDir;
    clearConfigCache();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    clearConfigCache();
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a file or environment', () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(getConfigPath()).toBe(path.join(tempDir, 'config.json'));
  });

  it('should read known fields from the config file', () => {
    fs.writeFileSync(
      getConfigPath(),
      JSON.stringify({ addressCount: 500, strategy: 'single-stream', unrelated: true, chunkSize: 'big' })
    );

    const config = loadConfig();
    expect(config.addressCount).toBe(500);
    expect(config.strategy).toBe('single-stream');
    expect(config.chunkSize).toBe(256);
  });

  it('should let the environment override the file', () => {
    fs.writeFileSync(getConfigPath(), JSON.stringify({ addressCount: 500 }));
    process.env.SPARSE_MEMORY_ADDRESS_COUNT = '750';
    process.env.SPARSE_MEMORY_RADIUS_FRACTION = '0.3';

    const config = loadConfig();
    expect(config.addressCount).toBe(750);
    expect(config.radiusFraction).toBe(0.3);
  });

  it('should ignore environment values that do not parse', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    process.env.SPARSE_MEMORY_CHUNK_SIZE = 'lots';
    process.env.SPARSE_MEMORY_STRATEGY = 'sideways';

    const config = loadConfig();
    expect(config.chunkSize).toBe(256);
    expect(config.strategy).toBe('per-index');
    expect(errorSpy).toHaveBeenCalledTimes(2);
  });

  it('should cache until the cache is cleared', () => {
    expect(loadConfig().addressCount).toBe(2000);
    process.env.SPARSE_MEMORY_ADDRESS_COUNT = '10';
    expect(loadConfig().addressCount).toBe(2000);

    clearConfigCache();
    expect(loadConfig().addressCount).toBe(10);
  });

  it('should persist updates and resets', () => {
    updateConfig({ keySeed: 7 });
    clearConfigCache();
    expect(loadConfig().keySeed).toBe(7);

    resetConfig();
    clearConfigCache();
    expect(loadConfig().keySeed).toBe(42);
  });

  it('should refuse to save an update that fails validation', () => {
    const result = applyConfigUpdates({ chunkSize: -3 });

    expect(result.saved).toBe(false);
    expect(result.issues).toEqual(['chunkSize must be a positive integer, got -3']);
    expect(result.config.chunkSize).toBe(256);
    expect(fs.existsSync(getConfigPath())).toBe(false);

    clearConfigCache();
    expect(loadConfig().chunkSize).toBe(256);
  });

  it('should save a valid update', () => {
    const result = applyConfigUpdates({ chunkSize: 512 });

    expect(result).toEqual({ saved: true, config: { ...DEFAULT_CONFIG, chunkSize: 512 }, issues: [] });
    clearConfigCache();
    expect(loadConfig().chunkSize).toBe(512);
  });

  it('should show the derived radius', () => {
    const display = getConfigForDisplay();
    expect(display.radius).toBe(115);
    expect(display.config_path).toBe(getConfigPath());
  });

  it('should list every invalid parameter', () => {
    const { valid, issues } = validateConfig({
      ...DEFAULT_CONFIG,
      addressCount: 0,
      chunkSize: 12.5,
      radiusFraction: 1.5,
      keySeed: -1,
    });

    expect(valid).toBe(false);
    expect(issues).toEqual([
      'addressCount must be a positive integer, got 0',
      'chunkSize must be a positive integer, got 12.5',
      'radiusFraction must be in (0, 1], got 1.5',
      'keySeed must be a non-negative integer, got -1',
    ]);
  });

  it('should accept the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, issues: [] });
  });
});
