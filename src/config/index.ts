/**
 * Configuration Management
 *
 * Memory parameters and their persistence.
 * Config is stored in ~/.sparse-memory/config.json (or $SPARSE_MEMORY_HOME)
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import type { AddressStrategy, MemoryBackend, SdmConfig, ThresholdPolicy } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';

const STRATEGIES: AddressStrategy[] = ['per-index', 'single-stream'];
const THRESHOLDS: ThresholdPolicy[] = ['positive', 'non-negative'];
const BACKENDS: MemoryBackend[] = ['counter', 'checksum'];

// In-memory config cache
let currentConfig: SdmConfig | null = null;

export function getConfigDir(): string {
  return process.env.SPARSE_MEMORY_HOME || join(homedir(), '.sparse-memory');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    console.error(`Ignoring ${name}: "${raw}" is not a number`);
    return undefined;
  }
  return value;
}

function enumFromEnv<T extends string>(name: string, options: readonly T[]): T | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const match = options.find(option => option === raw);
  if (!match) {
    console.error(`Ignoring ${name}: "${raw}" is not one of ${options.join(', ')}`);
  }
  return match;
}

/**
 * Keep only the known fields of a parsed config file
 */
function pickConfig(data: unknown): Partial<SdmConfig> {
  if (typeof data !== 'object' || data === null) {
    return {};
  }
  const picked: Partial<SdmConfig> = {};
  const entries = new Map(Object.entries(data));
  for (const key of ['addressCount', 'chunkSize', 'radiusFraction', 'addressSeed', 'keySeed'] as const) {
    const value = entries.get(key);
    if (typeof value === 'number') {
      picked[key] = value;
    }
  }
  const strategy = STRATEGIES.find(s => s === entries.get('strategy'));
  if (strategy) picked.strategy = strategy;
  const threshold = THRESHOLDS.find(t => t === entries.get('threshold'));
  if (threshold) picked.threshold = threshold;
  const backend = BACKENDS.find(b => b === entries.get('backend'));
  if (backend) picked.backend = backend;
  return picked;
}

/**
 * Load configuration from disk or environment
 */
export function loadConfig(): SdmConfig {
  if (currentConfig) {
    return currentConfig;
  }

  let config: SdmConfig = { ...DEFAULT_CONFIG };

  // Try to load from file
  const configPath = getConfigPath();
  if (existsSync(configPath)) {
    try {
      const fileContent = readFileSync(configPath, 'utf-8');
      config = { ...config, ...pickConfig(JSON.parse(fileContent)) };
    } catch (error) {
      console.error('Failed to load config file:', error);
    }
  }

  // Override with environment variables
  config = {
    addressCount: numberFromEnv('SPARSE_MEMORY_ADDRESS_COUNT') ?? config.addressCount,
    chunkSize: numberFromEnv('SPARSE_MEMORY_CHUNK_SIZE') ?? config.chunkSize,
    radiusFraction: numberFromEnv('SPARSE_MEMORY_RADIUS_FRACTION') ?? config.radiusFraction,
    addressSeed: numberFromEnv('SPARSE_MEMORY_ADDRESS_SEED') ?? config.addressSeed,
    keySeed: numberFromEnv('SPARSE_MEMORY_KEY_SEED') ?? config.keySeed,
    strategy: enumFromEnv('SPARSE_MEMORY_STRATEGY', STRATEGIES) ?? config.strategy,
    threshold: enumFromEnv('SPARSE_MEMORY_THRESHOLD', THRESHOLDS) ?? config.threshold,
    backend: enumFromEnv('SPARSE_MEMORY_BACKEND', BACKENDS) ?? config.backend,
  };

  currentConfig = config;
  return config;
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: SdmConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), 'utf-8');
  currentConfig = config;
}

/**
 * Update specific config values
 */
export function updateConfig(updates: Partial<SdmConfig>): SdmConfig {
  const config = loadConfig();
  const newConfig = { ...config, ...updates };
  saveConfig(newConfig);
  return newConfig;
}

/**
 * Validate the merged config first; nothing is saved when it has issues
 */
export function applyConfigUpdates(updates: Partial<SdmConfig>): {
  saved: boolean;
  config: SdmConfig;
  issues: string[];
} {
  const current = loadConfig();
  const candidate = { ...current, ...updates };
  const { valid, issues } = validateConfig(candidate);
  if (!valid) {
    return { saved: false, config: current, issues };
  }
  saveConfig(candidate);
  return { saved: true, config: candidate, issues };
}

/**
 * Get current config (cached)
 */
export function getConfig(): SdmConfig {
  return loadConfig();
}

/**
 * Drop the cached config so the next load re-reads file and environment
 */
export function clearConfigCache(): void {
  currentConfig = null;
}

/**
 * Reset config to defaults
 */
export function resetConfig(): SdmConfig {
  currentConfig = null;
  const config = { ...DEFAULT_CONFIG };
  saveConfig(config);
  return config;
}

/**
 * Get config for display
 */
export function getConfigForDisplay(): Record<string, unknown> {
  const config = loadConfig();
  return {
    ...config,
    radius: Math.floor(config.radiusFraction * config.chunkSize),
    config_path: getConfigPath(),
  };
}

/**
 * Validate config and return any issues
 */
export function validateConfig(config: SdmConfig = loadConfig()): { valid: boolean; issues: string[] } {
  const issues: string[] = [];

  if (!Number.isInteger(config.addressCount) || config.addressCount <= 0) {
    issues.push(`addressCount must be a positive integer, got ${config.addressCount}`);
  }
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    issues.push(`chunkSize must be a positive integer, got ${config.chunkSize}`);
  }
  if (!(config.radiusFraction > 0 && config.radiusFraction <= 1)) {
    issues.push(`radiusFraction must be in (0, 1], got ${config.radiusFraction}`);
  }
  for (const key of ['addressSeed', 'keySeed'] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      issues.push(`${key} must be a non-negative integer, got ${config[key]}`);
    }
  }
  if (!STRATEGIES.includes(config.strategy)) {
    issues.push(`Unknown address strategy: ${config.strategy}`);
  }
  if (!THRESHOLDS.includes(config.threshold)) {
    issues.push(`Unknown threshold policy: ${config.threshold}`);
  }
  if (!BACKENDS.includes(config.backend)) {
    issues.push(`Unknown backend: ${config.backend}`);
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
