#!/usr/bin/env node
/**
 * Sparse Memory CLI
 *
 * Command-line interface for packing files into a bundle and rebuilding them.
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import {
  applyConfigUpdates,
  getConfigForDisplay,
  getConfigPath,
  resetConfig,
  validateConfig,
} from './config/index.js';
import { store, list, reconstruct, stats } from './tools/index.js';
import type { SdmConfig } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Package info (src/ when run from sources, dist/src/ when built)
function readVersion(): string {
  for (const candidate of [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', 'package.json')]) {
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    }
  }
  return '0.0.0';
}

const version = readVersion();

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function success(message: string): void {
  log(`✓ ${message}`, 'green');
}

function info(message: string): void {
  log(`ℹ ${message}`, 'blue');
}

function warn(message: string): void {
  log(`⚠ ${message}`, 'yellow');
}

function error(message: string): void {
  log(`✗ ${message}`, 'red');
}

/**
 * Show help message
 */
function showHelp(): void {
  console.log(`
${colors.bright}sparse-memory${colors.reset} v${version}
Sparse distributed memory file bundles

${colors.cyan}Usage:${colors.reset}
  sparse-memory <command> [options]

${colors.cyan}Commands:${colors.reset}
  pack <bundle> <files...>     Store files and write a bundle
  list <bundle>                List files in a bundle
  unpack <bundle> <name>       Reconstruct a file from a bundle
  inspect <bundle>             Show bundle parameters and statistics
  config                       Manage configuration
  version                      Show version
  help                         Show this help

${colors.cyan}Pack Options:${colors.reset}
  --p <count>           Number of hard locations
  --chunk-size <bits>   Chunk size in bits (also the vector length)
  --radius <fraction>   Radius as a fraction of the vector length
  --with-addresses      Embed the explicit address table

${colors.cyan}Unpack Options:${colors.reset}
  --out <path>          Output path (default: reconstructed_<name>)

${colors.cyan}Config Options:${colors.reset}
  --show                Show current configuration
  --set <key>=<value>   Set a numeric or named setting
  --reset               Restore defaults

${colors.cyan}Examples:${colors.reset}
  sparse-memory pack notes.bundle.json notes.txt logo.png
  sparse-memory pack out.json data.bin --p 4000 --chunk-size 512
  sparse-memory list out.json
  sparse-memory unpack out.json logo.png --out ./logo-copy.png
  sparse-memory config --set radiusFraction=0.4
`);
}

/**
 * Split flags of the form `--name value` from positional arguments
 */
function parseArgs(args: string[], valueFlags: string[]): { positional: string[]; flags: Map<string, string> } {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const name = arg.slice(2);
      if (valueFlags.includes(name)) {
        flags.set(name, args[i + 1] ?? '');
        i++;
      } else {
        flags.set(name, 'true');
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
}

function numberFlag(flags: Map<string, string>, name: string): number | undefined {
  const raw = flags.get(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`--${name} expects a number, got "${raw}"`);
  }
  return value;
}

/**
 * Store files into a new bundle
 */
async function pack(args: string[]): Promise<void> {
  const { positional, flags } = parseArgs(args, ['p', 'chunk-size', 'radius']);
  const [bundlePath, ...files] = positional;

  if (!bundlePath || files.length === 0) {
    error('Usage: sparse-memory pack <bundle> <files...>');
    process.exit(1);
  }

  log('\n🧠 Packing files\n', 'bright');

  const result = await store({
    files,
    outputPath: bundlePath,
    addressCount: numberFlag(flags, 'p'),
    chunkSize: numberFlag(flags, 'chunk-size'),
    radiusFraction: numberFlag(flags, 'radius'),
    includeAddressTable: flags.has('with-addresses'),
  });

  for (const file of result.stored) {
    success(`Stored ${file.name} (${file.chunks} chunks, ${file.originalLength} bits)`);
  }
  for (const failure of result.failures) {
    warn(`Skipped ${failure.path}: ${failure.error}`);
  }
  for (const warning of result.warnings ?? []) {
    warn(warning);
  }

  if (!result.success) {
    error(result.error ?? 'Pack failed');
    process.exit(1);
  }

  log('');
  success(`Bundle written to ${result.outputPath}`);
  log('');
}

/**
 * List files in a bundle
 */
async function listFiles(args: string[]): Promise<void> {
  const [bundlePath] = args;
  if (!bundlePath) {
    error('Usage: sparse-memory list <bundle>');
    process.exit(1);
  }

  const result = await list({ bundlePath });
  if (!result.success) {
    error(result.error ?? 'List failed');
    process.exit(1);
  }

  if (result.files.length === 0) {
    warn('The bundle has no files.');
    return;
  }

  log('\nAvailable files:', 'cyan');
  result.files.forEach((file, i) => {
    log(`  ${i + 1}. ${file.name}  (${file.bytes} bytes, ${file.chunks} chunks)`);
  });
  log('');
}

/**
 * Reconstruct a file
 */
async function unpack(args: string[]): Promise<void> {
  const { positional, flags } = parseArgs(args, ['out']);
  const [bundlePath, name] = positional;

  if (!bundlePath || !name) {
    error('Usage: sparse-memory unpack <bundle> <name> [--out <path>]');
    process.exit(1);
  }

  info(`Reconstructing ${name}...`);
  const result = await reconstruct({ bundlePath, name, outputPath: flags.get('out') });

  if (!result.success) {
    error(result.error ?? 'Reconstruction failed');
    process.exit(1);
  }
  success(`Reconstructed ${name} as ${result.outputPath} (${result.bytes ?? 0} bytes)`);
}

/**
 * Show bundle statistics
 */
async function inspect(args: string[]): Promise<void> {
  const [bundlePath] = args;
  if (!bundlePath) {
    error('Usage: sparse-memory inspect <bundle>');
    process.exit(1);
  }

  const result = await stats({ bundlePath });
  if (!result.success || !result.stats) {
    error(result.error ?? 'Inspect failed');
    process.exit(1);
  }

  const s = result.stats;
  log('\n📊 Bundle Statistics\n', 'bright');

  log('Parameters:', 'cyan');
  log(`  p (hard locations): ${s.parameters.p}`);
  log(`  n (vector length):  ${s.parameters.n}`);
  log(`  radius:             ${s.parameters.radius}`);
  log(`  threshold:          ${s.parameters.threshold}`);
  log('');

  log('Addresses:', 'cyan');
  log(`  ${s.addresses.algorithm}, ${s.addresses.strategy}, seed ${s.addresses.seed}`);
  log(`  explicit table: ${s.addresses.explicitTable ? 'yes' : 'no'}`);
  log('');

  log('Contents:', 'cyan');
  log(`  files: ${s.files.total}, chunks: ${s.files.chunks}, bytes: ${s.files.bytes}`);
  log(`  counter range: ${s.counters.min} .. ${s.counters.max}`);
  log(`  locations per key: min ${s.neighborhoods.min}, avg ${s.neighborhoods.avg}, max ${s.neighborhoods.max}`);
  if (s.neighborhoods.empty > 0) {
    warn(`${s.neighborhoods.empty} chunk keys reach no hard location`);
  }
  log('');
}

const NUMERIC_KEYS = ['addressCount', 'chunkSize', 'radiusFraction', 'addressSeed', 'keySeed'] as const;

/**
 * Manage configuration
 */
function config(args: string[]): void {
  if (args.includes('--reset')) {
    resetConfig();
    success('Configuration reset to defaults');
    showConfig();
    return;
  }

  const setIndex = args.indexOf('--set');
  if (setIndex !== -1 && args[setIndex + 1]) {
    setValue(args[setIndex + 1]);
    return;
  }

  // Default: show config
  showConfig();
}

function setValue(assignment: string): void {
  const [key, raw] = assignment.split('=', 2);
  if (raw === undefined) {
    error('Expected <key>=<value>');
    return;
  }

  let updates: Partial<SdmConfig> = {};
  const numericKey = NUMERIC_KEYS.find(k => k === key);
  if (numericKey) {
    const value = Number(raw);
    if (Number.isNaN(value)) {
      error(`${key} expects a number`);
      return;
    }
    updates[numericKey] = value;
  } else if (key === 'strategy' && (raw === 'per-index' || raw === 'single-stream')) {
    updates = { strategy: raw };
  } else if (key === 'threshold' && (raw === 'positive' || raw === 'non-negative')) {
    updates = { threshold: raw };
  } else if (key === 'backend' && (raw === 'counter' || raw === 'checksum')) {
    updates = { backend: raw };
  } else {
    error(`Unknown setting or value: ${assignment}`);
    return;
  }

  const { saved, issues } = applyConfigUpdates(updates);
  if (!saved) {
    for (const issue of issues) {
      error(issue);
    }
    error(`Not saved: ${key} = ${raw}`);
    process.exit(1);
  }
  success(`Set ${key} = ${raw}`);
}

/**
 * Show current configuration
 */
function showConfig(): void {
  log('\n📋 Sparse Memory Configuration\n', 'bright');

  if (!existsSync(getConfigPath())) {
    info('No configuration file found; using defaults and environment');
  }

  for (const [key, value] of Object.entries(getConfigForDisplay())) {
    log(`  ${key}: ${JSON.stringify(value)}`);
  }

  const { issues } = validateConfig();
  if (issues.length > 0) {
    log('');
    for (const issue of issues) {
      warn(issue);
    }
  }
  log('');
}

/**
 * Main CLI entry point
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0];

  const run = (task: Promise<void>): void => {
    task.catch(err => {
      error(`${command} failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
  };

  switch (command) {
    case 'pack':
      run(pack(args.slice(1)));
      break;
    case 'list':
      run(listFiles(args.slice(1)));
      break;
    case 'unpack':
      run(unpack(args.slice(1)));
      break;
    case 'inspect':
      run(inspect(args.slice(1)));
      break;
    case 'config':
      config(args.slice(1));
      break;
    case 'version':
    case '-v':
    case '--version':
      console.log(`sparse-memory v${version}`);
      break;
    case 'help':
    case '-h':
    case '--help':
    case undefined:
      showHelp();
      break;
    default:
      error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
}

main();
