/**
 * Bundle format
 *
 * A bundle is a JSON document holding everything needed to rebuild the
 * stored files: memory parameters, the address derivation rule (or an
 * explicit address table), the packed counters and the file index.
 */

import type { AddressStrategy, ThresholdPolicy } from '../types.js';
import { MalformedEncodingError } from '../errors.js';
import { RANDOM_ALGORITHM } from '../sdm/random.js';

export const BUNDLE_FORMAT = 'sparse-memory-bundle';
export const BUNDLE_FORMAT_VERSION = '1.0';

// Supported bundle format versions
const SUPPORTED_VERSIONS = ['1.0'];

const STRATEGIES: AddressStrategy[] = ['per-index', 'single-stream'];
const THRESHOLDS: ThresholdPolicy[] = ['positive', 'non-negative'];

export interface BundleAddresses {
  /** PRNG used to derive addresses */
  algorithm: typeof RANDOM_ALGORITHM;
  strategy: AddressStrategy;
  seed: number;
  /** Optional explicit table (RLE + base64 of all addresses concatenated) */
  table?: string;
}

export interface BundleFileEntry {
  /** One base64 RLE key per chunk, in payload order */
  chunkKeys: string[];
  /** Payload length in bits */
  originalLength: number;
}

export interface Bundle {
  format: typeof BUNDLE_FORMAT;
  version: string;
  createdAt: string;
  radius: number;
  chunkSize: number;
  n: number;
  p: number;
  threshold: ThresholdPolicy;
  addresses: BundleAddresses;
  /** Two's complement counter bytes, row-major, base64 */
  counters: string;
  files: Record<string, BundleFileEntry>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isOneOf<T extends string>(value: unknown, options: readonly T[]): value is T {
  return typeof value === 'string' && options.some(option => option === value);
}

/**
 * Validate an untrusted value and, when valid, return it as a Bundle
 */
export function readBundle(data: unknown): { bundle?: Bundle; errors: string[] } {
  const errors: string[] = [];

  if (!isRecord(data)) {
    errors.push('Invalid bundle: not a JSON object');
    return { errors };
  }

  if (data.format !== BUNDLE_FORMAT) {
    errors.push(`Missing or invalid "format" field (expected "${BUNDLE_FORMAT}")`);
  }
  const version = data.version;
  if (typeof version !== 'string') {
    errors.push('Missing or invalid "version" field');
  } else if (!SUPPORTED_VERSIONS.includes(version)) {
    errors.push(`Unsupported bundle version: ${version}. Supported: ${SUPPORTED_VERSIONS.join(', ')}`);
  }

  const { radius, chunkSize, n, p, threshold, counters, createdAt } = data;
  for (const [field, value] of Object.entries({ radius, chunkSize, n, p })) {
    if (!isCount(value)) {
      errors.push(`Missing or invalid "${field}" field (must be a non-negative integer)`);
    }
  }
  if (isCount(n) && isCount(chunkSize) && n !== chunkSize) {
    errors.push(`"chunkSize" (${chunkSize}) must equal "n" (${n})`);
  }
  if (!isOneOf(threshold, THRESHOLDS)) {
    errors.push(`Invalid "threshold" (must be ${THRESHOLDS.join(' or ')})`);
  }
  if (typeof counters !== 'string') {
    errors.push('Missing or invalid "counters" field');
  }

  let addresses: BundleAddresses | undefined;
  const rawAddresses = data.addresses;
  if (!isRecord(rawAddresses)) {
    errors.push('Missing or invalid "addresses" object');
  } else {
    const { algorithm, strategy, seed, table } = rawAddresses;
    if (algorithm !== RANDOM_ALGORITHM) {
      errors.push(`Unsupported address algorithm: ${String(algorithm)}`);
    }
    if (!isOneOf(strategy, STRATEGIES)) {
      errors.push(`Invalid address "strategy" (must be ${STRATEGIES.join(' or ')})`);
    }
    if (!isCount(seed)) {
      errors.push('Invalid address "seed" (must be a non-negative integer)');
    }
    if (table !== undefined && typeof table !== 'string') {
      errors.push('Invalid address "table" (must be a string)');
    }
    if (algorithm === RANDOM_ALGORITHM && isOneOf(strategy, STRATEGIES) && isCount(seed)) {
      addresses = { algorithm, strategy, seed };
      if (typeof table === 'string') {
        addresses.table = table;
      }
    }
  }

  const fileEntries: Array<[string, BundleFileEntry]> = [];
  const rawFiles = data.files;
  if (!isRecord(rawFiles)) {
    errors.push('Missing or invalid "files" object');
  } else {
    for (const [name, entry] of Object.entries(rawFiles)) {
      if (!isRecord(entry)) {
        errors.push(`File "${name}": invalid structure`);
        continue;
      }
      const { chunkKeys, originalLength } = entry;
      if (!Array.isArray(chunkKeys) || !chunkKeys.every((key): key is string => typeof key === 'string')) {
        errors.push(`File "${name}": missing or invalid "chunkKeys"`);
        continue;
      }
      if (!isCount(originalLength)) {
        errors.push(`File "${name}": invalid "originalLength"`);
        continue;
      }
      fileEntries.push([name, { chunkKeys, originalLength }]);
    }
  }

  if (
    errors.length > 0 ||
    !addresses ||
    typeof version !== 'string' ||
    !isCount(radius) ||
    !isCount(chunkSize) ||
    !isCount(n) ||
    !isCount(p) ||
    !isOneOf(threshold, THRESHOLDS) ||
    typeof counters !== 'string'
  ) {
    return { errors };
  }

  // Every name, "__proto__" included, must become an own property
  const files: Record<string, BundleFileEntry> = Object.fromEntries(fileEntries);

  return {
    bundle: {
      format: BUNDLE_FORMAT,
      version,
      createdAt: typeof createdAt === 'string' ? createdAt : '',
      radius,
      chunkSize,
      n,
      p,
      threshold,
      addresses,
      counters,
      files,
    },
    errors,
  };
}

export function validateBundle(data: unknown): { valid: boolean; errors: string[] } {
  const { errors } = readBundle(data);
  return { valid: errors.length === 0, errors };
}

/**
 * Parse bundle JSON text, throwing MalformedEncodingError on any problem
 */
export function parseBundle(text: string): Bundle {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new MalformedEncodingError('Bundle is not valid JSON', { cause: error });
  }

  const { bundle, errors } = readBundle(data);
  if (!bundle) {
    throw new MalformedEncodingError(`Invalid bundle:\n  ${errors.join('\n  ')}`);
  }
  return bundle;
}

export function serializeBundle(bundle: Bundle): string {
  return JSON.stringify(bundle, null, 2);
}
