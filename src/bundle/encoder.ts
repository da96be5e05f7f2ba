/**
 * Bundle Encoder - snapshots a counter memory and its file index
 */

import type { AssociativeMemory, FileRecord } from '../types.js';
import { UnsupportedBackendError } from '../errors.js';
import { CounterMemory } from '../sdm/memory.js';
import { RANDOM_ALGORITHM } from '../sdm/random.js';
import { packCounters } from './counters.js';
import { packAddressTable } from './keys.js';
import { BUNDLE_FORMAT, BUNDLE_FORMAT_VERSION, type Bundle, type BundleFileEntry } from './format.js';

export interface EncodeBundleOptions {
  /** Embed the explicit address table even when it can be re-derived */
  includeAddressTable?: boolean;
  /** Timestamp override, mainly for reproducible output */
  createdAt?: Date;
}

export function encodeBundle(
  memory: AssociativeMemory,
  files: readonly FileRecord[],
  options: EncodeBundleOptions = {}
): Bundle {
  if (!(memory instanceof CounterMemory)) {
    throw new UnsupportedBackendError(
      `Bundles store counter matrices; the "${memory.backend}" backend cannot be encoded`
    );
  }

  // Counters first: an overflow must abort before anything else is built
  const counters = packCounters(memory.counterRows());

  // A memory built over an explicit table has no seed to re-derive it from
  const spec = memory.addressSpec;
  const addresses: Bundle['addresses'] = {
    algorithm: RANDOM_ALGORITHM,
    strategy: spec?.strategy ?? 'per-index',
    seed: spec?.seed ?? 0,
  };
  if (options.includeAddressTable || !spec) {
    addresses.table = packAddressTable(memory.addressTable());
  }

  const index: Record<string, BundleFileEntry> = Object.fromEntries(
    files.map((file): [string, BundleFileEntry] => [
      file.name,
      { chunkKeys: [...file.chunkKeys], originalLength: file.originalLength },
    ])
  );

  return {
    format: BUNDLE_FORMAT,
    version: BUNDLE_FORMAT_VERSION,
    createdAt: (options.createdAt ?? new Date()).toISOString(),
    radius: memory.radius,
    chunkSize: memory.n,
    n: memory.n,
    p: memory.p,
    threshold: memory.threshold,
    addresses,
    counters,
    files: index,
  };
}
