/**
 * Reconstruction Reader
 *
 * Rebuilds stored files from a bundle alone: addresses are re-derived from
 * the recorded seed and strategy (or taken from the embedded table), the
 * counters are unpacked, and each chunk key is read back from the memory.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { BitVector } from '../types.js';
import { UnknownFileError } from '../errors.js';
import { generateAddresses } from '../sdm/addresses.js';
import { bitsToBytes } from '../sdm/bits.js';
import { joinChunks } from '../sdm/chunks.js';
import { CounterMemory } from '../sdm/memory.js';
import { unpackCounters } from './counters.js';
import { parseBundle, type Bundle } from './format.js';
import { decodeKey, unpackAddressTable } from './keys.js';

export interface BundleFileInfo {
  name: string;
  chunks: number;
  /** Length in bits */
  originalLength: number;
  /** Length in whole bytes */
  bytes: number;
}

export class BundleReader {
  private constructor(
    readonly bundle: Bundle,
    readonly memory: CounterMemory
  ) {}

  static fromBundle(bundle: Bundle): BundleReader {
    const { p, n, addresses: spec } = bundle;
    const counters = unpackCounters(bundle.counters, p, n);

    const memory = spec.table !== undefined
      ? CounterMemory.fromCounters(unpackAddressTable(spec.table, p, n), counters, bundle.radius, bundle.threshold)
      : CounterMemory.fromCounters(
          generateAddresses(spec.seed, p, n, spec.strategy),
          counters,
          bundle.radius,
          bundle.threshold,
          { seed: spec.seed, strategy: spec.strategy }
        );
    return new BundleReader(bundle, memory);
  }

  static fromJSON(text: string): BundleReader {
    return BundleReader.fromBundle(parseBundle(text));
  }

  static readFile(bundlePath: string): BundleReader {
    return BundleReader.fromJSON(fs.readFileSync(bundlePath, 'utf-8'));
  }

  listFiles(): BundleFileInfo[] {
    return Object.entries(this.bundle.files).map(([name, entry]) => ({
      name,
      chunks: entry.chunkKeys.length,
      originalLength: entry.originalLength,
      bytes: Math.ceil(entry.originalLength / 8),
    }));
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.bundle.files, name);
  }

  reconstructBits(name: string): BitVector {
    if (!this.has(name)) {
      throw new UnknownFileError(name, Object.keys(this.bundle.files));
    }
    const entry = this.bundle.files[name];
    const chunks = entry.chunkKeys.map(encoded => this.memory.read(decodeKey(encoded)));
    return joinChunks(chunks, entry.originalLength);
  }

  reconstruct(name: string): Uint8Array {
    return bitsToBytes(this.reconstructBits(name));
  }

  /**
   * Reconstruct `name` and write it. Nothing is written if reconstruction
   * fails.
   */
  writeFile(name: string, outputPath: string): string {
    const bytes = this.reconstruct(name);
    const absolutePath = path.resolve(outputPath);
    const dir = path.dirname(absolutePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(absolutePath, bytes);
    return absolutePath;
  }
}
