/**
 * Checksum-dictionary backend
 *
 * Each hard location keeps the exact blocks written near it, keyed by a
 * content checksum. A read gathers every block in the neighborhood whose
 * checksum still validates and returns the most frequent one.
 */

import type { AddressSpec, AssociativeMemory, BitVector, MemoryOptions } from '../types.js';
import { generateAddresses } from './addresses.js';
import { bitsToBytes, bitsToString } from './bits.js';
import { assertLength, hammingDistance, radiusFor } from './memory.js';

const CHECKSUM_MODULUS = 100000;

export function blockChecksum(block: BitVector): number {
  let sum = 0;
  for (const byte of bitsToBytes(block)) {
    sum += byte;
  }
  return sum % CHECKSUM_MODULUS;
}

export class ChecksumMemory implements AssociativeMemory {
  readonly backend = 'checksum' as const;
  readonly n: number;
  readonly p: number;
  readonly radius: number;
  readonly addressSpec: AddressSpec;

  private readonly addresses: BitVector[];
  private readonly slots: Array<Map<number, BitVector>>;

  /**
   * Addresses are derived from `options.addresses` unless an explicit table
   * is given.
   */
  constructor(options: MemoryOptions, addresses?: BitVector[]) {
    this.addressSpec = options.addresses ?? { seed: 0, strategy: 'per-index' };
    this.n = options.vectorLength;
    this.radius = radiusFor(options.radiusFraction, options.vectorLength);
    this.addresses = addresses
      ?? generateAddresses(this.addressSpec.seed, options.addressCount, this.n, this.addressSpec.strategy);
    this.addresses.forEach((address, i) => assertLength(`Address ${i}`, address, this.n));
    this.p = this.addresses.length;
    this.slots = this.addresses.map(() => new Map<number, BitVector>());
  }

  write(key: BitVector, pattern: BitVector): number {
    assertLength('Key', key, this.n);
    assertLength('Pattern', pattern, this.n);

    const checksum = blockChecksum(pattern);
    const block = pattern.slice();
    let touched = 0;
    for (let i = 0; i < this.p; i++) {
      if (hammingDistance(this.addresses[i], key) <= this.radius) {
        this.slots[i].set(checksum, block);
        touched++;
      }
    }
    return touched;
  }

  /**
   * Majority vote over validated blocks; an empty vector when none validates
   */
  read(key: BitVector): BitVector {
    assertLength('Key', key, this.n);

    const votes = new Map<string, { block: BitVector; count: number }>();
    for (let i = 0; i < this.p; i++) {
      if (hammingDistance(this.addresses[i], key) > this.radius) {
        continue;
      }
      for (const [checksum, block] of this.slots[i]) {
        if (checksum !== blockChecksum(block)) {
          continue;
        }
        const id = bitsToString(block);
        const entry = votes.get(id);
        if (entry) {
          entry.count++;
        } else {
          votes.set(id, { block, count: 1 });
        }
      }
    }

    let best: { block: BitVector; count: number } | undefined;
    for (const entry of votes.values()) {
      if (!best || entry.count > best.count) {
        best = entry;
      }
    }
    return best ? best.block.slice() : new Uint8Array(0);
  }

  /**
   * Number of blocks stored at a hard location
   */
  blocksAt(index: number): number {
    return this.slots[index].size;
  }
}
