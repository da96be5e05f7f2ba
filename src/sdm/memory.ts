/**
 * Memory Engine - counter-based sparse distributed memory
 *
 * A write at key K adds the pattern (+1 per 1 bit, -1 per 0 bit) to the
 * counters of every hard location within `radius` of K. A read sums the
 * counters of the locations within `radius` of the probe and thresholds.
 */

import type {
  AddressSpec,
  AssociativeMemory,
  BitVector,
  MemoryOptions,
  ThresholdPolicy,
} from '../types.js';
import { DimensionMismatchError } from '../errors.js';
import { generateAddresses } from './addresses.js';

export function hammingDistance(a: BitVector, b: BitVector): number {
  const length = Math.min(a.length, b.length);
  let distance = Math.abs(a.length - b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      distance++;
    }
  }
  return distance;
}

export function radiusFor(fraction: number, n: number): number {
  return Math.floor(fraction * n);
}

export function assertLength(what: string, vector: BitVector, n: number): void {
  if (vector.length !== n) {
    throw new DimensionMismatchError(what, n, vector.length);
  }
}

export class CounterMemory implements AssociativeMemory {
  readonly backend = 'counter' as const;
  readonly n: number;
  readonly p: number;

  private readonly counters: Int32Array[];

  private constructor(
    private readonly addresses: readonly BitVector[],
    n: number,
    readonly radius: number,
    readonly threshold: ThresholdPolicy,
    readonly addressSpec: AddressSpec | undefined,
    counters?: Int32Array[]
  ) {
    for (let i = 0; i < addresses.length; i++) {
      assertLength(`Address ${i}`, addresses[i], n);
    }
    this.n = n;
    this.p = addresses.length;
    this.counters = counters ?? addresses.map(() => new Int32Array(n));
  }

  /**
   * Create an empty memory whose addresses are derived from a seed
   */
  static create(options: MemoryOptions): CounterMemory {
    const spec: AddressSpec = options.addresses ?? { seed: 0, strategy: 'per-index' };
    const addresses = generateAddresses(spec.seed, options.addressCount, options.vectorLength, spec.strategy);
    return new CounterMemory(
      addresses,
      options.vectorLength,
      radiusFor(options.radiusFraction, options.vectorLength),
      options.threshold ?? 'positive',
      spec
    );
  }

  /**
   * Create an empty memory over an explicit address table
   */
  static withAddresses(
    addresses: BitVector[],
    n: number,
    radius: number,
    threshold: ThresholdPolicy = 'positive'
  ): CounterMemory {
    return new CounterMemory(addresses, n, radius, threshold, undefined);
  }

  /**
   * Rebuild a memory from previously written counters
   */
  static fromCounters(
    addresses: BitVector[],
    counters: Int32Array[],
    radius: number,
    threshold: ThresholdPolicy,
    addressSpec?: AddressSpec
  ): CounterMemory {
    const n = addresses.length > 0 ? addresses[0].length : 0;
    if (counters.length !== addresses.length) {
      throw new DimensionMismatchError('Counter matrix', addresses.length, counters.length);
    }
    counters.forEach((row, i) => {
      if (row.length !== n) {
        throw new DimensionMismatchError(`Counter row ${i}`, n, row.length);
      }
    });
    return new CounterMemory(addresses, n, radius, threshold, addressSpec, counters);
  }

  /**
   * Indices of the hard locations within radius of `key`
   */
  neighborhood(key: BitVector): number[] {
    assertLength('Key', key, this.n);
    const indices: number[] = [];
    for (let i = 0; i < this.p; i++) {
      if (hammingDistance(this.addresses[i], key) <= this.radius) {
        indices.push(i);
      }
    }
    return indices;
  }

  write(key: BitVector, pattern: BitVector): number {
    assertLength('Key', key, this.n);
    assertLength('Pattern', pattern, this.n);

    const touched = this.neighborhood(key);
    for (const i of touched) {
      const row = this.counters[i];
      for (let j = 0; j < this.n; j++) {
        row[j] += pattern[j] === 1 ? 1 : -1;
      }
    }
    return touched.length;
  }

  read(key: BitVector): BitVector {
    const sums = this.accumulate(key);
    const out = new Uint8Array(this.n);
    for (let j = 0; j < this.n; j++) {
      const on = this.threshold === 'positive' ? sums[j] > 0 : sums[j] >= 0;
      out[j] = on ? 1 : 0;
    }
    return out;
  }

  /**
   * Raw per-bit sums before thresholding
   */
  accumulate(key: BitVector): Int32Array {
    const sums = new Int32Array(this.n);
    for (const i of this.neighborhood(key)) {
      const row = this.counters[i];
      for (let j = 0; j < this.n; j++) {
        sums[j] += row[j];
      }
    }
    return sums;
  }

  address(index: number): BitVector {
    return this.addresses[index];
  }

  addressTable(): readonly BitVector[] {
    return this.addresses;
  }

  counterRows(): readonly Int32Array[] {
    return this.counters;
  }

  counterRange(): { min: number; max: number } {
    let min = 0;
    let max = 0;
    for (const row of this.counters) {
      for (const value of row) {
        if (value < min) min = value;
        if (value > max) max = value;
      }
    }
    return { min, max };
  }
}
