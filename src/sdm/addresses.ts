/**
 * Deterministic Address Generator
 *
 * Strategies:
 *   per-index      address i comes from its own stream seeded with seed + i,
 *                  so any address is reproducible from its index alone
 *   single-stream  one stream seeded with `seed` emits all addresses in order
 */

import type { AddressStrategy, BitVector } from '../types.js';
import { SeededRandom } from './random.js';

export function deriveIndexSeed(seed: number, index: number): number {
  return (seed + index) >>> 0;
}

/**
 * Regenerate a single address under the per-index strategy
 */
export function generateAddress(seed: number, index: number, length: number): BitVector {
  return new SeededRandom(deriveIndexSeed(seed, index)).bits(length);
}

export function generateAddresses(
  seed: number,
  count: number,
  length: number,
  strategy: AddressStrategy = 'per-index'
): BitVector[] {
  if (strategy === 'single-stream') {
    const random = new SeededRandom(seed);
    return Array.from({ length: count }, () => random.bits(length));
  }
  return Array.from({ length: count }, (_, i) => generateAddress(seed, i, length));
}
