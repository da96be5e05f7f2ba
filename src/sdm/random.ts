/**
 * Seeded pseudorandom source
 *
 * mulberry32 over a 32-bit unsigned state. The algorithm is part of the
 * bundle format: a reader in any language regenerates identical addresses
 * from (seed, p, n, strategy), so it must not change.
 */

export const RANDOM_ALGORITHM = 'mulberry32';

export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Next unsigned 32-bit integer
   */
  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /**
   * Next bit: the top bit of one 32-bit output
   */
  nextBit(): 0 | 1 {
    return this.nextUint32() >>> 31 === 1 ? 1 : 0;
  }

  /**
   * Float in [0, 1)
   */
  next(): number {
    return this.nextUint32() / 4294967296;
  }

  /**
   * Fill a new vector of `length` random bits
   */
  bits(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = this.nextBit();
    }
    return out;
  }
}
