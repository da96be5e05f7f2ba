/**
 * Bit Codec - bytes to MSB-first bit vectors and back
 */

import type { BitVector } from '../types.js';

/**
 * Expand bytes into bits, most significant bit first
 */
export function bytesToBits(bytes: Uint8Array): BitVector {
  const bits = new Uint8Array(bytes.length * 8);
  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i];
    for (let b = 0; b < 8; b++) {
      bits[i * 8 + b] = (byte >> (7 - b)) & 1;
    }
  }
  return bits;
}

/**
 * Pack bits into bytes. A trailing partial byte is padded with zero bits on
 * the right.
 */
export function bitsToBytes(bits: BitVector): Uint8Array {
  const bytes = new Uint8Array(Math.ceil(bits.length / 8));
  for (let i = 0; i < bits.length; i++) {
    if (bits[i] === 1) {
      bytes[i >> 3] |= 0x80 >> (i & 7);
    }
  }
  return bytes;
}

/**
 * Build a bit vector from a list or a '0'/'1' string
 */
export function toBitVector(source: ArrayLike<number> | string): BitVector {
  if (typeof source === 'string') {
    const bits = new Uint8Array(source.length);
    for (let i = 0; i < source.length; i++) {
      bits[i] = source[i] === '1' ? 1 : 0;
    }
    return bits;
  }
  return Uint8Array.from(source, v => (v ? 1 : 0));
}

export function bitsToString(bits: BitVector): string {
  return Array.from(bits).join('');
}
