/**
 * Run-length encoding of binary vectors as flat (count, value) byte pairs
 */

import type { BitVector } from '../types.js';
import { MalformedEncodingError } from '../errors.js';

export const MAX_RUN = 255;

/**
 * [0,0,0,1,1] -> [3,0,2,1]. Runs longer than 255 are split across pairs.
 */
export function runLengthEncode(bits: ArrayLike<number>): number[] {
  const encoded: number[] = [];
  if (bits.length === 0) {
    return encoded;
  }

  let current = bits[0];
  let count = 1;
  for (let i = 1; i < bits.length; i++) {
    const value = bits[i];
    if (value === current && count < MAX_RUN) {
      count++;
    } else {
      encoded.push(count, current);
      current = value;
      count = 1;
    }
  }
  encoded.push(count, current);
  return encoded;
}

export function runLengthDecode(encoded: ArrayLike<number>): BitVector {
  if (encoded.length % 2 !== 0) {
    throw new MalformedEncodingError(
      `RLE data must hold (count, value) pairs, got ${encoded.length} bytes`
    );
  }

  let total = 0;
  for (let i = 0; i < encoded.length; i += 2) {
    const value = encoded[i + 1];
    if (value !== 0 && value !== 1) {
      throw new MalformedEncodingError(`Invalid value in RLE data at pair ${i / 2}: ${value}. Expected 0 or 1`);
    }
    total += encoded[i];
  }

  const bits = new Uint8Array(total);
  let offset = 0;
  for (let i = 0; i < encoded.length; i += 2) {
    const count = encoded[i];
    bits.fill(encoded[i + 1], offset, offset + count);
    offset += count;
  }
  return bits;
}
