/**
 * Chunk Codec - fixed-size chunking with zero padding, and exact truncation
 */

import type { BitVector } from '../types.js';
import { LengthMismatchError } from '../errors.js';

export interface SplitResult {
  chunks: BitVector[];
  originalLength: number;
}

export function splitChunks(bits: BitVector, chunkSize: number): SplitResult {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const chunks: BitVector[] = [];
  for (let start = 0; start < bits.length; start += chunkSize) {
    // new Uint8Array is zero filled, so a short tail is padded on the right
    const chunk = new Uint8Array(chunkSize);
    chunk.set(bits.subarray(start, start + chunkSize));
    chunks.push(chunk);
  }

  return { chunks, originalLength: bits.length };
}

export function joinChunks(chunks: readonly BitVector[], originalLength: number): BitVector {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  if (originalLength > total) {
    throw new LengthMismatchError(originalLength, total);
  }

  const joined = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    joined.set(chunk, offset);
    offset += chunk.length;
  }
  return joined.slice(0, originalLength);
}
