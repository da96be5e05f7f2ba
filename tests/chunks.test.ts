/**
 * Bit and Chunk Codec Tests
 */

import { describe, it, expect } from 'vitest';
import { bitsToBytes, bytesToBits, bitsToString, toBitVector } from '../src/sdm/bits.js';
import { joinChunks, splitChunks } from '../src/sdm/chunks.js';
import { LengthMismatchError } from '../src/errors.js';

describe('Bit Codec', () => {
  it('should expand bytes most significant bit first', () => {
    expect(Array.from(bytesToBits(Uint8Array.from([0xa5, 0x01])))).toEqual([
      1, 0, 1, 0, 0, 1, 0, 1,
      0, 0, 0, 0, 0, 0, 0, 1,
    ]);
  });

  it('should pack bits back into bytes', () => {
    expect(Array.from(bitsToBytes(toBitVector('1010010100000001')))).toEqual([0xa5, 0x01]);
  });

  it('should pad a partial trailing byte with zeros', () => {
    expect(Array.from(bitsToBytes(toBitVector('1011')))).toEqual([0xb0]);
  });

  it('should build vectors from strings and lists', () => {
    expect(bitsToString(toBitVector('0110'))).toBe('0110');
    expect(bitsToString(toBitVector([1, 0, 0, 1]))).toBe('1001');
  });
});

describe('Chunk Codec', () => {
  const payload = toBitVector('10110011' + '01011100' + '1111');

  it('should split 20 bits into three zero-padded 8-bit chunks', () => {
    const { chunks, originalLength } = splitChunks(payload, 8);

    expect(originalLength).toBe(20);
    expect(chunks.map(bitsToString)).toEqual(['10110011', '01011100', '11110000']);
  });

  it('should join chunks and drop the padding', () => {
    const { chunks, originalLength } = splitChunks(payload, 8);
    expect(bitsToString(joinChunks(chunks, originalLength))).toBe('10110011010111001111');
  });

  it('should not add a padding chunk for aligned payloads', () => {
    const { chunks } = splitChunks(toBitVector('1111000011110000'), 8);
    expect(chunks).toHaveLength(2);
  });

  it('should produce no chunks for an empty payload', () => {
    const { chunks, originalLength } = splitChunks(new Uint8Array(0), 8);
    expect(chunks).toHaveLength(0);
    expect(originalLength).toBe(0);
    expect(joinChunks(chunks, 0)).toHaveLength(0);
  });

  it('should fail when the original length exceeds the chunks', () => {
    const { chunks } = splitChunks(payload, 8);
    expect(() => joinChunks(chunks, 25)).toThrow(LengthMismatchError);
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => splitChunks(payload, 0)).toThrow(RangeError);
  });
});
