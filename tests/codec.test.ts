/**
 * Bundle Codec Tests - run-length keys and signed counter packing
 */

import { describe, it, expect } from 'vitest';
import { runLengthDecode, runLengthEncode } from '../src/bundle/rle.js';
import { decodeKey, encodeKey, packAddressTable, unpackAddressTable } from '../src/bundle/keys.js';
import { packCounters, unpackCounters } from '../src/bundle/counters.js';
import { SeededRandom } from '../src/sdm/random.js';
import { toBitVector } from '../src/sdm/bits.js';
import { CounterOverflowError, MalformedEncodingError } from '../src/errors.js';

describe('Run-length encoding', () => {
  it('should encode runs as (count, value) pairs', () => {
    expect(runLengthEncode([0, 0, 0, 1, 1])).toEqual([3, 0, 2, 1]);
  });

  it('should decode pairs back into bits', () => {
    expect(Array.from(runLengthDecode([3, 0, 2, 1]))).toEqual([0, 0, 0, 1, 1]);
  });

  it('should split runs longer than 255', () => {
    expect(runLengthEncode(new Array(300).fill(1))).toEqual([255, 1, 45, 1]);
    expect(runLengthEncode(new Array(256).fill(0))).toEqual([255, 0, 1, 0]);
    expect(runLengthEncode(new Array(510).fill(0))).toEqual([255, 0, 255, 0]);
  });

  it('should encode an empty vector as nothing', () => {
    expect(runLengthEncode([])).toEqual([]);
    expect(runLengthDecode([])).toHaveLength(0);
  });

  it('should round trip random and long-run vectors', () => {
    const random = new SeededRandom(99);
    for (const length of [1, 255, 256, 1000, 10000]) {
      const bits = random.bits(length);
      expect(Array.from(runLengthDecode(runLengthEncode(bits)))).toEqual(Array.from(bits));
    }

    const runs = new Uint8Array(10000);
    runs.fill(1, 600, 4000);
    expect(Array.from(runLengthDecode(runLengthEncode(runs)))).toEqual(Array.from(runs));
  });

  it('should reject an odd number of bytes', () => {
    expect(() => runLengthDecode([3, 0, 2])).toThrow(MalformedEncodingError);
  });

  it('should reject values other than 0 and 1', () => {
    expect(() => runLengthDecode([3, 0, 2, 2])).toThrow(/Invalid value in RLE data at pair 1: 2/);
  });
});

describe('Key framing', () => {
  it('should base64 the run-length bytes', () => {
    expect(encodeKey(toBitVector('00011'))).toBe('AwACAQ==');
    expect(Array.from(decodeKey('AwACAQ=='))).toEqual([0, 0, 0, 1, 1]);
  });

  it('should reject text that is not base64', () => {
    expect(() => decodeKey('not base64!')).toThrow(MalformedEncodingError);
  });

  it('should reject an odd-length payload', () => {
    expect(() => decodeKey('Aw==')).toThrow(MalformedEncodingError);
  });

  it('should round trip an address table', () => {
    const table = [toBitVector('00000000'), toBitVector('10101010'), toBitVector('11110000')];
    const decoded = unpackAddressTable(packAddressTable(table), 3, 8);
    expect(decoded.map(v => Array.from(v))).toEqual(table.map(v => Array.from(v)));
  });

  it('should reject an address table of the wrong size', () => {
    const packed = packAddressTable([toBitVector('0101')]);
    expect(() => unpackAddressTable(packed, 2, 4)).toThrow(MalformedEncodingError);
  });
});

describe('Counter packing', () => {
  it('should pack signed counters as two\'s complement bytes', () => {
    expect(packCounters([[-1, 0, 1, 127, -128]])).toBe('/wABf4A=');
  });

  it('should unpack bytes back to signed counters', () => {
    const rows = unpackCounters('/wABf4A=', 1, 5);
    expect(Array.from(rows[0])).toEqual([-1, 0, 1, 127, -128]);
  });

  it('should split the flat counters into rows', () => {
    const rows = unpackCounters(packCounters([[1, -2], [-3, 4]]), 2, 2);
    expect(rows.map(row => Array.from(row))).toEqual([[1, -2], [-3, 4]]);
  });

  it('should refuse to clamp counters above 127', () => {
    try {
      packCounters([[0, 0], [0, 128]]);
      expect.unreachable('packCounters should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(CounterOverflowError);
      if (error instanceof CounterOverflowError) {
        expect(error.kind).toBe('CounterOverflow');
        expect([error.row, error.column, error.value]).toEqual([1, 1, 128]);
      }
    }
  });

  it('should refuse counters below -128', () => {
    expect(() => packCounters([[-129]])).toThrow(CounterOverflowError);
  });

  it('should reject a blob of the wrong size', () => {
    expect(() => unpackCounters('/wABf4A=', 2, 5)).toThrow(MalformedEncodingError);
  });
});
