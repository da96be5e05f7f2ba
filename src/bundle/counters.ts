/**
 * Signed counter packing
 *
 * Counters are flattened row-major and stored as two's complement bytes.
 * Anything outside -128..127 is an error: clamping would silently change
 * what a read returns.
 */

import { CounterOverflowError, MalformedEncodingError } from '../errors.js';
import { fromBase64, toBase64 } from './base64.js';

export const COUNTER_MIN = -128;
export const COUNTER_MAX = 127;

export function packCounterBytes(rows: readonly ArrayLike<number>[]): Uint8Array {
  const width = rows.length > 0 ? rows[0].length : 0;
  const bytes = new Uint8Array(rows.length * width);
  let offset = 0;
  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    for (let j = 0; j < row.length; j++) {
      const value = row[j];
      if (value < COUNTER_MIN || value > COUNTER_MAX) {
        throw new CounterOverflowError(i, j, value);
      }
      bytes[offset++] = value < 0 ? value + 256 : value;
    }
  }
  return bytes;
}

export function packCounters(rows: readonly ArrayLike<number>[]): string {
  return toBase64(packCounterBytes(rows));
}

export function unpackCounterBytes(bytes: Uint8Array, p: number, n: number): Int32Array[] {
  if (bytes.length !== p * n) {
    throw new MalformedEncodingError(
      `Counter data holds ${bytes.length} values, expected ${p} x ${n} = ${p * n}`
    );
  }

  const rows: Int32Array[] = [];
  for (let i = 0; i < p; i++) {
    const row = new Int32Array(n);
    for (let j = 0; j < n; j++) {
      const byte = bytes[i * n + j];
      row[j] = byte > COUNTER_MAX ? byte - 256 : byte;
    }
    rows.push(row);
  }
  return rows;
}

export function unpackCounters(text: string, p: number, n: number): Int32Array[] {
  return unpackCounterBytes(fromBase64(text, 'Counter data'), p, n);
}
