/**
 * Key and address-table framing: RLE pairs as bytes, then base64
 */

import type { BitVector } from '../types.js';
import { MalformedEncodingError } from '../errors.js';
import { fromBase64, toBase64 } from './base64.js';
import { runLengthDecode, runLengthEncode } from './rle.js';

export function encodeKey(key: BitVector): string {
  return toBase64(Uint8Array.from(runLengthEncode(key)));
}

export function decodeKey(encoded: string): BitVector {
  return runLengthDecode(fromBase64(encoded, 'Chunk key'));
}

/**
 * All addresses concatenated into one run-length stream
 */
export function packAddressTable(addresses: readonly BitVector[]): string {
  const n = addresses.length > 0 ? addresses[0].length : 0;
  const flat = new Uint8Array(addresses.length * n);
  addresses.forEach((address, i) => flat.set(address, i * n));
  return encodeKey(flat);
}

export function unpackAddressTable(encoded: string, p: number, n: number): BitVector[] {
  const flat = runLengthDecode(fromBase64(encoded, 'Address table'));
  if (flat.length !== p * n) {
    throw new MalformedEncodingError(
      `Address table holds ${flat.length} bits, expected ${p} x ${n} = ${p * n}`
    );
  }
  return Array.from({ length: p }, (_, i) => flat.slice(i * n, (i + 1) * n));
}
