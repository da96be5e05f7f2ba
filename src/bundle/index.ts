/**
 * Bundle Module
 *
 * Portable JSON snapshot of a memory and its file index, and the reader
 * that rebuilds files from it.
 */

export * from './base64.js';
export * from './rle.js';
export * from './counters.js';
export * from './keys.js';
export * from './format.js';
export * from './encoder.js';
export * from './reader.js';
