/**
 * SDM Module
 *
 * Sparse distributed memory engine and the codecs it stands on.
 */

export * from './bits.js';
export * from './random.js';
export * from './addresses.js';
export * from './memory.js';
export * from './checksum-memory.js';
export * from './chunks.js';
export * from './factory.js';
