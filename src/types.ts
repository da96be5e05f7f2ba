// Bit vectors: one element per bit, each 0 or 1
export type Bit = 0 | 1;
export type BitVector = Uint8Array;

// Memory engine policies
export type AddressStrategy = 'per-index' | 'single-stream';
export type ThresholdPolicy = 'positive' | 'non-negative';
export type MemoryBackend = 'counter' | 'checksum';

export interface AssociativeMemory {
  /** Vector length (bits per key and per pattern) */
  readonly n: number;
  /** Number of hard locations */
  readonly p: number;
  /** Hamming radius of a neighborhood */
  readonly radius: number;
  readonly backend: MemoryBackend;
  /** Returns the number of hard locations touched (0 means a no-op write) */
  write(key: BitVector, pattern: BitVector): number;
  read(key: BitVector): BitVector;
}

export interface AddressSpec {
  seed: number;
  strategy: AddressStrategy;
}

export interface MemoryOptions {
  addressCount: number;
  vectorLength: number;
  radiusFraction: number;
  threshold?: ThresholdPolicy;
  addresses?: AddressSpec;
}

// Ingestion
export interface FileRecord {
  name: string;
  chunkKeys: string[];       // base64 RLE encoded key vectors, one per chunk
  originalLength: number;    // payload length in bits
}

export interface IngestFailure {
  path: string;
  error: string;
}

export interface IngestReport {
  stored: FileRecord[];
  failures: IngestFailure[];
  /** Names stored more than once; only the last file under each name is kept */
  warnings: string[];
  noOpWrites: number;
}

// Configuration
export interface SdmConfig {
  addressCount: number;
  chunkSize: number;         // bits per chunk, equal to the vector length n
  radiusFraction: number;
  addressSeed: number;
  keySeed: number;
  strategy: AddressStrategy;
  threshold: ThresholdPolicy;
  backend: MemoryBackend;
}

export const DEFAULT_CONFIG: SdmConfig = {
  addressCount: 2000,
  chunkSize: 256,
  radiusFraction: 0.451,
  addressSeed: 0,
  keySeed: 42,
  strategy: 'per-index',
  threshold: 'positive',
  backend: 'counter',
};

// MCP tool inputs
export interface StoreInput {
  files: string[];
  outputPath: string;
  addressCount?: number;
  chunkSize?: number;
  radiusFraction?: number;
  includeAddressTable?: boolean;
}

export interface ListInput {
  bundlePath: string;
}

export interface ReconstructInput {
  bundlePath: string;
  name: string;
  outputPath?: string;
}

export interface StatsInput {
  bundlePath: string;
}
