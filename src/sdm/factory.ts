import type { AssociativeMemory, SdmConfig } from '../types.js';
import { ChecksumMemory } from './checksum-memory.js';
import { CounterMemory } from './memory.js';

/**
 * Build the memory backend selected by configuration
 */
export function createMemory(config: SdmConfig): AssociativeMemory {
  const options = {
    addressCount: config.addressCount,
    vectorLength: config.chunkSize,
    radiusFraction: config.radiusFraction,
    threshold: config.threshold,
    addresses: { seed: config.addressSeed, strategy: config.strategy },
  };
  return config.backend === 'checksum' ? new ChecksumMemory(options) : CounterMemory.create(options);
}
