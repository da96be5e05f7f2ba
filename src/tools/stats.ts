/**
 * sdm_stats - Inspect a bundle's memory parameters and load
 */

import { BundleReader } from '../bundle/reader.js';
import { decodeKey } from '../bundle/keys.js';
import type { StatsInput } from '../types.js';

export interface StatsResult {
  success: boolean;
  stats?: {
    version: string;
    createdAt: string;
    parameters: {
      p: number;
      n: number;
      radius: number;
      chunkSize: number;
      threshold: string;
    };
    addresses: {
      algorithm: string;
      strategy: string;
      seed: number;
      explicitTable: boolean;
    };
    counters: {
      min: number;
      max: number;
    };
    files: {
      total: number;
      chunks: number;
      bytes: number;
    };
    neighborhoods: {
      min: number;
      max: number;
      avg: number;
      empty: number;
    };
  };
  error?: string;
}

export type NeighborhoodSummary = NonNullable<StatsResult['stats']>['neighborhoods'];

/**
 * Min, max, mean (one decimal) and empty count of neighborhood sizes
 */
export function summarizeNeighborhoods(sizes: Iterable<number>): NeighborhoodSummary {
  let count = 0;
  let total = 0;
  let min = Infinity;
  let max = 0;
  let empty = 0;
  for (const size of sizes) {
    count++;
    total += size;
    if (size < min) min = size;
    if (size > max) max = size;
    if (size === 0) empty++;
  }
  if (count === 0) {
    return { min: 0, max: 0, avg: 0, empty: 0 };
  }
  return { min, max, avg: Math.round((total / count) * 10) / 10, empty };
}

export async function stats(input: StatsInput): Promise<StatsResult> {
  try {
    const reader = BundleReader.readFile(input.bundlePath);
    const { bundle, memory } = reader;
    const files = reader.listFiles();

    // Neighborhood size of every chunk key
    const sizes: number[] = [];
    for (const entry of Object.values(bundle.files)) {
      for (const encoded of entry.chunkKeys) {
        sizes.push(memory.neighborhood(decodeKey(encoded)).length);
      }
    }

    return {
      success: true,
      stats: {
        version: bundle.version,
        createdAt: bundle.createdAt,
        parameters: {
          p: bundle.p,
          n: bundle.n,
          radius: bundle.radius,
          chunkSize: bundle.chunkSize,
          threshold: bundle.threshold,
        },
        addresses: {
          algorithm: bundle.addresses.algorithm,
          strategy: bundle.addresses.strategy,
          seed: bundle.addresses.seed,
          explicitTable: bundle.addresses.table !== undefined,
        },
        counters: memory.counterRange(),
        files: {
          total: files.length,
          chunks: sizes.length,
          bytes: files.reduce((sum, file) => sum + file.bytes, 0),
        },
        neighborhoods: summarizeNeighborhoods(sizes),
      },
    };
  } catch (error) {
    return {
      success: false,
      error: `Failed to read bundle: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

/**
 * Tool definition for MCP
 */
export const statsToolDef = {
  name: 'sdm_stats',
  description: 'Get statistics about a sparse memory bundle: parameters, counter range, file totals and how many hard locations each chunk key reaches.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      bundlePath: {
        type: 'string',
        description: 'Path of the bundle file.',
      },
    },
    required: ['bundlePath'],
  },
};
