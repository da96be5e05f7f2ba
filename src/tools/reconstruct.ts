/**
 * sdm_reconstruct - Rebuild one file from a bundle
 *
 * Only the bundle is needed: addresses are re-derived from the recorded
 * seed, counters are unpacked and every chunk key is read back.
 */

import * as path from 'path';
import { BundleReader } from '../bundle/reader.js';
import type { ReconstructInput } from '../types.js';

export interface ReconstructResult {
  success: boolean;
  name: string;
  outputPath?: string;
  bytes?: number;
  error?: string;
}

export async function reconstruct(input: ReconstructInput): Promise<ReconstructResult> {
  try {
    const reader = BundleReader.readFile(input.bundlePath);
    const outputPath = input.outputPath
      || path.join(process.cwd(), `reconstructed_${path.basename(input.name)}`);
    const written = reader.writeFile(input.name, outputPath);
    const info = reader.listFiles().find(file => file.name === input.name);

    return {
      success: true,
      name: input.name,
      outputPath: written,
      bytes: info?.bytes,
    };
  } catch (error) {
    return {
      success: false,
      name: input.name,
      error: `Reconstruction failed: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

/**
 * Tool definition for MCP
 */
export const reconstructToolDef = {
  name: 'sdm_reconstruct',
  description: 'Reconstruct a stored file from a sparse memory bundle and write it to disk. Nothing is written if the file is not in the bundle.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      bundlePath: {
        type: 'string',
        description: 'Path of the bundle file.',
      },
      name: {
        type: 'string',
        description: 'Name of the stored file (as shown by sdm_list).',
      },
      outputPath: {
        type: 'string',
        description: 'Where to write the file. Defaults to reconstructed_<name> in the current directory.',
      },
    },
    required: ['bundlePath', 'name'],
  },
};
