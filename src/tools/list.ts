/**
 * sdm_list - List the files a bundle can reconstruct
 */

import { BundleReader, type BundleFileInfo } from '../bundle/reader.js';
import type { ListInput } from '../types.js';

export interface ListResult {
  success: boolean;
  files: BundleFileInfo[];
  error?: string;
}

export async function list(input: ListInput): Promise<ListResult> {
  try {
    const reader = BundleReader.readFile(input.bundlePath);
    return { success: true, files: reader.listFiles() };
  } catch (error) {
    return {
      success: false,
      files: [],
      error: `Failed to read bundle: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

/**
 * Tool definition for MCP
 */
export const listToolDef = {
  name: 'sdm_list',
  description: 'List the files stored in a sparse memory bundle, with their chunk counts and sizes.',
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
