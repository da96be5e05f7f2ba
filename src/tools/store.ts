/**
 * sdm_store - Store files in a fresh memory and write the bundle
 */

import * as fs from 'fs';
import * as path from 'path';
import { getConfig, validateConfig } from '../config/index.js';
import { IngestionSession } from '../ingest/session.js';
import { serializeBundle } from '../bundle/format.js';
import type { IngestFailure, StoreInput } from '../types.js';

export interface StoreResult {
  success: boolean;
  outputPath?: string;
  stored: Array<{ name: string; chunks: number; originalLength: number }>;
  failures: IngestFailure[];
  noOpWrites: number;
  warnings?: string[];
  error?: string;
}

/**
 * Ingest files and write a bundle
 */
export async function store(input: StoreInput): Promise<StoreResult> {
  const base = getConfig();
  const config = {
    ...base,
    addressCount: input.addressCount ?? base.addressCount,
    chunkSize: input.chunkSize ?? base.chunkSize,
    radiusFraction: input.radiusFraction ?? base.radiusFraction,
  };

  const validation = validateConfig(config);
  if (!validation.valid) {
    return {
      success: false,
      stored: [],
      failures: [],
      noOpWrites: 0,
      error: `Invalid parameters: ${validation.issues.join('; ')}`,
    };
  }

  if (config.backend !== 'counter') {
    return {
      success: false,
      stored: [],
      failures: [],
      noOpWrites: 0,
      error: `Bundles require the counter backend (configured: ${config.backend})`,
    };
  }

  try {
    const session = new IngestionSession(config);
    const report = session.ingestFiles(input.files);

    const stored = report.stored.map(record => ({
      name: record.name,
      chunks: record.chunkKeys.length,
      originalLength: record.originalLength,
    }));

    if (report.stored.length === 0) {
      return {
        success: false,
        stored,
        failures: report.failures,
        noOpWrites: report.noOpWrites,
        error: 'No files were stored; bundle not written',
      };
    }

    const bundle = session.toBundle({ includeAddressTable: input.includeAddressTable });

    const absolutePath = path.isAbsolute(input.outputPath)
      ? input.outputPath
      : path.join(process.cwd(), input.outputPath);
    const dir = path.dirname(absolutePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(absolutePath, serializeBundle(bundle), 'utf-8');

    const warnings: string[] = [...report.warnings];
    if (report.noOpWrites > 0) {
      warnings.push(`${report.noOpWrites} chunk writes reached no hard location; those chunks will read back as zeros`);
    }

    return {
      success: true,
      outputPath: absolutePath,
      stored,
      failures: report.failures,
      noOpWrites: report.noOpWrites,
      warnings: warnings.length > 0 ? warnings : undefined,
    };
  } catch (error) {
    return {
      success: false,
      stored: [],
      failures: [],
      noOpWrites: 0,
      error: `Store failed: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

/**
 * Tool definition for MCP
 */
export const storeToolDef = {
  name: 'sdm_store',
  description: 'Store one or more files in a sparse distributed memory and write a portable bundle from which any of them can be reconstructed.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      files: {
        type: 'array',
        items: { type: 'string' },
        description: 'Paths of the files to store. Missing files are reported and skipped.',
      },
      outputPath: {
        type: 'string',
        description: 'Where to write the bundle (JSON).',
      },
      addressCount: {
        type: 'number',
        minimum: 1,
        description: 'Number of hard locations. Default from config (2000).',
      },
      chunkSize: {
        type: 'number',
        minimum: 1,
        description: 'Chunk size in bits, also the vector length. Default from config (256).',
      },
      radiusFraction: {
        type: 'number',
        minimum: 0,
        maximum: 1,
        description: 'Neighborhood radius as a fraction of the vector length. Default from config (0.451).',
      },
      includeAddressTable: {
        type: 'boolean',
        description: 'Embed the explicit address table instead of relying on seed re-derivation. Default: false',
      },
    },
    required: ['files', 'outputPath'],
  },
};
