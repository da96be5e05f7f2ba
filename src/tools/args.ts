/**
 * Tool argument parsing
 *
 * MCP hands tool arguments over as untyped JSON; these helpers turn them
 * into the typed inputs the handlers take.
 */

import type { ListInput, ReconstructInput, StatsInput, StoreInput } from '../types.js';

type Args = Record<string, unknown> | undefined;

function requireString(args: Args, key: string): string {
  const value = args?.[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Missing or invalid "${key}" (expected a non-empty string)`);
  }
  return value;
}

function optionalString(args: Args, key: string): string | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Invalid "${key}" (expected a string)`);
  }
  return value;
}

function optionalNumber(args: Args, key: string): number | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`Invalid "${key}" (expected a number)`);
  }
  return value;
}

function optionalBoolean(args: Args, key: string): boolean | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid "${key}" (expected a boolean)`);
  }
  return value;
}

export function parseStoreArgs(args: Args): StoreInput {
  const files = args?.files;
  if (!Array.isArray(files) || !files.every((file): file is string => typeof file === 'string')) {
    throw new Error('Missing or invalid "files" (expected an array of paths)');
  }
  return {
    files,
    outputPath: requireString(args, 'outputPath'),
    addressCount: optionalNumber(args, 'addressCount'),
    chunkSize: optionalNumber(args, 'chunkSize'),
    radiusFraction: optionalNumber(args, 'radiusFraction'),
    includeAddressTable: optionalBoolean(args, 'includeAddressTable'),
  };
}

export function parseListArgs(args: Args): ListInput {
  return { bundlePath: requireString(args, 'bundlePath') };
}

export function parseReconstructArgs(args: Args): ReconstructInput {
  return {
    bundlePath: requireString(args, 'bundlePath'),
    name: requireString(args, 'name'),
    outputPath: optionalString(args, 'outputPath'),
  };
}

export function parseStatsArgs(args: Args): StatsInput {
  return { bundlePath: requireString(args, 'bundlePath') };
}
