/**
 * Tool Handler Tests - store, list, reconstruct and stats against temp files
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { store, list, reconstruct, stats } from '../src/tools/index.js';
import { parseReconstructArgs, parseStoreArgs } from '../src/tools/args.js';
import { summarizeNeighborhoods } from '../src/tools/stats.js';
import { clearConfigCache } from '../src/config/index.js';

const CONTENT = 'hello sparse memory\n'; // 20 bytes, 3 chunks of 64 bits
const PARAMS = { addressCount: 2000, chunkSize: 64, radiusFraction: 0.35 };

describe('Tools', () => {
  let tempDir: string;
  let previousHome: string | undefined;
  let sourcePath: string;
  let bundlePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sparse-memory-tools-'));
    previousHome = process.env.SPARSE_MEMORY_HOME;
    process.env.SPARSE_MEMORY_HOME = path.join(tempDir, 'home');
    clearConfigCache();

    sourcePath = path.join(tempDir, 'greeting.txt');
    bundlePath = path.join(tempDir, 'out', 'store.json');
    fs.writeFileSync(sourcePath, CONTENT);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    if (previousHome === undefined) {
      delete process.env.SPARSE_MEMORY_HOME;
    } else {
      process.env.SPARSE_MEMORY_HOME = previousHome;
    }
    clearConfigCache();
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('store', () => {
    it('should write a bundle and report what was stored', async () => {
      const result = await store({ files: [sourcePath], outputPath: bundlePath, ...PARAMS });

      expect(result.success).toBe(true);
      expect(result.outputPath).toBe(bundlePath);
      expect(result.stored).toEqual([{ name: 'greeting.txt', chunks: 3, originalLength: 160 }]);
      expect(result.failures).toEqual([]);
      expect(fs.existsSync(bundlePath)).toBe(true);
    });

    it('should skip missing files and still write the bundle', async () => {
      const missing = path.join(tempDir, 'nope.txt');
      const result = await store({ files: [missing, sourcePath], outputPath: bundlePath, ...PARAMS });

      expect(result.success).toBe(true);
      expect(result.stored).toHaveLength(1);
      expect(result.failures.map(f => f.path)).toEqual([missing]);
    });

    it('should surface a replaced base name as a warning', async () => {
      const other = path.join(tempDir, 'copy', 'greeting.txt');
      fs.mkdirSync(path.dirname(other));
      fs.writeFileSync(other, CONTENT);

      const result = await store({ files: [sourcePath, other], outputPath: bundlePath, ...PARAMS });

      expect(result.success).toBe(true);
      expect(result.stored).toHaveLength(1);
      expect(result.warnings).toEqual([`${other} replaces an earlier file stored as greeting.txt`]);
    });

    it('should not write a bundle when nothing could be stored', async () => {
      const result = await store({ files: [path.join(tempDir, 'nope.txt')], outputPath: bundlePath, ...PARAMS });

      expect(result.success).toBe(false);
      expect(result.error).toBe('No files were stored; bundle not written');
      expect(fs.existsSync(bundlePath)).toBe(false);
    });

    it('should reject invalid parameters', async () => {
      const result = await store({ files: [sourcePath], outputPath: bundlePath, chunkSize: 0 });

      expect(result.success).toBe(false);
      expect(result.error).toBe('Invalid parameters: chunkSize must be a positive integer, got 0');
    });
  });

  describe('list', () => {
    it('should list the stored files', async () => {
      await store({ files: [sourcePath], outputPath: bundlePath, ...PARAMS });

      const result = await list({ bundlePath });
      expect(result).toEqual({
        success: true,
        files: [{ name: 'greeting.txt', chunks: 3, originalLength: 160, bytes: 20 }],
      });
    });

    it('should report an unreadable bundle', async () => {
      const result = await list({ bundlePath: path.join(tempDir, 'absent.json') });

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^Failed to read bundle: /);
    });
  });

  describe('reconstruct', () => {
    it('should rebuild the file byte for byte', async () => {
      await store({ files: [sourcePath], outputPath: bundlePath, ...PARAMS });
      const outputPath = path.join(tempDir, 'copy.txt');

      const result = await reconstruct({ bundlePath, name: 'greeting.txt', outputPath });

      expect(result).toEqual({ success: true, name: 'greeting.txt', outputPath, bytes: 20 });
      expect(fs.readFileSync(outputPath, 'utf-8')).toBe(CONTENT);
    });

    it('should fail for an unknown name without writing', async () => {
      await store({ files: [sourcePath], outputPath: bundlePath, ...PARAMS });
      const outputPath = path.join(tempDir, 'copy.txt');

      const result = await reconstruct({ bundlePath, name: 'other.txt', outputPath });

      expect(result.success).toBe(false);
      expect(result.error).toBe('Reconstruction failed: Unknown file "other.txt". Available: greeting.txt');
      expect(fs.existsSync(outputPath)).toBe(false);
    });
  });

  describe('stats', () => {
    it('should describe the bundle', async () => {
      await store({ files: [sourcePath], outputPath: bundlePath, ...PARAMS });

      const result = await stats({ bundlePath });

      expect(result.success).toBe(true);
      expect(result.stats?.parameters).toEqual({ p: 2000, n: 64, radius: 22, chunkSize: 64, threshold: 'positive' });
      expect(result.stats?.addresses).toEqual({
        algorithm: 'mulberry32',
        strategy: 'per-index',
        seed: 0,
        explicitTable: false,
      });
      expect(result.stats?.files).toEqual({ total: 1, chunks: 3, bytes: 20 });
      expect(result.stats?.neighborhoods.empty).toBe(0);
    });
  });
});

describe('Neighborhood summary', () => {
  it('should summarize sizes in one pass', () => {
    expect(summarizeNeighborhoods([3, 0, 5, 4])).toEqual({ min: 0, max: 5, avg: 3, empty: 1 });
    expect(summarizeNeighborhoods([])).toEqual({ min: 0, max: 0, avg: 0, empty: 0 });
  });

  it('should handle more chunk keys than fit in an argument list', () => {
    const sizes = Array.from({ length: 500_000 }, (_, i) => (i % 10) + 1);

    expect(summarizeNeighborhoods(sizes)).toEqual({ min: 1, max: 10, avg: 5.5, empty: 0 });
  });
});

describe('Tool arguments', () => {
  it('should parse store arguments', () => {
    expect(parseStoreArgs({ files: ['a.txt'], outputPath: 'b.json', chunkSize: 128 })).toEqual({
      files: ['a.txt'],
      outputPath: 'b.json',
      addressCount: undefined,
      chunkSize: 128,
      radiusFraction: undefined,
      includeAddressTable: undefined,
    });
  });

  it('should reject malformed arguments', () => {
    expect(() => parseStoreArgs({ files: 'a.txt', outputPath: 'b.json' })).toThrow('Missing or invalid "files"');
    expect(() => parseStoreArgs({ files: [], outputPath: 'b.json', chunkSize: '64' })).toThrow('Invalid "chunkSize"');
    expect(() => parseReconstructArgs({ bundlePath: 'b.json' })).toThrow('Missing or invalid "name"');
    expect(() => parseReconstructArgs(undefined)).toThrow('Missing or invalid "bundlePath"');
  });
});
