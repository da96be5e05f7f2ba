/**
 * Ingestion Session
 *
 * Owns one memory for the lifetime of a batch. Each payload is split into
 * chunks, every chunk gets a fresh random key from the session's key stream,
 * and the (key, chunk) pairs are written into the shared memory.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { AssociativeMemory, FileRecord, IngestReport, SdmConfig } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';
import { SourceUnavailableError } from '../errors.js';
import { bytesToBits } from '../sdm/bits.js';
import { splitChunks } from '../sdm/chunks.js';
import { createMemory } from '../sdm/factory.js';
import { SeededRandom } from '../sdm/random.js';
import { encodeBundle, type EncodeBundleOptions } from '../bundle/encoder.js';
import type { Bundle } from '../bundle/format.js';
import { encodeKey } from '../bundle/keys.js';

export class IngestionSession {
  readonly config: SdmConfig;
  readonly memory: AssociativeMemory;

  private readonly keys: SeededRandom;
  private readonly records = new Map<string, FileRecord>();
  private noOps = 0;

  constructor(config: Partial<SdmConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.memory = createMemory(this.config);
    this.keys = new SeededRandom(this.config.keySeed);
  }

  /**
   * Chunk writes so far that reached no hard location
   */
  get noOpWrites(): number {
    return this.noOps;
  }

  /**
   * Store one payload under `name`. Re-ingesting a name replaces its index
   * entry; the earlier writes stay superimposed in the counters.
   */
  ingest(name: string, payload: Uint8Array): FileRecord {
    const { chunks, originalLength } = splitChunks(bytesToBits(payload), this.config.chunkSize);

    const chunkKeys: string[] = [];
    let missed = 0;
    for (const chunk of chunks) {
      const key = this.keys.bits(this.memory.n);
      if (this.memory.write(key, chunk) === 0) {
        missed++;
      }
      chunkKeys.push(encodeKey(key));
    }

    if (missed > 0) {
      this.noOps += missed;
      console.warn(
        `${name}: ${missed} of ${chunks.length} chunks reached no hard location; ` +
        `raise the address count or the radius fraction`
      );
    }

    const record: FileRecord = { name, chunkKeys, originalLength };
    this.records.set(name, record);
    return record;
  }

  /**
   * Read and store each path. A file that fails is reported and skipped;
   * the rest of the batch continues.
   */
  ingestFiles(paths: readonly string[]): IngestReport {
    const report: IngestReport = { stored: [], failures: [], warnings: [], noOpWrites: 0 };
    const noOpsBefore = this.noOps;

    for (const filePath of paths) {
      let payload: Uint8Array;
      try {
        payload = fs.readFileSync(filePath);
      } catch (error) {
        const failure = new SourceUnavailableError(filePath, error);
        console.error(`${failure.message}. Skipping.`);
        report.failures.push({ path: filePath, error: failure.message });
        continue;
      }

      const name = path.basename(filePath);
      try {
        const replaces = this.records.get(name);
        const record = this.ingest(name, payload);
        if (replaces) {
          const warning = `${filePath} replaces an earlier file stored as ${name}`;
          console.warn(warning);
          report.warnings.push(warning);
          report.stored = report.stored.filter(stored => stored !== replaces);
        }
        report.stored.push(record);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Error processing file ${filePath}: ${message}. Skipping.`);
        report.failures.push({ path: filePath, error: message });
      }
    }

    report.noOpWrites = this.noOps - noOpsBefore;
    return report;
  }

  files(): FileRecord[] {
    return [...this.records.values()];
  }

  toBundle(options: EncodeBundleOptions = {}): Bundle {
    return encodeBundle(this.memory, this.files(), options);
  }
}
