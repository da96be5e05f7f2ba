/**
 * Library entry point
 */

export * from './types.js';
export * from './errors.js';
export * from './sdm/index.js';
export * from './bundle/index.js';
export { IngestionSession } from './ingest/session.js';
export { loadConfig, getConfig, validateConfig } from './config/index.js';
