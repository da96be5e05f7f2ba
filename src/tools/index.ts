/**
 * MCP Tools Module
 */

export { store, storeToolDef, type StoreResult } from './store.js';
export { list, listToolDef, type ListResult } from './list.js';
export { reconstruct, reconstructToolDef, type ReconstructResult } from './reconstruct.js';
export { stats, statsToolDef, type StatsResult } from './stats.js';
