/**
 * Local state: the per-resource accessor and the state file
 *
 * @module state
 */

export * from './types.js';
export { ResourceData } from './resource-data.js';
export { StateStore, parseStateFile, serializeStateFile } from './store.js';
