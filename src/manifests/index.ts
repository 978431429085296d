/**
 * Manifest types and loading
 *
 * @module manifests
 */

export * from './types.js';
export { loadManifestPath, validateDocument, type ManifestLoadOptions, type RawDocument } from './loader.js';
