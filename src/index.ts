/**
 * fmc-sync library entry point
 *
 * Exposes the reconciliation engine, the FMC client and the state and
 * manifest layers for use without the CLI.
 */

export * from './api/index.js';
export * from './reconcilers/diagnostics.js';
export * from './reconcilers/access-policies/index.js';
export * from './state/index.js';
export * from './manifests/index.js';
export * from './errors.js';
export {
  findRepoRoot,
  discoverManifests,
  resolveStatePath,
  loadManifests,
  FMC_DIR,
  FMC_MANIFESTS_DIR,
  STATE_FILE_NAME,
  type RepoRoot,
  type ManifestLocation,
  type LoadedManifests,
} from './discover.js';
export {
  resolveConnectionSettings,
  resolveNotFoundPolicy,
  type ConnectionOverrides,
  type ConnectionSettings,
} from './config/index.js';
