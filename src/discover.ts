/**
 * Manifest and state file discovery
 *
 * 1. Finds the repo root by walking up until .fmc/ or .git/ exists
 * 2. Uses <repoRoot>/.fmc/manifests unless a path is given explicitly
 * 3. Places the state file at <repoRoot>/.fmc/state.yaml by default
 */

import { existsSync } from 'node:fs';
import { dirname, join, parse, resolve } from 'node:path';
import { ManifestError } from './errors.js';
import { loadManifestPath } from './manifests/loader.js';
import type { Manifest } from './manifests/types.js';

// =============================================================================
// Types
// =============================================================================

export interface RepoRoot {
  /** Absolute path to the repo root */
  path: string;
  /** How the repo root was detected */
  detectedBy: '.fmc' | '.git';
}

export interface ManifestLocation {
  /** Absolute path to the manifest file or directory */
  path: string;
  /** Found under .fmc/manifests, or passed with --manifests */
  type: 'fmc-manifests' | 'explicit';
  /** Repo root information (absent for an explicit path outside a repo) */
  repoRoot?: RepoRoot;
}

export interface LoadedManifests {
  manifests: Manifest[];
  location: ManifestLocation;
}

// =============================================================================
// Constants
// =============================================================================

/** Tool directory relative to the repo root */
export const FMC_DIR = '.fmc';

/** Manifest location relative to the repo root */
export const FMC_MANIFESTS_DIR = '.fmc/manifests';

/** State file name inside the tool directory */
export const STATE_FILE_NAME = 'state.yaml';

// =============================================================================
// Repo Root Discovery
// =============================================================================

/**
 * Find the repository root by walking up from startDir
 *
 * Prefers .fmc/ if both .fmc/ and .git/ exist at the same level.
 */
export function findRepoRoot(startDir: string): RepoRoot | null {
  let current = resolve(startDir);
  const root = parse(current).root;

  while (true) {
    if (existsSync(join(current, FMC_DIR))) {
      return { path: current, detectedBy: '.fmc' };
    }

    if (existsSync(join(current, '.git'))) {
      return { path: current, detectedBy: '.git' };
    }

    if (current === root) {
      break;
    }

    const parent = dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return null;
}

// =============================================================================
// Manifest Discovery
// =============================================================================

/**
 * Locate the manifests to load
 *
 * @param startDir - Directory to start searching from (defaults to cwd)
 * @param explicitPath - Path given with --manifests; takes precedence
 * @throws ManifestError if no manifest location can be found
 */
export function discoverManifests(
  startDir: string = process.cwd(),
  explicitPath?: string
): ManifestLocation {
  const repoRoot = findRepoRoot(startDir) ?? undefined;

  if (explicitPath) {
    return { path: resolve(startDir, explicitPath), type: 'explicit', repoRoot };
  }

  if (!repoRoot) {
    throw new ManifestError([
      'could not find the repository root; run inside a git repository or a directory with a .fmc/ folder, or pass --manifests',
    ]);
  }

  const manifestsPath = join(repoRoot.path, FMC_MANIFESTS_DIR);
  if (!existsSync(manifestsPath)) {
    throw new ManifestError([
      `no manifest directory found; create ${manifestsPath} or pass --manifests`,
    ]);
  }

  return { path: manifestsPath, type: 'fmc-manifests', repoRoot };
}

/**
 * Default state file path: <repoRoot>/.fmc/state.yaml, or ./.fmc/state.yaml
 * outside a repository
 */
export function resolveStatePath(startDir: string = process.cwd(), explicitPath?: string): string {
  if (explicitPath) {
    return resolve(startDir, explicitPath);
  }
  const repoRoot = findRepoRoot(startDir);
  return join(repoRoot?.path ?? resolve(startDir), FMC_DIR, STATE_FILE_NAME);
}

// =============================================================================
// Manifest Loading
// =============================================================================

/**
 * Discover and load every manifest
 *
 * @throws ManifestError when discovery fails or any manifest is invalid
 */
export async function loadManifests(
  startDir: string = process.cwd(),
  explicitPath?: string
): Promise<LoadedManifests> {
  const location = discoverManifests(startDir, explicitPath);
  const manifests = await loadManifestPath(location.path, {
    basePath: location.repoRoot?.path ?? startDir,
  });
  return { manifests, location };
}
