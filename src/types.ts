/**
 * Shared types and interfaces for the fmc-sync CLI
 */

import type { ApiLogger } from './api/logger.js';
import type { FmcClient } from './api/client.js';
import type { Diagnostic } from './reconcilers/diagnostics.js';
import type { PlanActionType } from './reconcilers/access-policies/plan.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Manifest file or directory (default: <repoRoot>/.fmc/manifests) */
  manifests?: string;
  /** State file (default: <repoRoot>/.fmc/state.yaml) */
  state?: string;
  /** FMC host or base URL */
  host?: string;
  /** FMC domain name */
  domain?: string;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Read behaviour when a stored resource is gone: error or remove */
  onMissing?: string;
  /** Enable verbose logging */
  verbose: boolean;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Directory discovery starts from */
  cwd: string;
  /** Aborted on SIGINT */
  signal: AbortSignal;
  logger: ApiLogger;
  /** Create the FMC client; resolves connection settings on first use */
  getClient: () => FmcClient;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

// ============================================================================
// Command Results
// ============================================================================

/**
 * Outcome of reconciling one resource address
 */
export interface ResourceOutcome {
  address: string;
  action: PlanActionType | 'refresh';
  /** Identity after the operation ('' when none) */
  id: string;
  success: boolean;
  diagnostics: Diagnostic[];
}

/**
 * Summary of apply, refresh and destroy runs
 */
export interface RunSummary {
  outcomes: ResourceOutcome[];
  succeeded: number;
  failed: number;
  /** Addresses not attempted because the run was cancelled */
  skipped: string[];
}
