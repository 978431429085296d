/**
 * Helpers shared by the state-changing commands
 */

import { resolveNotFoundPolicy } from '../config/index.js';
import { loadManifests, resolveStatePath } from '../discover.js';
import { StateFileError } from '../errors.js';
import { buildPlan, type Plan } from '../reconcilers/access-policies/plan.js';
import { AccessPolicyReconciler } from '../reconcilers/access-policies/reconcile.js';
import { hasErrors, type Diagnostic } from '../reconcilers/diagnostics.js';
import { ResourceData } from '../state/resource-data.js';
import { StateStore } from '../state/store.js';
import type { CommandContext, ResourceOutcome, RunSummary } from '../types.js';
import { error as printError, printDiagnostics, success as printSuccess, verbose } from '../utils/output.js';

/**
 * Load the state file named by --state or found by discovery
 */
export async function openStateStore(ctx: CommandContext): Promise<StateStore> {
  const statePath = resolveStatePath(ctx.cwd, ctx.options.state);
  verbose(`State file: ${statePath}`, ctx.options.verbose);
  return StateStore.load(statePath);
}

/**
 * Load manifests and state, and plan
 */
export async function computePlan(ctx: CommandContext): Promise<{ plan: Plan; store: StateStore }> {
  const { manifests, location } = await loadManifests(ctx.cwd, ctx.options.manifests);
  verbose(`Loaded ${manifests.length} manifest(s) from ${location.path}`, ctx.options.verbose);
  const store = await openStateStore(ctx);
  return { plan: buildPlan(manifests, store), store };
}

export function createReconciler(ctx: CommandContext): AccessPolicyReconciler {
  return new AccessPolicyReconciler(ctx.getClient().accessPolicies, {
    notFound: resolveNotFoundPolicy(ctx.options.onMissing),
    logger: ctx.logger,
  });
}

/**
 * Rebuild the accessor of a stored resource
 *
 * @throws StateFileError when the stored attributes are invalid
 */
export function loadResource(store: StateStore, address: string): ResourceData | undefined {
  const entry = store.get(address);
  if (!entry) {
    return undefined;
  }
  const data = ResourceData.fromStored(address, entry);
  if (!data.ok) {
    throw new StateFileError(
      store.path,
      data.diagnostics.map((d) => d.detail).join('; '),
      'STATE_FILE_CORRUPT'
    );
  }
  return data.value;
}

/**
 * Record the state of a resource after a reconciliation call. A resource
 * without an identity no longer exists and is dropped.
 */
export function recordResource(store: StateStore, address: string, data: ResourceData): void {
  if (data.id() === '') {
    store.remove(address);
  } else {
    store.put(address, data.toStored());
  }
}

export function outcome(
  address: string,
  action: ResourceOutcome['action'],
  id: string,
  diagnostics: Diagnostic[]
): ResourceOutcome {
  return { address, action, id, success: !hasErrors(diagnostics), diagnostics };
}

/**
 * Print one outcome in human output mode
 */
export function reportOutcome(ctx: CommandContext, result: ResourceOutcome, verb: string): void {
  if (ctx.outputFormat !== 'human') {
    return;
  }
  if (result.success) {
    printSuccess(`${result.address}: ${verb}${result.id ? ` (${result.id})` : ''}`);
  } else {
    printError(`${result.address}: ${verb} failed`);
  }
  printDiagnostics(result.address, result.diagnostics);
}

export function summarize(outcomes: ResourceOutcome[], skipped: string[]): RunSummary {
  const succeeded = outcomes.filter((o) => o.success).length;
  return { outcomes, succeeded, failed: outcomes.length - succeeded, skipped };
}

/**
 * Error lines for a CommandResult
 */
export function summaryErrors(summary: RunSummary): string[] {
  const errors = summary.outcomes.flatMap((o) =>
    o.diagnostics
      .filter((d) => d.severity === 'error')
      .map((d) => `${o.address}: ${d.summary}: ${d.detail}`)
  );
  if (summary.skipped.length > 0) {
    errors.push(`cancelled before: ${summary.skipped.join(', ')}`);
  }
  return errors;
}
