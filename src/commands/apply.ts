/**
 * apply command - Bring FMC in line with the manifests
 *
 * Runs the plan one resource at a time, in plan order:
 * - create: reconcileCreate
 * - replace: reconcileDelete, then reconcileCreate (two separate calls)
 * - delete: reconcileDelete
 *
 * The state file is written after every resource, so an interrupted run
 * keeps every identity it obtained.
 */

import type { PlanAction } from '../reconcilers/access-policies/plan.js';
import type { AccessPolicyReconciler } from '../reconcilers/access-policies/reconcile.js';
import { error, hasErrors } from '../reconcilers/diagnostics.js';
import { ResourceData } from '../state/resource-data.js';
import type { StateStore } from '../state/store.js';
import type { CommandContext, CommandResult, ResourceOutcome, RunSummary } from '../types.js';
import { dryRunNotice, header, printPlan, verbose, warn } from '../utils/output.js';
import {
  computePlan,
  createReconciler,
  loadResource,
  outcome,
  recordResource,
  reportOutcome,
  summarize,
  summaryErrors,
} from './shared.js';

async function createResource(
  ctx: CommandContext,
  reconciler: AccessPolicyReconciler,
  store: StateStore,
  action: PlanAction,
  kind: 'create' | 'replace'
): Promise<ResourceOutcome> {
  if (!action.declared) {
    return outcome(action.address, kind, '', []);
  }
  const data = ResourceData.fromDeclared(action.declared);
  const diagnostics = await reconciler.reconcileCreate(data, { signal: ctx.signal });
  // A created resource is recorded even if the confirming read failed
  recordResource(store, action.address, data);
  return outcome(action.address, kind, data.id(), diagnostics);
}

async function deleteResource(
  ctx: CommandContext,
  reconciler: AccessPolicyReconciler,
  store: StateStore,
  action: PlanAction
): Promise<ResourceOutcome> {
  const data = loadResource(store, action.address);
  if (!data || data.id() === '') {
    store.remove(action.address);
    return outcome(action.address, 'delete', '', []);
  }
  const diagnostics = await reconciler.reconcileDelete(data, { signal: ctx.signal });
  recordResource(store, action.address, data);
  return outcome(action.address, 'delete', data.id(), diagnostics);
}

async function replaceResource(
  ctx: CommandContext,
  reconciler: AccessPolicyReconciler,
  store: StateStore,
  action: PlanAction
): Promise<ResourceOutcome> {
  const deleted = await deleteResource(ctx, reconciler, store, action);
  if (!deleted.success) {
    return { ...deleted, action: 'replace' };
  }
  await store.save();
  if (ctx.signal.aborted) {
    return outcome(action.address, 'replace', '', [
      ...deleted.diagnostics,
      error('CANCELLED', 'unable to create access policy', 'cancelled after the previous access policy was deleted'),
    ]);
  }
  const created = await createResource(ctx, reconciler, store, action, 'replace');
  return { ...created, diagnostics: [...deleted.diagnostics, ...created.diagnostics] };
}

/**
 * Execute the apply command
 */
export async function applyCommand(ctx: CommandContext): Promise<CommandResult<RunSummary>> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose('Executing apply command', globalOpts.verbose);

  const { plan, store } = await computePlan(ctx);

  if (outputFormat === 'human') {
    header('Access Policy Apply');
    printPlan(plan, 'human');
  }

  if (!plan.hasChanges) {
    return { success: true, message: 'No changes', data: summarize([], []) };
  }

  if (globalOpts.dryRun) {
    if (outputFormat === 'human') {
      dryRunNotice();
    }
    return {
      success: true,
      message: `Dry run: ${plan.summary.toCreate} to create, ${plan.summary.toReplace} to replace, ${plan.summary.toDelete} to delete`,
      data: summarize([], []),
    };
  }

  const reconciler = createReconciler(ctx);
  const outcomes: ResourceOutcome[] = [];
  const skipped: string[] = [];

  for (const action of plan.actions) {
    if (action.type === 'noop') {
      continue;
    }
    if (ctx.signal.aborted) {
      skipped.push(action.address);
      continue;
    }

    const result =
      action.type === 'create'
        ? await createResource(ctx, reconciler, store, action, 'create')
        : action.type === 'replace'
          ? await replaceResource(ctx, reconciler, store, action)
          : await deleteResource(ctx, reconciler, store, action);

    await store.save();
    outcomes.push(result);
    reportOutcome(ctx, result, action.type === 'replace' ? 'replaced' : `${action.type}d`);
  }

  const summary = summarize(outcomes, skipped);
  if (skipped.length > 0 && outputFormat === 'human') {
    warn(`Cancelled; not attempted: ${skipped.join(', ')}`);
  }

  const failed = summary.outcomes.some((o) => hasErrors(o.diagnostics)) || skipped.length > 0;
  return {
    success: !failed,
    message: failed
      ? `Apply finished with ${summary.failed} failure(s)${skipped.length > 0 ? `, ${skipped.length} not attempted` : ''}`
      : `Apply complete: ${summary.succeeded} resource(s) changed`,
    data: summary,
    errors: failed ? summaryErrors(summary) : undefined,
  };
}
