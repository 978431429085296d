/**
 * refresh command - Re-read every stored access policy into the state file
 */

import type { CommandContext, CommandResult, ResourceOutcome, RunSummary } from '../types.js';
import { header, info, verbose } from '../utils/output.js';
import {
  createReconciler,
  loadResource,
  openStateStore,
  outcome,
  recordResource,
  reportOutcome,
  summarize,
  summaryErrors,
} from './shared.js';

/**
 * Execute the refresh command
 *
 * With the `remove` not-found policy, resources missing on the server are
 * dropped from the state file and will be created again by the next apply.
 */
export async function refreshCommand(ctx: CommandContext): Promise<CommandResult<RunSummary>> {
  verbose('Executing refresh command', ctx.options.verbose);

  const store = await openStateStore(ctx);
  const addresses = store.addresses().filter((address) => store.get(address)?.id);

  if (ctx.outputFormat === 'human') {
    header('Access Policy Refresh');
  }
  if (addresses.length === 0) {
    if (ctx.outputFormat === 'human') {
      info('No stored resources to refresh');
    }
    return { success: true, message: 'Nothing to refresh', data: summarize([], []) };
  }

  const reconciler = createReconciler(ctx);
  const outcomes: ResourceOutcome[] = [];
  const skipped: string[] = [];

  for (const address of addresses) {
    const data = loadResource(store, address);
    if (!data) {
      continue;
    }
    if (ctx.signal.aborted) {
      skipped.push(address);
      continue;
    }

    const diagnostics = await reconciler.reconcileRead(data, { signal: ctx.signal });
    recordResource(store, address, data);
    if (!ctx.options.dryRun) {
      await store.save();
    }

    const result = outcome(address, 'refresh', data.id(), diagnostics);
    outcomes.push(result);
    reportOutcome(ctx, result, data.id() === '' ? 'removed from state' : 'refreshed');
  }

  const summary = summarize(outcomes, skipped);
  const failed = summary.failed > 0 || skipped.length > 0;
  return {
    success: !failed,
    message: failed
      ? `Refresh finished with ${summary.failed} failure(s)`
      : `Refreshed ${summary.succeeded} resource(s)`,
    data: summary,
    errors: failed ? summaryErrors(summary) : undefined,
  };
}
