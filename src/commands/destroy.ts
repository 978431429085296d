/**
 * destroy command - Delete every access policy recorded in the state file
 */

import type { CommandContext, CommandResult, ResourceOutcome, RunSummary } from '../types.js';
import { dryRunNotice, header, info, verbose, warn } from '../utils/output.js';
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
 * Execute the destroy command
 */
export async function destroyCommand(ctx: CommandContext): Promise<CommandResult<RunSummary>> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose('Executing destroy command', globalOpts.verbose);

  const store = await openStateStore(ctx);
  const addresses = store.addresses();

  if (outputFormat === 'human') {
    header('Access Policy Destroy');
  }
  if (addresses.length === 0) {
    if (outputFormat === 'human') {
      info('No stored resources to destroy');
    }
    return { success: true, message: 'Nothing to destroy', data: summarize([], []) };
  }

  if (globalOpts.dryRun) {
    if (outputFormat === 'human') {
      for (const address of addresses) {
        warn(`${address} would be deleted (${store.get(address)?.id || 'not created'})`);
      }
      dryRunNotice();
    }
    return {
      success: true,
      message: `Dry run: ${addresses.length} to delete`,
      data: summarize([], []),
    };
  }

  const reconciler = createReconciler(ctx);
  const outcomes: ResourceOutcome[] = [];
  const skipped: string[] = [];

  for (const address of addresses) {
    const data = loadResource(store, address);
    if (!data) {
      continue;
    }
    if (data.id() === '') {
      store.remove(address);
      await store.save();
      continue;
    }
    if (ctx.signal.aborted) {
      skipped.push(address);
      continue;
    }

    const diagnostics = await reconciler.reconcileDelete(data, { signal: ctx.signal });
    recordResource(store, address, data);
    await store.save();

    const result = outcome(address, 'delete', data.id(), diagnostics);
    outcomes.push(result);
    reportOutcome(ctx, result, 'deleted');
  }

  const summary = summarize(outcomes, skipped);
  const failed = summary.failed > 0 || skipped.length > 0;
  return {
    success: !failed,
    message: failed
      ? `Destroy finished with ${summary.failed} failure(s)`
      : `Destroyed ${summary.succeeded} resource(s)`,
    data: summary,
    errors: failed ? summaryErrors(summary) : undefined,
  };
}
