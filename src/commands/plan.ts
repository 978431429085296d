/**
 * plan command - Show what apply would change
 */

import type { Plan } from '../reconcilers/access-policies/plan.js';
import type { CommandContext, CommandResult } from '../types.js';
import { header, printPlan, verbose } from '../utils/output.js';
import { computePlan } from './shared.js';

/**
 * Execute the plan command. Makes no remote calls.
 */
export async function planCommand(ctx: CommandContext): Promise<CommandResult<Plan>> {
  verbose('Executing plan command', ctx.options.verbose);

  const { plan } = await computePlan(ctx);

  if (ctx.outputFormat === 'human') {
    header('Access Policy Plan');
    printPlan(plan, 'human');
  }

  const { toCreate, toReplace, toDelete } = plan.summary;
  return {
    success: true,
    message: plan.hasChanges
      ? `${toCreate} to create, ${toReplace} to replace, ${toDelete} to delete`
      : 'No changes',
    data: plan,
  };
}
