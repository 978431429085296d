/**
 * status command - Show the resources recorded in the state file
 *
 * Local only: reads the state file, makes no remote calls.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { header, info, printStatus, verbose } from '../utils/output.js';
import { openStateStore } from './shared.js';

export interface ResourceStatus {
  address: string;
  kind: string;
  id: string;
  name?: string;
  defaultAction?: string;
}

export interface StatusData {
  statePath: string;
  resources: ResourceStatus[];
}

/**
 * Execute the status command
 */
export async function statusCommand(ctx: CommandContext): Promise<CommandResult<StatusData>> {
  verbose('Executing status command', ctx.options.verbose);

  const store = await openStateStore(ctx);
  const resources = store.addresses().flatMap((address): ResourceStatus[] => {
    const entry = store.get(address);
    if (!entry) {
      return [];
    }
    return [
      {
        address,
        kind: entry.kind,
        id: entry.id,
        name: entry.attributes.name,
        defaultAction: entry.attributes.default_action,
      },
    ];
  });

  if (ctx.outputFormat === 'human') {
    header('Access Policy Status');
    info(`State file: ${store.path}`);
    if (resources.length === 0) {
      info('No resources recorded');
    }
    for (const resource of resources) {
      console.log(`\n${resource.address}`);
      printStatus(
        {
          kind: resource.kind,
          id: resource.id,
          name: resource.name,
          defaultAction: resource.defaultAction,
        },
        'human'
      );
    }
  }

  return {
    success: true,
    message: `${resources.length} resource(s) recorded`,
    data: { statePath: store.path, resources },
  };
}
