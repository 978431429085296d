/**
 * lookup command - Find the identities of objects an access policy references
 *
 * Prints the ids to use for `default_action_base_intrusion_policy_id` and
 * `default_action_syslog_config_id`.
 */

import type { IntrusionPolicy, SyslogAlert } from '../api/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import { error as printError, header, info, verbose } from '../utils/output.js';

export const LOOKUP_KINDS = ['intrusion-policies', 'syslog-alerts'] as const;

export type LookupKind = (typeof LOOKUP_KINDS)[number];

export interface LookupOptions {
  kind: string;
  /** Exact name to find */
  name?: string;
}

export interface LookupEntry {
  id: string;
  name: string;
  type: string;
}

export function isLookupKind(value: string): value is LookupKind {
  return LOOKUP_KINDS.some((kind) => kind === value);
}

function toEntry(object: IntrusionPolicy | SyslogAlert): LookupEntry {
  return { id: object.id, name: object.name, type: object.type };
}

/**
 * Execute the lookup command
 */
export async function lookupCommand(
  ctx: CommandContext,
  options: LookupOptions
): Promise<CommandResult<LookupEntry[]>> {
  verbose(`Executing lookup command for ${options.kind}`, ctx.options.verbose);

  if (!isLookupKind(options.kind)) {
    const message = `Unknown object kind "${options.kind}" (expected one of: ${LOOKUP_KINDS.join(', ')})`;
    if (ctx.outputFormat === 'human') {
      printError(message);
    }
    return { success: false, message };
  }

  const client = ctx.getClient();
  const lookup = options.kind === 'intrusion-policies' ? client.intrusionPolicies : client.syslogAlerts;
  const requestOptions = { signal: ctx.signal };

  let entries: LookupEntry[];
  if (options.name) {
    const match: IntrusionPolicy | SyslogAlert | undefined = await lookup.findByName(options.name, requestOptions);
    entries = match ? [toEntry(match)] : [];
  } else {
    const objects: Array<IntrusionPolicy | SyslogAlert> = await lookup.list(requestOptions);
    entries = objects.map(toEntry);
  }

  if (ctx.outputFormat === 'human') {
    header(options.kind === 'intrusion-policies' ? 'Intrusion Policies' : 'Syslog Alerts');
    if (entries.length === 0) {
      info(options.name ? `No object named "${options.name}"` : 'No objects found');
    }
    for (const entry of entries) {
      console.log(`  ${entry.id}  ${entry.name}`);
    }
  }

  const found = entries.length > 0 || !options.name;
  return {
    success: found,
    message: found ? `${entries.length} object(s) found` : `No ${options.kind} named "${options.name}"`,
    data: entries,
  };
}
