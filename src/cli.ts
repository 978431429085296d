#!/usr/bin/env node
/**
 * fmc-sync CLI - Reconcile FMC access policies with YAML manifests
 *
 * Commands:
 * - plan: Show what apply would change
 * - apply: Create, replace and delete access policies to match the manifests
 * - refresh: Re-read stored access policies into the state file
 * - destroy: Delete every stored access policy
 * - status: Show the state file
 * - lookup: Find intrusion policy and syslog alert identities
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import {
  applyCommand,
  destroyCommand,
  lookupCommand,
  LOOKUP_KINDS,
  planCommand,
  refreshCommand,
  statusCommand,
} from './commands/index.js';
import { createContext } from './context.js';
import { describeError } from './errors.js';
import { printResult, error, warn } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Aborted on the first SIGINT; a second SIGINT exits immediately
 */
const interrupt = new AbortController();
process.on('SIGINT', () => {
  if (interrupt.signal.aborted) {
    process.exit(130);
  }
  warn('Interrupted: cancelling the in-flight request (press Ctrl+C again to exit now)');
  interrupt.abort();
});

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('fmc-sync')
  .description('Reconcile FMC access policies with declared YAML manifests')
  .version(VERSION)
  .addOption(
    new Option('--manifests <path>', 'Manifest file or directory (default: .fmc/manifests)')
      .env('FMC_SYNC_MANIFESTS')
  )
  .addOption(
    new Option('--state <path>', 'State file (default: .fmc/state.yaml)')
      .env('FMC_SYNC_STATE')
  )
  .addOption(new Option('--host <host>', 'FMC host or base URL').env('FMC_HOST'))
  .addOption(new Option('--domain <name>', 'FMC domain name').env('FMC_DOMAIN'))
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('--on-missing <policy>', 'When a stored access policy is gone on refresh')
      .choices(['error', 'remove'])
      .env('FMC_SYNC_NOT_FOUND')
  )
  .addOption(
    new Option('--timeout <ms>', 'Per-request timeout in milliseconds')
      .argParser(parsePositiveInt)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * Run a command handler and exit with its status
 */
async function run<T>(
  name: string,
  handler: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  const ctx = createContext(program.opts<GlobalOptions>(), { signal: interrupt.signal });

  try {
    const result = await handler(ctx);
    printResult(result, ctx.outputFormat);
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    if (ctx.outputFormat === 'json') {
      printResult({ success: false, message: `${name} failed`, errors: [describeError(err)] }, 'json');
    } else {
      error(`${name} failed`);
      console.error(describeError(err));
    }
    process.exit(1);
  }
}

program
  .command('plan')
  .description('Show what apply would change')
  .action(() => run('Plan', planCommand));

program
  .command('apply')
  .description('Create, replace and delete access policies to match the manifests')
  .action(() => run('Apply', applyCommand));

program
  .command('refresh')
  .description('Re-read stored access policies into the state file')
  .action(() => run('Refresh', refreshCommand));

program
  .command('destroy')
  .description('Delete every access policy recorded in the state file')
  .action(() => run('Destroy', destroyCommand));

program
  .command('status')
  .description('Show the access policies recorded in the state file')
  .action(() => run('Status', statusCommand));

program
  .command('lookup')
  .description('List the identities of objects an access policy can reference')
  .argument('<kind>', `Object kind (${LOOKUP_KINDS.join(', ')})`)
  .option('--name <name>', 'Find one object by exact name')
  .action((kind: string, cmdOpts: { name?: string }) =>
    run('Lookup', (ctx) => lookupCommand(ctx, { kind, name: cmdOpts.name }))
  );

await program.parseAsync(process.argv);
