/**
 * Command context construction
 */

import { createClient, type FmcClient } from './api/client.js';
import { createLogger, logger as defaultLogger, parseLogLevel } from './api/logger.js';
import { resolveConnectionSettings, type Env } from './config/index.js';
import type { CommandContext, GlobalOptions } from './types.js';
import { verbose as verboseLog } from './utils/output.js';

export interface ContextOptions {
  cwd?: string;
  signal?: AbortSignal;
  env?: Env;
  /** Replaces the FMC client factory */
  clientFactory?: () => FmcClient;
}

/**
 * Create the command context from parsed options
 *
 * The FMC client is created on first use, so commands that stay local
 * (plan, status) need no connection settings.
 */
export function createContext(options: GlobalOptions, extra: ContextOptions = {}): CommandContext {
  const env = extra.env ?? process.env;
  const log = options.verbose
    ? createLogger({ level: 'debug', json: env.FMC_SYNC_LOG_JSON === 'true' })
    : createLogger({
        level: parseLogLevel(env.FMC_SYNC_LOG_LEVEL) ?? defaultLogger.getConfig().level,
        json: env.FMC_SYNC_LOG_JSON === 'true',
      });

  let client: FmcClient | undefined;
  const getClient =
    extra.clientFactory ??
    ((): FmcClient => {
      if (!client) {
        const settings = resolveConnectionSettings({ host: options.host, domain: options.domain }, env);
        verboseLog(
          `Connecting to ${settings.host} as ${settings.username} (host from ${settings.sources.host}, password from ${settings.sources.password})`,
          options.verbose
        );
        client = createClient({
          host: settings.host,
          username: settings.username,
          password: settings.password,
          domain: settings.domain,
          timeout: options.timeout,
          debug: options.verbose,
        });
      }
      return client;
    });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    cwd: extra.cwd ?? process.cwd(),
    signal: extra.signal ?? new AbortController().signal,
    logger: log,
    getClient,
  };
}
