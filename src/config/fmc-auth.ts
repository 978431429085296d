/**
 * FMC connection settings resolution
 *
 * ## Resolution Order (per setting)
 *
 * 1. Explicit overrides (CLI flags)
 * 2. Environment:
 *    - FMC_HOST, FMC_USERNAME, FMC_DOMAIN
 *    - password: FMC_SYNC_AUTH_HELPER (external command printing the
 *      password), then FMC_PASSWORD
 * 3. ~/.fmc/settings.json:
 *    { "env": { "FMC_HOST": "...", "FMC_USERNAME": "...", "FMC_PASSWORD": "..." } }
 *
 * ## Other Environment Variables
 *
 * - FMC_SYNC_AUTH_HELPER_ARGS: arguments for the auth helper, either
 *   whitespace-separated or a JSON array
 * - FMC_SYNC_NOT_FOUND: `error` (default) or `remove`, see NotFoundPolicy
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { execFileSync } from 'node:child_process';
import { logger } from '../api/logger.js';
import { ConfigurationError } from '../errors.js';
import type { NotFoundPolicy } from '../reconcilers/access-policies/types.js';

export type Env = Readonly<Record<string, string | undefined>>;

export type SettingSource = 'flag' | 'env' | 'auth-helper' | 'settings';

/**
 * Explicit values, usually from CLI flags
 */
export interface ConnectionOverrides {
  host?: string;
  username?: string;
  password?: string;
  domain?: string;
}

/**
 * Fully resolved connection settings
 */
export interface ConnectionSettings {
  host: string;
  username: string;
  password: string;
  domain?: string;
  /** Where each value came from, for `status` output */
  sources: Partial<Record<keyof ConnectionOverrides, SettingSource>>;
}

const SETTINGS_KEYS = {
  host: 'FMC_HOST',
  username: 'FMC_USERNAME',
  password: 'FMC_PASSWORD',
  domain: 'FMC_DOMAIN',
} as const satisfies Record<keyof ConnectionOverrides, string>;

/**
 * Path of the user settings file
 */
export function getSettingsPath(): string {
  return path.join(os.homedir(), '.fmc', 'settings.json');
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read the `env` map of ~/.fmc/settings.json. A missing or unreadable file
 * yields an empty map.
 */
export function readSettingsFile(settingsPath: string = getSettingsPath()): Record<string, string> {
  let raw: string;
  try {
    raw = fs.readFileSync(settingsPath, 'utf-8');
  } catch (err) {
    logger.debug('No settings file', { path: settingsPath, reason: String(err) });
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `${settingsPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      `Fix or remove ${settingsPath}`
    );
  }

  const result: Record<string, string> = {};
  const env = typeof parsed === 'object' && parsed !== null && 'env' in parsed ? parsed.env : undefined;
  if (typeof env === 'object' && env !== null) {
    for (const [key, value] of Object.entries(env)) {
      if (typeof value === 'string') {
        result[key] = value;
      }
    }
  }
  return result;
}

/**
 * Parse auth helper arguments.
 *
 * Accepts a JSON array ('["arg1", "arg2"]') or a whitespace-separated
 * string ("arg1 arg2"). Returns an empty array when unset.
 */
export function parseAuthHelperArgs(raw: string | undefined): string[] {
  if (!raw || raw.trim().length === 0) return [];

  const trimmed = raw.trim();

  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        return parsed.map((arg) => String(arg));
      }
    } catch (err) {
      logger.debug('Auth helper args are not a JSON array, splitting on whitespace', {
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return trimmed.split(/\s+/).filter((arg) => arg.length > 0);
}

/**
 * Run FMC_SYNC_AUTH_HELPER and return what it prints.
 *
 * The helper is invoked without a shell. Returns undefined when it is not
 * configured, fails, or prints nothing.
 */
export function resolveAuthHelperPassword(env: Env = process.env): string | undefined {
  const helper = nonEmpty(env.FMC_SYNC_AUTH_HELPER);
  if (!helper) return undefined;

  try {
    const output = execFileSync(helper, parseAuthHelperArgs(env.FMC_SYNC_AUTH_HELPER_ARGS), {
      encoding: 'utf-8',
      timeout: 30000,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    return nonEmpty(output);
  } catch (err) {
    logger.warn('Auth helper failed, falling back to FMC_PASSWORD', {
      helper,
      reason: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }
}

/**
 * Resolve connection settings from flags, environment and settings file
 *
 * @throws ConfigurationError naming every missing setting and how to provide it
 */
export function resolveConnectionSettings(
  overrides: ConnectionOverrides = {},
  env: Env = process.env,
  settingsPath: string = getSettingsPath()
): ConnectionSettings {
  const sources: ConnectionSettings['sources'] = {};
  let settings: Record<string, string> | undefined;
  const fromSettings = (key: keyof ConnectionOverrides): string | undefined => {
    settings ??= readSettingsFile(settingsPath);
    return nonEmpty(settings[SETTINGS_KEYS[key]]);
  };

  const resolve = (key: keyof ConnectionOverrides): string | undefined => {
    const flag = nonEmpty(overrides[key]);
    if (flag) {
      sources[key] = 'flag';
      return flag;
    }
    if (key === 'password') {
      const helper = resolveAuthHelperPassword(env);
      if (helper) {
        sources[key] = 'auth-helper';
        return helper;
      }
    }
    const fromEnv = nonEmpty(env[SETTINGS_KEYS[key]]);
    if (fromEnv) {
      sources[key] = 'env';
      return fromEnv;
    }
    const stored = fromSettings(key);
    if (stored) {
      sources[key] = 'settings';
      return stored;
    }
    return undefined;
  };

  const host = resolve('host');
  const username = resolve('username');
  const password = resolve('password');
  const domain = resolve('domain');

  const missing: string[] = [];
  if (!host) missing.push('host (--host or FMC_HOST)');
  if (!username) missing.push('username (FMC_USERNAME)');
  if (!password) missing.push('password (FMC_PASSWORD or FMC_SYNC_AUTH_HELPER)');

  if (!host || !username || !password) {
    throw new ConfigurationError(
      `Missing FMC connection settings: ${missing.join(', ')}`,
      `Set the environment variables, pass the flags, or add them under "env" in ${settingsPath}`
    );
  }

  return { host, username, password, domain, sources };
}

const NOT_FOUND_POLICIES: readonly NotFoundPolicy[] = ['error', 'remove'];

function isNotFoundPolicy(value: string): value is NotFoundPolicy {
  return NOT_FOUND_POLICIES.some((policy) => policy === value);
}

/**
 * Resolve what a read does when the remote object is missing
 *
 * @throws ConfigurationError for values other than `error` and `remove`
 */
export function resolveNotFoundPolicy(flag?: string, env: Env = process.env): NotFoundPolicy {
  const value = nonEmpty(flag) ?? nonEmpty(env.FMC_SYNC_NOT_FOUND);
  if (value === undefined) {
    return 'error';
  }
  const lower = value.toLowerCase();
  if (!isNotFoundPolicy(lower)) {
    throw new ConfigurationError(
      `Invalid not-found policy "${value}"`,
      `Use one of: ${NOT_FOUND_POLICIES.join(', ')}`
    );
  }
  return lower;
}
