/**
 * Unit Tests: FMC connection settings resolution
 *
 * Tests the resolution chain for each connection setting:
 * 1. CLI flags
 * 2. FMC_SYNC_AUTH_HELPER external command (password only)
 * 3. Environment variables
 * 4. ~/.fmc/settings.json
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as childProcess from 'node:child_process';

// We need to mock before importing the module
vi.mock('node:fs');
vi.mock('node:child_process');

// Import after mocking
import {
  parseAuthHelperArgs,
  readSettingsFile,
  resolveAuthHelperPassword,
  resolveConnectionSettings,
  resolveNotFoundPolicy,
} from '../../src/config/fmc-auth.js';
import { ConfigurationError } from '../../src/errors.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const SETTINGS_PATH = '/home/tester/.fmc/settings.json';
const ENV_PASSWORD = 'env-password';
const HELPER_PASSWORD = 'helper-password';
const SETTINGS_PASSWORD = 'settings-password';

function mockSettingsFile(content: object | null): void {
  const mockedFs = vi.mocked(fs);
  if (content === null) {
    mockedFs.readFileSync.mockImplementation(() => {
      throw new Error('ENOENT: no such file');
    });
  } else {
    mockedFs.readFileSync.mockReturnValue(JSON.stringify(content));
  }
}

function mockAuthHelper(output: string | Error): void {
  const mockedCp = vi.mocked(childProcess);
  if (output instanceof Error) {
    mockedCp.execFileSync.mockImplementation(() => {
      throw output;
    });
  } else {
    mockedCp.execFileSync.mockReturnValue(output);
  }
}

// =============================================================================
// Tests
// =============================================================================

describe('resolveConnectionSettings', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    mockSettingsFile(null);
  });

  it('prefers flags over the environment', () => {
    const settings = resolveConnectionSettings(
      { host: 'flag.example.test' },
      { FMC_HOST: 'env.example.test', FMC_USERNAME: 'admin', FMC_PASSWORD: ENV_PASSWORD },
      SETTINGS_PATH
    );

    expect(settings).toEqual({
      host: 'flag.example.test',
      username: 'admin',
      password: ENV_PASSWORD,
      domain: undefined,
      sources: { host: 'flag', username: 'env', password: 'env' },
    });
  });

  it('uses the auth helper before FMC_PASSWORD', () => {
    mockAuthHelper(`${HELPER_PASSWORD}\n`);

    const settings = resolveConnectionSettings(
      {},
      {
        FMC_HOST: 'fmc.example.test',
        FMC_USERNAME: 'admin',
        FMC_PASSWORD: ENV_PASSWORD,
        FMC_SYNC_AUTH_HELPER: '/usr/local/bin/fmc-password',
        FMC_SYNC_AUTH_HELPER_ARGS: '["--vault", "lab"]',
      },
      SETTINGS_PATH
    );

    expect(settings.password).toBe(HELPER_PASSWORD);
    expect(settings.sources.password).toBe('auth-helper');
    expect(vi.mocked(childProcess).execFileSync).toHaveBeenCalledWith(
      '/usr/local/bin/fmc-password',
      ['--vault', 'lab'],
      expect.objectContaining({ encoding: 'utf-8' })
    );
  });

  it('falls back to FMC_PASSWORD when the helper fails', () => {
    mockAuthHelper(new Error('helper exited with code 1'));

    const settings = resolveConnectionSettings(
      {},
      {
        FMC_HOST: 'fmc.example.test',
        FMC_USERNAME: 'admin',
        FMC_PASSWORD: ENV_PASSWORD,
        FMC_SYNC_AUTH_HELPER: 'fmc-password',
      },
      SETTINGS_PATH
    );

    expect(settings.password).toBe(ENV_PASSWORD);
    expect(settings.sources.password).toBe('env');
  });

  it('reads missing values from the settings file', () => {
    mockSettingsFile({
      env: { FMC_HOST: 'settings.example.test', FMC_USERNAME: 'api', FMC_PASSWORD: SETTINGS_PASSWORD, FMC_DOMAIN: 'Global/Lab' },
    });

    const settings = resolveConnectionSettings({}, { FMC_USERNAME: 'admin' }, SETTINGS_PATH);

    expect(settings).toEqual({
      host: 'settings.example.test',
      username: 'admin',
      password: SETTINGS_PASSWORD,
      domain: 'Global/Lab',
      sources: { host: 'settings', username: 'env', password: 'settings', domain: 'settings' },
    });
  });

  it('names every missing setting', () => {
    expect(() => resolveConnectionSettings({}, { FMC_USERNAME: 'admin' }, SETTINGS_PATH)).toThrow(
      'Missing FMC connection settings: host (--host or FMC_HOST), password (FMC_PASSWORD or FMC_SYNC_AUTH_HELPER)'
    );
  });

  it('ignores blank values', () => {
    expect(() =>
      resolveConnectionSettings({ host: '  ' }, { FMC_USERNAME: 'admin', FMC_PASSWORD: ENV_PASSWORD }, SETTINGS_PATH)
    ).toThrow('Missing FMC connection settings: host (--host or FMC_HOST)');
  });
});

describe('readSettingsFile', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('returns an empty map when the file is missing', () => {
    mockSettingsFile(null);
    expect(readSettingsFile(SETTINGS_PATH)).toEqual({});
  });

  it('keeps only string values', () => {
    mockSettingsFile({ env: { FMC_HOST: 'fmc.example.test', FMC_PORT: 443 } });
    expect(readSettingsFile(SETTINGS_PATH)).toEqual({ FMC_HOST: 'fmc.example.test' });
  });

  it('rejects invalid JSON', () => {
    vi.mocked(fs).readFileSync.mockReturnValue('{ broken');
    expect(() => readSettingsFile(SETTINGS_PATH)).toThrow(ConfigurationError);
  });
});

describe('resolveAuthHelperPassword', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('returns undefined when no helper is configured', () => {
    expect(resolveAuthHelperPassword({})).toBeUndefined();
    expect(vi.mocked(childProcess).execFileSync).not.toHaveBeenCalled();
  });

  it('returns undefined when the helper prints nothing', () => {
    mockAuthHelper('   \n');
    expect(resolveAuthHelperPassword({ FMC_SYNC_AUTH_HELPER: 'fmc-password' })).toBeUndefined();
  });
});

describe('parseAuthHelperArgs', () => {
  it.each([
    [undefined, []],
    ['', []],
    ['get fmc', ['get', 'fmc']],
    ['["--name", "lab fmc"]', ['--name', 'lab fmc']],
    ['[not json', ['[not', 'json']],
  ])('parses %j', (raw, expected) => {
    expect(parseAuthHelperArgs(raw)).toEqual(expected);
  });
});

describe('resolveNotFoundPolicy', () => {
  it('defaults to error', () => {
    expect(resolveNotFoundPolicy(undefined, {})).toBe('error');
  });

  it('prefers the flag over the environment', () => {
    expect(resolveNotFoundPolicy('remove', { FMC_SYNC_NOT_FOUND: 'error' })).toBe('remove');
    expect(resolveNotFoundPolicy(undefined, { FMC_SYNC_NOT_FOUND: 'REMOVE' })).toBe('remove');
  });

  it('rejects unknown values', () => {
    expect(() => resolveNotFoundPolicy('ignore', {})).toThrow('Invalid not-found policy "ignore"');
  });
});
