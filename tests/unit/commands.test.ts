/**
 * Unit Tests: plan, apply, refresh, destroy, status and lookup commands
 *
 * Each test works in a temporary repository with .fmc/manifests and an
 * in-memory FMC client.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, unlinkSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  applyCommand,
  destroyCommand,
  lookupCommand,
  planCommand,
  refreshCommand,
  statusCommand,
} from '../../src/commands/index.js';
import { createContext } from '../../src/context.js';
import { parseStateFile } from '../../src/state/store.js';
import type { CommandContext, GlobalOptions } from '../../src/types.js';
import { createFakeClient, type FakeClient } from '../helpers/fake-fmc.js';

// =============================================================================
// Test Fixtures
// =============================================================================

function policyYaml(address: string, name: string, extra = ''): string {
  return `apiVersion: fmc-sync/v1
kind: AccessPolicy
metadata:
  name: ${address}
spec:
  name: ${name}
  default_action: permit
${extra}`;
}

describe('commands', () => {
  let repo: string;
  let manifestsDir: string;
  let statePath: string;
  let client: FakeClient;

  function context(options: Partial<GlobalOptions> = {}, signal?: AbortSignal): CommandContext {
    return createContext(
      { dryRun: false, json: true, verbose: false, ...options },
      { cwd: repo, signal, env: {}, clientFactory: () => client }
    );
  }

  function writeManifest(file: string, content: string): void {
    writeFileSync(join(manifestsDir, file), content);
  }

  function storedIds(): Record<string, string> {
    const state = parseStateFile(readFileSync(statePath, 'utf-8'), statePath);
    return Object.fromEntries(Object.entries(state.resources).map(([address, entry]) => [address, entry.id]));
  }

  beforeEach(() => {
    repo = mkdtempSync(join(tmpdir(), 'fmc-sync-commands-'));
    mkdirSync(join(repo, '.git'));
    manifestsDir = join(repo, '.fmc', 'manifests');
    mkdirSync(manifestsDir, { recursive: true });
    statePath = join(repo, '.fmc', 'state.yaml');
    client = createFakeClient({
      intrusionPolicies: [{ id: 'ips-1', name: 'Balanced Security and Connectivity', type: 'IntrusionPolicy' }],
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(repo, { recursive: true, force: true });
  });

  // ===========================================================================
  // plan
  // ===========================================================================

  describe('plan', () => {
    it('summarizes the pending changes without remote calls', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      writeManifest('edge.yaml', policyYaml('edge', 'Edge Policy'));

      const result = await planCommand(context());

      expect(result.message).toBe('2 to create, 0 to replace, 0 to delete');
      expect(result.data?.actions.map((a) => a.address)).toEqual(['edge', 'web']);
      expect(client.accessPolicies.calls).toEqual([]);
    });

    it('fails on an invalid manifest', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy').replace('permit', 'allow'));

      await expect(planCommand(context())).rejects.toThrow('Invalid manifest: ');
    });
  });

  // ===========================================================================
  // apply
  // ===========================================================================

  describe('apply', () => {
    it('creates declared policies and records them', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));

      const result = await applyCommand(context());

      expect(result.success).toBe(true);
      expect(result.message).toBe('Apply complete: 1 resource(s) changed');
      expect(client.accessPolicies.calls).toEqual(['create Web Policy', 'get ap-1']);

      const state = parseStateFile(readFileSync(statePath, 'utf-8'), statePath);
      expect(state.resources.web).toEqual({
        kind: 'AccessPolicy',
        id: 'ap-1',
        attributes: {
          name: 'Web Policy',
          type: 'AccessPolicy',
          default_action: 'permit',
          default_action_type: 'AccessPolicyDefaultAction',
        },
      });
    });

    it('is a no-op on the second run', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      await applyCommand(context());

      const result = await applyCommand(context());

      expect(result.message).toBe('No changes');
      expect(client.accessPolicies.create).toHaveBeenCalledTimes(1);
    });

    it('replaces a changed policy with a delete and a create', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      await applyCommand(context());
      writeManifest('web.yaml', policyYaml('web', 'Web Policy', '  description: now documented\n'));

      const result = await applyCommand(context());

      expect(result.success).toBe(true);
      expect(client.accessPolicies.calls).toEqual([
        'create Web Policy',
        'get ap-1',
        'delete ap-1',
        'create Web Policy',
        'get ap-2',
      ]);
      expect(storedIds()).toEqual({ web: 'ap-2' });
    });

    it('deletes policies that are no longer declared', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      writeManifest('edge.yaml', policyYaml('edge', 'Edge Policy'));
      await applyCommand(context());
      unlinkSync(join(manifestsDir, 'edge.yaml'));

      const result = await applyCommand(context());

      expect(result.success).toBe(true);
      expect(storedIds()).toEqual({ web: 'ap-2' });
      expect([...client.accessPolicies.objects.keys()]).toEqual(['ap-2']);
    });

    it('keeps the state unchanged on a dry run', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));

      const result = await applyCommand(context({ dryRun: true }));

      expect(result.message).toBe('Dry run: 1 to create, 0 to replace, 0 to delete');
      expect(client.accessPolicies.calls).toEqual([]);
      expect(existsSync(statePath)).toBe(false);
    });

    it('reports a failed create without recording it', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      client.accessPolicies.failCreate = new Error('Duplicate name');

      const result = await applyCommand(context());

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['web: unable to create access policy: Duplicate name']);
      expect(storedIds()).toEqual({});
    });

    it('records the new id when the confirming read fails', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      client.accessPolicies.failGet = new Error('Service unavailable');

      const result = await applyCommand(context());

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['web: unable to read access policy: Service unavailable']);
      expect(client.accessPolicies.calls).toEqual(['create Web Policy', 'get ap-1']);
      expect(storedIds()).toEqual({ web: 'ap-1' });

      client.accessPolicies.failGet = undefined;
      const plan = await planCommand(context());
      expect(plan.message).toBe('No changes');
    });

    it('drops the entry when a replace deletes but cannot create', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      await applyCommand(context());
      writeManifest('web.yaml', policyYaml('web', 'Web Policy', '  description: now documented\n'));
      client.accessPolicies.failCreate = new Error('Duplicate name');

      const result = await applyCommand(context());

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['web: unable to create access policy: Duplicate name']);
      expect(client.accessPolicies.objects.size).toBe(0);
      expect(storedIds()).toEqual({});

      client.accessPolicies.failCreate = undefined;
      const plan = await planCommand(context());
      expect(plan.message).toBe('1 to create, 0 to replace, 0 to delete');
      expect(plan.data?.actions.map((a) => [a.address, a.type])).toEqual([['web', 'create']]);
    });

    it('skips every resource when already cancelled', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      const controller = new AbortController();
      controller.abort();

      const result = await applyCommand(context({}, controller.signal));

      expect(result.success).toBe(false);
      expect(result.data?.skipped).toEqual(['web']);
      expect(result.errors).toEqual(['cancelled before: web']);
      expect(client.accessPolicies.calls).toEqual([]);
    });
  });

  // ===========================================================================
  // refresh
  // ===========================================================================

  describe('refresh', () => {
    beforeEach(async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      await applyCommand(context());
    });

    it('updates observed fields from the server', async () => {
      client.accessPolicies.seed({ id: 'ap-1', name: 'Renamed In UI', type: 'AccessPolicy' });

      const result = await refreshCommand(context());

      expect(result.message).toBe('Refreshed 1 resource(s)');
      const state = parseStateFile(readFileSync(statePath, 'utf-8'), statePath);
      expect(state.resources.web?.attributes.name).toBe('Renamed In UI');
    });

    it('reports a vanished policy as an error by default', async () => {
      client.accessPolicies.objects.clear();

      const result = await refreshCommand(context());

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['web: unable to read access policy: access policy ap-1 not found']);
      expect(storedIds()).toEqual({ web: 'ap-1' });
    });

    it('drops a vanished policy under the remove policy', async () => {
      client.accessPolicies.objects.clear();

      const result = await refreshCommand(context({ onMissing: 'remove' }));

      expect(result.success).toBe(true);
      expect(result.data?.outcomes[0]?.diagnostics.map((d) => d.code)).toEqual(['RESOURCE_GONE']);
      expect(storedIds()).toEqual({});

      const plan = await planCommand(context());
      expect(plan.message).toBe('1 to create, 0 to replace, 0 to delete');
    });
  });

  // ===========================================================================
  // destroy
  // ===========================================================================

  describe('destroy', () => {
    it('deletes every stored policy', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      await applyCommand(context());

      const result = await destroyCommand(context());

      expect(result.message).toBe('Destroyed 1 resource(s)');
      expect(storedIds()).toEqual({});
      expect(client.accessPolicies.objects.size).toBe(0);
    });

    it('has nothing to do without state', async () => {
      const result = await destroyCommand(context());

      expect(result.message).toBe('Nothing to destroy');
    });

    it('keeps the entry when delete fails', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      await applyCommand(context());
      client.accessPolicies.failDelete = new Error('Policy is assigned to devices');

      const result = await destroyCommand(context());

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['web: unable to delete access policy: Policy is assigned to devices']);
      expect(storedIds()).toEqual({ web: 'ap-1' });
    });
  });

  // ===========================================================================
  // status and lookup
  // ===========================================================================

  describe('status', () => {
    it('lists recorded resources', async () => {
      writeManifest('web.yaml', policyYaml('web', 'Web Policy'));
      await applyCommand(context());

      const result = await statusCommand(context());

      expect(result.data).toEqual({
        statePath,
        resources: [{ address: 'web', kind: 'AccessPolicy', id: 'ap-1', name: 'Web Policy', defaultAction: 'permit' }],
      });
    });
  });

  describe('lookup', () => {
    it('finds an intrusion policy by name', async () => {
      const result = await lookupCommand(context(), {
        kind: 'intrusion-policies',
        name: 'Balanced Security and Connectivity',
      });

      expect(result.success).toBe(true);
      expect(result.data).toEqual([
        { id: 'ips-1', name: 'Balanced Security and Connectivity', type: 'IntrusionPolicy' },
      ]);
    });

    it('fails for a missing name', async () => {
      const result = await lookupCommand(context(), { kind: 'syslog-alerts', name: 'Nope' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('No syslog-alerts named "Nope"');
    });

    it('rejects an unknown kind', async () => {
      const result = await lookupCommand(context(), { kind: 'networks' });

      expect(result.success).toBe(false);
    });
  });
});
