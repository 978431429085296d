/**
 * Unit Tests: Plan computation
 *
 * Every user field forces replacement, so a plan only ever holds
 * create, replace, delete and noop actions.
 */

import { describe, it, expect } from 'vitest';
import {
  buildPlan,
  diffAttributes,
  planAccessPolicy,
  readStored,
} from '../../src/reconcilers/access-policies/plan.js';
import { StateStore } from '../../src/state/store.js';
import { StateFileError } from '../../src/errors.js';
import type { Manifest } from '../../src/manifests/types.js';

function manifest(address: string, name: string, defaultAction?: string): Manifest {
  return {
    kind: 'AccessPolicy',
    address,
    attributes: { name, defaultAction },
    source: `${address}.yaml`,
  };
}

describe('diffAttributes', () => {
  it('ignores computed fields and default action case', () => {
    expect(
      diffAttributes(
        { name: 'a', defaultAction: 'PERMIT', type: 'AccessPolicy', defaultActionType: 'AccessPolicyDefaultAction' },
        { name: 'a', defaultAction: 'permit' }
      )
    ).toEqual([]);
  });

  it('treats empty and absent values as equal', () => {
    expect(diffAttributes({ name: 'a', description: '' }, { name: 'a' })).toEqual([]);
  });

  it('lists changed fields by manifest key', () => {
    expect(
      diffAttributes(
        { name: 'a', defaultActionLogEnd: 'false' },
        { name: 'b', defaultActionLogEnd: 'true' }
      )
    ).toEqual([
      { field: 'name', oldValue: 'a', newValue: 'b' },
      { field: 'default_action_log_end', oldValue: 'false', newValue: 'true' },
    ]);
  });
});

describe('planAccessPolicy', () => {
  it('creates an undeclared-before resource', () => {
    expect(planAccessPolicy('web', { name: 'a' })).toEqual({
      type: 'create',
      address: 'web',
      reason: 'not yet created',
      changes: [],
      declared: { name: 'a' },
    });
  });

  it('creates when the stored entry has no identity', () => {
    expect(planAccessPolicy('web', { name: 'a' }, { id: '', attributes: { name: 'a' } }).type).toBe('create');
  });

  it('keeps an unchanged resource', () => {
    const action = planAccessPolicy('web', { name: 'a' }, { id: 'abc123', attributes: { name: 'a' } });
    expect(action).toEqual({ type: 'noop', address: 'web', resourceId: 'abc123', reason: 'up to date', changes: [] });
  });

  it('replaces a changed resource', () => {
    const action = planAccessPolicy(
      'web',
      { name: 'a', description: 'new' },
      { id: 'abc123', attributes: { name: 'a', description: 'old' } }
    );
    expect(action.type).toBe('replace');
    expect(action.reason).toBe('forces replacement: description');
    expect(action.resourceId).toBe('abc123');
  });

  it('deletes a resource that is no longer declared', () => {
    expect(planAccessPolicy('web', undefined, { id: 'abc123', attributes: { name: 'a' } })).toEqual({
      type: 'delete',
      address: 'web',
      resourceId: 'abc123',
      reason: 'no longer declared',
      changes: [],
    });
    expect(planAccessPolicy('web', undefined, { id: '', attributes: { name: 'a' } }).reason).toBe(
      'no longer declared and never created'
    );
  });
});

describe('buildPlan', () => {
  it('orders declared resources first, then sorted deletions', () => {
    const store = StateStore.empty('/tmp/state.yaml');
    store.put('zeta', { kind: 'AccessPolicy', id: 'z1', attributes: { name: 'Z' } });
    store.put('alpha', { kind: 'AccessPolicy', id: 'a1', attributes: { name: 'A' } });
    store.put('web', { kind: 'AccessPolicy', id: 'w1', attributes: { name: 'Web', default_action: 'BLOCK' } });
    store.put('edge', { kind: 'AccessPolicy', id: 'e1', attributes: { name: 'Edge' } });

    const plan = buildPlan(
      [manifest('web', 'Web', 'block'), manifest('new', 'New'), manifest('edge', 'Edge 2')],
      store
    );

    expect(plan.actions.map((a) => [a.address, a.type])).toEqual([
      ['web', 'noop'],
      ['new', 'create'],
      ['edge', 'replace'],
      ['alpha', 'delete'],
      ['zeta', 'delete'],
    ]);
    expect(plan.summary).toEqual({ toCreate: 1, toReplace: 1, toDelete: 2, unchanged: 1, total: 5 });
    expect(plan.hasChanges).toBe(true);
  });

  it('reports no changes when everything is up to date', () => {
    const store = StateStore.empty('/tmp/state.yaml');
    store.put('web', { kind: 'AccessPolicy', id: 'w1', attributes: { name: 'Web' } });

    const plan = buildPlan([manifest('web', 'Web')], store);

    expect(plan.hasChanges).toBe(false);
    expect(plan.summary.unchanged).toBe(1);
  });
});

describe('readStored', () => {
  it('rejects invalid stored attributes', () => {
    const store = StateStore.empty('/tmp/state.yaml');
    store.put('web', { kind: 'AccessPolicy', id: 'w1', attributes: { name: 'Web', default_action: 'allow' } });

    expect(() => readStored(store, 'web')).toThrow(StateFileError);
    expect(() => readStored(store, 'web')).toThrow(
      '/tmp/state.yaml: web: "default_action" must be in [BLOCK TRUST PERMIT NETWORK_DISCOVERY INHERIT_FROM_PARENT], got: "ALLOW"'
    );
  });

  it('returns undefined for an unknown address', () => {
    expect(readStored(StateStore.empty('/tmp/state.yaml'), 'web')).toBeUndefined();
  });
});
