/**
 * Unit Tests: ResourceData
 */

import { describe, it, expect } from 'vitest';
import { ResourceData } from '../../src/state/resource-data.js';
import { toDiagnostics } from '../../src/reconcilers/diagnostics.js';

describe('ResourceData', () => {
  it('starts without identity', () => {
    const data = ResourceData.fromDeclared({ name: 'a' });
    expect(data.id()).toBe('');
  });

  it('validates values on set', () => {
    const data = ResourceData.fromDeclared({ name: 'a' });

    expect(data.set('description', 'text')).toEqual({ ok: true, value: 'text' });
    expect(toDiagnostics(data.set('description', 42)).map((d) => d.detail)).toEqual([
      'description: "description" must be a string, got number',
    ]);
    expect(data.get('description')).toBe('text');
  });

  it('normalizes flags written as booleans', () => {
    const data = ResourceData.fromDeclared({ name: 'a' });

    expect(data.set('defaultActionLogEnd', true)).toEqual({ ok: true, value: 'true' });
  });

  it('refuses to clear or empty the name', () => {
    const data = ResourceData.fromDeclared({ name: 'a' });

    expect(toDiagnostics(data.set('name', '')).map((d) => [d.code, d.detail])).toEqual([
      ['INVALID_ATTRIBUTE', 'name: "name" must not be empty'],
    ]);
    expect(toDiagnostics(data.set('name', undefined)).map((d) => d.detail)).toEqual([
      'name: "name" is required',
    ]);
    expect(data.get('name')).toBe('a');
  });

  it('returns attribute snapshots', () => {
    const data = ResourceData.fromDeclared({ name: 'a' });
    const snapshot = data.attributes();

    data.set('name', 'b');

    expect(snapshot.name).toBe('a');
  });

  it('round-trips through the stored form', () => {
    const data = ResourceData.fromDeclared({ name: 'a', defaultAction: 'permit' });
    data.setId('abc123');
    data.set('type', 'AccessPolicy');

    const stored = data.toStored();
    expect(stored).toEqual({
      kind: 'AccessPolicy',
      id: 'abc123',
      attributes: { name: 'a', type: 'AccessPolicy', default_action: 'permit' },
    });

    const restored = ResourceData.fromStored('web', stored);
    expect(restored.ok && restored.value.attributes()).toEqual({
      name: 'a',
      type: 'AccessPolicy',
      defaultAction: 'permit',
      description: undefined,
      defaultActionBaseIntrusionPolicyId: undefined,
      defaultActionSendEventsToFmc: undefined,
      defaultActionLogBegin: undefined,
      defaultActionLogEnd: undefined,
      defaultActionSyslogConfigId: undefined,
      defaultActionType: undefined,
    });
    expect(restored.ok && restored.value.id()).toBe('abc123');
  });

  it('rejects invalid stored attributes', () => {
    const restored = ResourceData.fromStored('web', { kind: 'AccessPolicy', id: 'x', attributes: { colour: 'red' } });

    expect(toDiagnostics(restored).map((d) => d.detail)).toEqual([
      'web: unsupported attribute "colour"',
      'web: "name" is required',
    ]);
  });
});
