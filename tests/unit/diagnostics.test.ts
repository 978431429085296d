/**
 * Unit Tests: Reconciliation diagnostics
 *
 * Tests the Result combinators and the diagnostic helpers every
 * reconcile operation reports through.
 */

import { describe, it, expect } from 'vitest';
import {
  andThen,
  andThenAsync,
  both,
  error,
  fail,
  failWith,
  formatDiagnostic,
  hasErrors,
  ok,
  toDiagnostics,
  warning,
  type Result,
} from '../../src/reconcilers/diagnostics.js';

describe('diagnostic builders', () => {
  it('omits the attribute when none is given', () => {
    expect(error('REMOTE_ERROR', 'unable to read access policy', 'boom')).toEqual({
      severity: 'error',
      code: 'REMOTE_ERROR',
      summary: 'unable to read access policy',
      detail: 'boom',
    });
  });

  it('keeps the attribute on warnings', () => {
    expect(warning('RESOURCE_GONE', 'gone', 'detail', 'name')).toEqual({
      severity: 'warning',
      code: 'RESOURCE_GONE',
      summary: 'gone',
      detail: 'detail',
      attribute: 'name',
    });
  });

  it('fail and failWith produce failed results with the fatal diagnostic first', () => {
    const single = fail('CANCELLED', 's', 'd');
    expect(single.ok).toBe(false);
    expect(single.diagnostics).toHaveLength(1);

    const combined = failWith(error('CANCELLED', 's', 'd'), warning('STATE_UNKNOWN', 'w', 'x'));
    expect(combined.diagnostics.map((d) => d.code)).toEqual(['CANCELLED', 'STATE_UNKNOWN']);
  });
});

describe('combinators', () => {
  it('andThen runs the next step only on success', () => {
    let called = false;
    const failed: Result<number> = fail('REMOTE_ERROR', 's', 'd');
    const result = andThen<number, number>(failed, (value) => {
      called = true;
      return ok(value + 1);
    });

    expect(called).toBe(false);
    expect(result).toBe(failed);
    expect(andThen(ok(1), (value) => ok(value + 1))).toEqual(ok(2));
  });

  it('andThenAsync awaits the next step', async () => {
    const result = await andThenAsync(ok('abc'), async (value) => ok(value.length));
    expect(result).toEqual(ok(3));
  });

  it('both keeps the diagnostics of two failures in order', () => {
    const result = both(fail('MALFORMED_REFERENCE', 'a', '1'), fail('MALFORMED_REFERENCE', 'b', '2'));
    expect(result.ok).toBe(false);
    expect(toDiagnostics(result).map((d) => d.summary)).toEqual(['a', 'b']);
  });

  it('both pairs successful values', () => {
    expect(both(ok(1), ok('x'))).toEqual(ok([1, 'x']));
  });

});

describe('inspection', () => {
  const diagnostics = [
    warning('STATE_UNKNOWN', 'w', 'x'),
    error('CANCELLED', 'e', 'y'),
  ];

  it('detects errors among warnings', () => {
    expect(hasErrors(diagnostics)).toBe(true);
    expect(hasErrors([warning('RESOURCE_GONE', 'w', 'x')])).toBe(false);
  });

  it('returns an empty list for success', () => {
    expect(toDiagnostics(ok(undefined))).toEqual([]);
  });

  it('formats a diagnostic on one line', () => {
    expect(formatDiagnostic(error('REMOTE_ERROR', 'unable to read access policy', 'timeout'))).toBe(
      'Error: unable to read access policy: timeout'
    );
    expect(formatDiagnostic(warning('INVALID_ATTRIBUTE', 'invalid access policy', 'bad', 'name'))).toBe(
      'Warning: invalid access policy (name): bad'
    );
  });
});
