/**
 * Observed-state synchronization
 *
 * Mirrors the server-confirmed fields of a fetched access policy into local
 * state. Writes are applied in table order; the first failing write stops
 * the loop and earlier writes stay applied.
 */

import type { AccessPolicy } from '../../api/types.js';
import { type Result, fail, ok } from '../diagnostics.js';
import { OPERATION_SUMMARIES } from './executor.js';
import { fieldSchema } from './schema.js';
import type { AccessPolicyState, ObservedField } from './types.js';

interface FieldMapping {
  field: ObservedField;
  read: (remote: AccessPolicy) => string | undefined;
}

/**
 * Remote field to local field, in write order
 */
export const OBSERVED_FIELDS: readonly FieldMapping[] = [
  { field: 'name', read: (remote) => remote.name },
  { field: 'description', read: (remote) => remote.description },
  { field: 'type', read: (remote) => remote.type },
  { field: 'defaultActionType', read: (remote) => remote.defaultAction?.type },
];

/**
 * Write the observed fields of `remote` into `state`
 */
export function synchronizeAccessPolicy(
  state: AccessPolicyState,
  remote: AccessPolicy
): Result<void> {
  for (const { field, read } of OBSERVED_FIELDS) {
    const written = state.set(field, read(remote));
    if (!written.ok) {
      const key = fieldSchema(field).key;
      const reason = written.diagnostics.map((d) => d.detail).join('; ');
      return fail(
        'STATE_WRITE_FAILED',
        OPERATION_SUMMARIES.read,
        `could not store "${key}": ${reason}`,
        key
      );
    }
  }
  return ok(undefined);
}
