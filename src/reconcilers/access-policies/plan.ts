/**
 * Plan computation for access policies
 *
 * Compares declared manifests with the state file. Every user field is
 * force-new, so a change never becomes an update: it becomes a replace
 * (delete, then create).
 */

import { StateFileError } from '../../errors.js';
import type { Manifest } from '../../manifests/types.js';
import type { StateStore } from '../../state/store.js';
import { ACCESS_POLICY_FIELDS, fieldSchema, fromStoredAttributes } from './schema.js';
import type { AccessPolicyAttributes, AccessPolicyField } from './types.js';

export type PlanActionType = 'create' | 'replace' | 'delete' | 'noop';

/**
 * A single field difference
 */
export interface FieldChange {
  /** Manifest key */
  field: string;
  oldValue?: string;
  newValue?: string;
}

/**
 * A single action in the plan
 */
export interface PlanAction {
  type: PlanActionType;
  address: string;
  /** Stored remote identity, when there is one */
  resourceId?: string;
  reason: string;
  changes: FieldChange[];
  /** Declared attributes to create from (create and replace) */
  declared?: AccessPolicyAttributes;
}

/**
 * Stored identity and attributes of one resource
 */
export interface StoredAccessPolicy {
  id: string;
  attributes: AccessPolicyAttributes;
}

export interface Plan {
  /** Actions in execution order: declared resources first, then deletions */
  actions: PlanAction[];
  hasChanges: boolean;
  summary: {
    toCreate: number;
    toReplace: number;
    toDelete: number;
    unchanged: number;
    total: number;
  };
}

/**
 * Fields the user declares (everything not computed)
 */
const USER_FIELDS: readonly AccessPolicyField[] = ACCESS_POLICY_FIELDS.filter(
  (field) => fieldSchema(field).computed !== true
);

/**
 * Comparable form of a value. Empty and absent are equal; enum values
 * compare case-insensitively.
 */
function comparable(field: AccessPolicyField, value: string | undefined): string {
  const text = value ?? '';
  return fieldSchema(field).kind === 'enum' ? text.toUpperCase() : text;
}

/**
 * Field changes between stored and declared attributes
 */
export function diffAttributes(
  stored: Readonly<AccessPolicyAttributes>,
  declared: Readonly<AccessPolicyAttributes>
): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of USER_FIELDS) {
    const oldValue = stored[field];
    const newValue = declared[field];
    if (comparable(field, oldValue) !== comparable(field, newValue)) {
      changes.push({ field: fieldSchema(field).key, oldValue, newValue });
    }
  }
  return changes;
}

/**
 * Plan one resource address
 */
export function planAccessPolicy(
  address: string,
  declared?: AccessPolicyAttributes,
  stored?: StoredAccessPolicy
): PlanAction {
  const resourceId = stored && stored.id !== '' ? stored.id : undefined;

  if (declared === undefined) {
    return {
      type: stored === undefined ? 'noop' : 'delete',
      address,
      resourceId,
      reason: resourceId ? 'no longer declared' : 'no longer declared and never created',
      changes: [],
    };
  }

  if (stored === undefined || resourceId === undefined) {
    return { type: 'create', address, reason: 'not yet created', changes: [], declared };
  }

  const changes = diffAttributes(stored.attributes, declared);
  if (changes.length === 0) {
    return { type: 'noop', address, resourceId, reason: 'up to date', changes };
  }

  return {
    type: 'replace',
    address,
    resourceId,
    reason: `forces replacement: ${changes.map((c) => c.field).join(', ')}`,
    changes,
    declared,
  };
}

/**
 * Read and validate the stored entry of an address
 *
 * @throws StateFileError when the stored attributes are invalid
 */
export function readStored(store: StateStore, address: string): StoredAccessPolicy | undefined {
  const entry = store.get(address);
  if (!entry) {
    return undefined;
  }
  const attributes = fromStoredAttributes(entry.attributes, address);
  if (!attributes.ok) {
    throw new StateFileError(
      store.path,
      attributes.diagnostics.map((d) => d.detail).join('; '),
      'STATE_FILE_CORRUPT'
    );
  }
  return { id: entry.id, attributes: attributes.value };
}

/**
 * Plan every declared resource, plus deletion of stored resources that are
 * no longer declared
 */
export function buildPlan(manifests: readonly Manifest[], store: StateStore): Plan {
  const actions: PlanAction[] = [];
  const declaredAddresses = new Set<string>();

  for (const manifest of manifests) {
    declaredAddresses.add(manifest.address);
    actions.push(
      planAccessPolicy(manifest.address, manifest.attributes, readStored(store, manifest.address))
    );
  }

  for (const address of store.addresses()) {
    if (!declaredAddresses.has(address)) {
      actions.push(planAccessPolicy(address, undefined, readStored(store, address)));
    }
  }

  const count = (type: PlanActionType) => actions.filter((a) => a.type === type).length;
  const summary = {
    toCreate: count('create'),
    toReplace: count('replace'),
    toDelete: count('delete'),
    unchanged: count('noop'),
    total: actions.length,
  };

  return {
    actions,
    hasChanges: summary.toCreate + summary.toReplace + summary.toDelete > 0,
    summary,
  };
}
