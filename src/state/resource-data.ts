/**
 * In-memory state of one access policy
 *
 * Implements the state accessor the reconciler writes through. Values are
 * validated on every `set` against the field table, so the record never
 * holds anything the schema would reject.
 */

import { type Result, fail, ok } from '../reconcilers/diagnostics.js';
import {
  fieldSchema,
  fromStoredAttributes,
  parseBooleanString,
  parseFieldValue,
  toManifestAttributes,
} from '../reconcilers/access-policies/schema.js';
import type {
  AccessPolicyAttributes,
  AccessPolicyField,
  AccessPolicyState,
} from '../reconcilers/access-policies/types.js';
import { ACCESS_POLICY_KIND, type StoredResource } from './types.js';

function withField(
  values: AccessPolicyAttributes,
  field: AccessPolicyField,
  value: string | undefined
): Result<AccessPolicyAttributes> {
  const next: AccessPolicyAttributes = { ...values };
  switch (field) {
    case 'name':
      if (value === undefined) {
        return fail('STATE_WRITE_FAILED', 'invalid access policy', '"name" cannot be cleared', 'name');
      }
      next.name = value;
      break;
    case 'description':
      next.description = value;
      break;
    case 'type':
      next.type = value;
      break;
    case 'defaultAction':
      next.defaultAction = value;
      break;
    case 'defaultActionBaseIntrusionPolicyId':
      next.defaultActionBaseIntrusionPolicyId = value;
      break;
    case 'defaultActionSendEventsToFmc':
      next.defaultActionSendEventsToFmc = parseBooleanString(value);
      break;
    case 'defaultActionLogBegin':
      next.defaultActionLogBegin = parseBooleanString(value);
      break;
    case 'defaultActionLogEnd':
      next.defaultActionLogEnd = parseBooleanString(value);
      break;
    case 'defaultActionSyslogConfigId':
      next.defaultActionSyslogConfigId = value;
      break;
    case 'defaultActionType':
      next.defaultActionType = value;
      break;
  }
  return ok(next);
}

export class ResourceData implements AccessPolicyState {
  private constructor(
    private values: AccessPolicyAttributes,
    private identity: string
  ) {}

  /**
   * State for a resource that has not been created yet
   */
  static fromDeclared(attributes: AccessPolicyAttributes): ResourceData {
    return new ResourceData({ ...attributes }, '');
  }

  /**
   * Rebuild state from a state file entry
   */
  static fromStored(address: string, stored: StoredResource): Result<ResourceData> {
    const parsed = fromStoredAttributes(stored.attributes, address);
    return parsed.ok ? ok(new ResourceData(parsed.value, stored.id)) : parsed;
  }

  get<K extends AccessPolicyField>(key: K): AccessPolicyAttributes[K] {
    return this.values[key];
  }

  set<K extends AccessPolicyField>(key: K, value: unknown): Result<AccessPolicyAttributes[K]> {
    const schema = fieldSchema(key);
    const parsed = parseFieldValue(schema, value, schema.key);
    if (!parsed.ok) {
      return parsed;
    }
    const next = withField(this.values, key, parsed.value);
    if (!next.ok) {
      return next;
    }
    this.values = next.value;
    return ok(this.values[key]);
  }

  id(): string {
    return this.identity;
  }

  setId(id: string): void {
    this.identity = id;
  }

  attributes(): Readonly<AccessPolicyAttributes> {
    return { ...this.values };
  }

  /**
   * Entry to persist in the state file
   */
  toStored(): StoredResource {
    return {
      kind: ACCESS_POLICY_KIND,
      id: this.identity,
      attributes: toManifestAttributes(this.values),
    };
  }
}
