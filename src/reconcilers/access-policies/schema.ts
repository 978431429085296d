/**
 * Access policy schema
 *
 * Validates the flat attribute map from a manifest (or the state file) once,
 * producing a typed {@link AccessPolicyAttributes} record. Everything after
 * this boundary works with typed fields only.
 *
 * @example Manifest attributes
 * ```yaml
 * name: Terraform Access Policy
 * default_action: permit
 * default_action_base_intrusion_policy_id: 0050568A-7F53-0ed3-0000-004294967298
 * default_action_send_events_to_fmc: "true"
 * default_action_log_end: "true"
 * default_action_syslog_config_id: 0050568A-7F53-0ed3-0000-004294967301
 * ```
 */

import type { DefaultAction } from '../../api/types.js';
import {
  type Diagnostic,
  type Result,
  error,
  fail,
  failWith,
  ok,
} from '../diagnostics.js';
import type {
  AccessPolicyAttributes,
  AccessPolicyField,
  BooleanString,
  FieldSchema,
} from './types.js';

// =============================================================================
// Field Table
// =============================================================================

/**
 * Allowed default actions, in wire form
 */
export const DEFAULT_ACTIONS: readonly DefaultAction[] = [
  'BLOCK',
  'TRUST',
  'PERMIT',
  'NETWORK_DISCOVERY',
  'INHERIT_FROM_PARENT',
];

/**
 * Schema of every access policy attribute
 */
export const ACCESS_POLICY_SCHEMA = {
  name: {
    key: 'name',
    kind: 'string',
    required: true,
    forceNew: true,
    description: 'The name of this resource',
  },
  description: {
    key: 'description',
    kind: 'string',
    forceNew: true,
    description: 'The description of this resource',
  },
  type: {
    key: 'type',
    kind: 'string',
    computed: true,
    description: 'The type of this resource',
  },
  defaultAction: {
    key: 'default_action',
    kind: 'enum',
    forceNew: true,
    allowed: DEFAULT_ACTIONS,
    description: `Default action for this resource, ${DEFAULT_ACTIONS.map((a) => `"${a}"`).join(', ')}`,
  },
  defaultActionBaseIntrusionPolicyId: {
    key: 'default_action_base_intrusion_policy_id',
    kind: 'identity',
    forceNew: true,
    description: 'Default action base policy ID to inherit from for this resource',
  },
  defaultActionSendEventsToFmc: {
    key: 'default_action_send_events_to_fmc',
    kind: 'boolean-string',
    forceNew: true,
    description: 'Enable sending events to FMC for this resource, "true" or "false"',
  },
  defaultActionLogBegin: {
    key: 'default_action_log_begin',
    kind: 'boolean-string',
    forceNew: true,
    description: 'Enable logging at the beginning of the connection, "true" or "false"',
  },
  defaultActionLogEnd: {
    key: 'default_action_log_end',
    kind: 'boolean-string',
    forceNew: true,
    description: 'Enable logging at the end of the connection, "true" or "false"',
  },
  defaultActionSyslogConfigId: {
    key: 'default_action_syslog_config_id',
    kind: 'identity',
    forceNew: true,
    description: 'Syslog configuration ID for this resource',
  },
  defaultActionType: {
    key: 'default_action_type',
    kind: 'string',
    computed: true,
    description: 'The type of default action of this resource',
  },
} as const satisfies Record<AccessPolicyField, FieldSchema>;

/**
 * Attribute names in declaration order
 */
export const ACCESS_POLICY_FIELDS: readonly AccessPolicyField[] = [
  'name',
  'description',
  'type',
  'defaultAction',
  'defaultActionBaseIntrusionPolicyId',
  'defaultActionSendEventsToFmc',
  'defaultActionLogBegin',
  'defaultActionLogEnd',
  'defaultActionSyslogConfigId',
  'defaultActionType',
];

/**
 * Look up the schema entry of a field
 */
export function fieldSchema(field: AccessPolicyField): FieldSchema {
  return ACCESS_POLICY_SCHEMA[field];
}

/**
 * Map a manifest key back to its field
 */
export function fieldForKey(key: string): AccessPolicyField | undefined {
  return ACCESS_POLICY_FIELDS.find((field) => ACCESS_POLICY_SCHEMA[field].key === key);
}

// =============================================================================
// Value Parsing
// =============================================================================

const SUMMARY = 'invalid access policy';

function invalid(path: string, field: FieldSchema, message: string): Result<never> {
  return fail('INVALID_ATTRIBUTE', SUMMARY, `${path}: ${message}`, field.key);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

/**
 * Parse one attribute value according to its schema entry.
 *
 * Absent values (undefined, null) yield `undefined` unless the field is
 * required. Enum values keep the declared letter case.
 */
export function parseFieldValue(
  field: FieldSchema,
  value: unknown,
  path: string
): Result<string | undefined> {
  if (value === undefined || value === null) {
    return field.required ? invalid(path, field, `"${field.key}" is required`) : ok(undefined);
  }

  if (field.kind === 'boolean-string') {
    const flag = parseBooleanString(value);
    return flag === undefined
      ? invalid(path, field, `"${field.key}" must be "true" or "false", got: ${JSON.stringify(value)}`)
      : ok(flag);
  }

  if (typeof value !== 'string') {
    return invalid(path, field, `"${field.key}" must be a string, got ${describeType(value)}`);
  }

  if (field.required && value.trim().length === 0) {
    return invalid(path, field, `"${field.key}" must not be empty`);
  }

  if (field.kind === 'enum' && field.allowed) {
    const upper = value.toUpperCase();
    if (!field.allowed.includes(upper)) {
      return invalid(
        path,
        field,
        `"${field.key}" must be in [${field.allowed.join(' ')}], got: "${upper}"`
      );
    }
  }

  return ok(value);
}

/**
 * Accept booleans and case-insensitive "true"/"false" strings
 */
export function parseBooleanString(value: unknown): BooleanString | undefined {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true' || lower === 'false') {
      return lower;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Boundary Parsing
// =============================================================================

/**
 * Options for {@link parseAccessPolicyAttributes}
 */
export interface ParseOptions {
  /**
   * Accept computed attributes (true when reading the state file,
   * false for user manifests)
   */
  allowComputed?: boolean;
}

/**
 * Validate a flat attribute map into a typed record.
 *
 * All issues are reported together, one diagnostic each.
 *
 * @param raw - Attribute map keyed by manifest keys
 * @param path - Location used in diagnostic details (e.g. a manifest address)
 */
export function parseAccessPolicyAttributes(
  raw: unknown,
  path: string,
  options: ParseOptions = {}
): Result<AccessPolicyAttributes> {
  if (!isRecord(raw)) {
    return fail('INVALID_ATTRIBUTE', SUMMARY, `${path}: expected a mapping of attributes, got ${describeType(raw)}`);
  }

  const issues: Diagnostic[] = [];

  for (const key of Object.keys(raw)) {
    const field = fieldForKey(key);
    if (field === undefined) {
      issues.push(error('INVALID_ATTRIBUTE', SUMMARY, `${path}: unsupported attribute "${key}"`, key));
    } else if (fieldSchema(field).computed === true && !options.allowComputed) {
      issues.push(
        error('INVALID_ATTRIBUTE', SUMMARY, `${path}: "${key}" is computed and cannot be set`, key)
      );
    }
  }

  const read = (field: AccessPolicyField): string | undefined => {
    const schema = fieldSchema(field);
    if (schema.computed === true && !options.allowComputed) {
      return undefined;
    }
    const result = parseFieldValue(schema, raw[schema.key], path);
    if (!result.ok) {
      issues.push(...result.diagnostics);
      return undefined;
    }
    return result.value;
  };

  const readFlag = (field: AccessPolicyField): BooleanString | undefined => {
    const value = read(field);
    return value === undefined ? undefined : parseBooleanString(value);
  };

  const name = read('name');
  const attributes: Omit<AccessPolicyAttributes, 'name'> = {
    description: read('description'),
    type: read('type'),
    defaultAction: read('defaultAction'),
    defaultActionBaseIntrusionPolicyId: read('defaultActionBaseIntrusionPolicyId'),
    defaultActionSendEventsToFmc: readFlag('defaultActionSendEventsToFmc'),
    defaultActionLogBegin: readFlag('defaultActionLogBegin'),
    defaultActionLogEnd: readFlag('defaultActionLogEnd'),
    defaultActionSyslogConfigId: read('defaultActionSyslogConfigId'),
    defaultActionType: read('defaultActionType'),
  };

  const [first, ...rest] = issues;
  if (first !== undefined) {
    return failWith(first, ...rest);
  }
  if (name === undefined) {
    return invalid(path, ACCESS_POLICY_SCHEMA.name, '"name" is required');
  }

  return ok({ name, ...attributes });
}

/**
 * Parse attributes read back from the state file, where computed keys are allowed
 */
export function fromStoredAttributes(raw: unknown, path: string): Result<AccessPolicyAttributes> {
  return parseAccessPolicyAttributes(raw, path, { allowComputed: true });
}

/**
 * Convert a typed record to the snake_case map used in files
 */
export function toManifestAttributes(attributes: AccessPolicyAttributes): Record<string, string> {
  const result: Record<string, string> = {};
  for (const field of ACCESS_POLICY_FIELDS) {
    const value = attributes[field];
    if (value !== undefined) {
      result[fieldSchema(field).key] = value;
    }
  }
  return result;
}
