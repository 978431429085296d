/**
 * Desired-state translation for access policies
 *
 * Turns the flat declared attributes into the nested object FMC expects on
 * create. Pure: no I/O, no clock, same input gives the same payload.
 */

import type {
  AccessPolicyDefaultActionPayload,
  AccessPolicyPayload,
  DefaultAction,
  ObjectReference,
} from '../../api/types.js';
import { type Result, both, fail, ok } from '../diagnostics.js';
import { ACCESS_POLICY_SCHEMA, DEFAULT_ACTIONS } from './schema.js';
import { WIRE_TYPES, type AccessPolicyAttributes, type BooleanString } from './types.js';

/**
 * Shape of an FMC object identifier (UUID-like, or a plain numeric/alnum id)
 */
export const OBJECT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9-]*$/;

const SUMMARY = 'invalid access policy reference';

/**
 * Normalize a declared default action to its wire value
 */
export function normalizeDefaultAction(value: string): DefaultAction | undefined {
  const upper = value.trim().toUpperCase();
  return DEFAULT_ACTIONS.find((action) => action === upper);
}

function toBoolean(value: BooleanString | undefined): boolean | undefined {
  return value === undefined ? undefined : value === 'true';
}

/**
 * Build a typed reference, or report why the declared id is unusable.
 * An empty id means "not referenced".
 */
function reference<TType extends string>(
  id: string | undefined,
  type: TType,
  key: string
): Result<ObjectReference<TType> | undefined> {
  if (id === undefined || id === '') {
    return ok(undefined);
  }
  if (!OBJECT_ID_PATTERN.test(id)) {
    return fail('MALFORMED_REFERENCE', SUMMARY, `${key} ${JSON.stringify(id)} is not a valid object identifier`, key);
  }
  return ok({ id, type });
}

/**
 * Translate declared attributes into the create payload.
 *
 * Injects the discriminator `type` of every nested object, uppercases the
 * default action and converts the string flags to booleans. Fails only
 * when a declared cross-reference id is malformed.
 *
 * @example
 * translateAccessPolicy({ name: 'Terraform Access Policy', defaultAction: 'permit' })
 * // ok({ type: 'AccessPolicy', name: 'Terraform Access Policy',
 * //      defaultAction: { type: 'AccessPolicyDefaultAction', action: 'PERMIT' } })
 */
export function translateAccessPolicy(
  attributes: Readonly<AccessPolicyAttributes>
): Result<AccessPolicyPayload> {
  const intrusionPolicy = reference(
    attributes.defaultActionBaseIntrusionPolicyId,
    WIRE_TYPES.intrusionPolicy,
    ACCESS_POLICY_SCHEMA.defaultActionBaseIntrusionPolicyId.key
  );
  const syslogConfig = reference(
    attributes.defaultActionSyslogConfigId,
    WIRE_TYPES.syslogConfig,
    ACCESS_POLICY_SCHEMA.defaultActionSyslogConfigId.key
  );

  const references = both(intrusionPolicy, syslogConfig);
  if (!references.ok) {
    return references;
  }
  const [intrusionRef, syslogRef] = references.value;

  const defaultAction: AccessPolicyDefaultActionPayload = {
    type: WIRE_TYPES.defaultAction,
  };

  const action =
    attributes.defaultAction === undefined ? undefined : normalizeDefaultAction(attributes.defaultAction);
  if (action !== undefined) {
    defaultAction.action = action;
  }
  if (intrusionRef !== undefined) {
    defaultAction.intrusionPolicy = intrusionRef;
  }
  if (syslogRef !== undefined) {
    defaultAction.syslogConfig = syslogRef;
  }

  const logBegin = toBoolean(attributes.defaultActionLogBegin);
  const logEnd = toBoolean(attributes.defaultActionLogEnd);
  const sendEventsToFMC = toBoolean(attributes.defaultActionSendEventsToFmc);
  if (logBegin !== undefined) defaultAction.logBegin = logBegin;
  if (logEnd !== undefined) defaultAction.logEnd = logEnd;
  if (sendEventsToFMC !== undefined) defaultAction.sendEventsToFMC = sendEventsToFMC;

  const payload: AccessPolicyPayload = {
    type: WIRE_TYPES.accessPolicy,
    name: attributes.name,
    defaultAction,
  };
  if (attributes.description !== undefined && attributes.description !== '') {
    payload.description = attributes.description;
  }

  return ok(payload);
}
