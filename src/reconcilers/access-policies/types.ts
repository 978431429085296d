/**
 * Types for access policy reconciliation
 *
 * The declared resource is a flat, typed record. The reconciler translates
 * it into the nested wire object FMC expects, creates it, and mirrors the
 * server-confirmed fields back into local state.
 */

import type { AccessPolicy, AccessPolicyPayload, RequestOptions } from '../../api/types.js';
import type { Result } from '../diagnostics.js';

// =============================================================================
// Declared Resource
// =============================================================================

/**
 * Boolean flags are declared as strings, matching the manifest surface
 */
export type BooleanString = 'true' | 'false';

/**
 * Declared (and locally persisted) state of one access policy
 */
export interface AccessPolicyAttributes {
  name: string;
  description?: string;
  /** Computed: object type reported by FMC */
  type?: string;
  /** One of the allowed default actions, any letter case */
  defaultAction?: string;
  defaultActionBaseIntrusionPolicyId?: string;
  defaultActionSendEventsToFmc?: BooleanString;
  defaultActionLogBegin?: BooleanString;
  defaultActionLogEnd?: BooleanString;
  defaultActionSyslogConfigId?: string;
  /** Computed: type of the default action sub-object */
  defaultActionType?: string;
}

export type AccessPolicyField = keyof AccessPolicyAttributes;

/**
 * Fields the server owns and the synchronizer fills in
 */
export type ComputedField = 'type' | 'defaultActionType';

/**
 * Fields written back from a read
 */
export type ObservedField = 'name' | 'description' | ComputedField;

/**
 * Value kinds the schema distinguishes
 */
export type FieldKind = 'string' | 'identity' | 'boolean-string' | 'enum';

/**
 * Schema entry for one attribute
 */
export interface FieldSchema {
  /** Key used in manifests and the state file */
  key: string;
  kind: FieldKind;
  description: string;
  required?: boolean;
  computed?: boolean;
  /** Any change requires destroy-then-recreate */
  forceNew?: boolean;
  /** Allowed values for `enum` fields (uppercase) */
  allowed?: readonly string[];
}

// =============================================================================
// Wire Discriminators
// =============================================================================

/**
 * Discriminator `type` tag per nested wire object, keyed by object kind
 */
export const WIRE_TYPES = Object.freeze({
  accessPolicy: 'AccessPolicy',
  defaultAction: 'AccessPolicyDefaultAction',
  intrusionPolicy: 'IntrusionPolicy',
  syslogConfig: 'SyslogAlert',
} as const);

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Remote client the reconciler drives. `FmcClient.accessPolicies` satisfies it.
 *
 * Each call is one remote transaction. `create` is not assumed idempotent.
 */
export interface AccessPolicyRemote {
  create(payload: AccessPolicyPayload, options?: RequestOptions): Promise<AccessPolicy>;
  get(id: string, options?: RequestOptions): Promise<AccessPolicy>;
  delete(id: string, options?: RequestOptions): Promise<void>;
}

/**
 * Typed accessor over one resource's local state plus its remote identity
 */
export interface ResourceStateAccessor<A> {
  /** Read a declared or stored value */
  get<K extends keyof A>(key: K): A[K];
  /** Write a value observed remotely; fails when the value cannot be stored */
  set<K extends keyof A>(key: K, value: unknown): Result<A[K]>;
  /** Remote identity, or '' when the resource does not exist */
  id(): string;
  setId(id: string): void;
  /** Snapshot of all attributes */
  attributes(): Readonly<A>;
}

export type AccessPolicyState = ResourceStateAccessor<AccessPolicyAttributes>;

/**
 * Behaviour when a read finds the remote object missing
 *
 * - `error`: report a fatal diagnostic and keep the identity
 * - `remove`: clear the identity and report a warning
 */
export type NotFoundPolicy = 'error' | 'remove';
