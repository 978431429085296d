/**
 * Manifest types
 *
 * @example
 * ```yaml
 * apiVersion: fmc-sync/v1
 * kind: AccessPolicy
 * metadata:
 *   name: access_policy
 * spec:
 *   name: Terraform Access Policy
 *   default_action: permit
 * ```
 */

import type { AccessPolicyAttributes } from '../reconcilers/access-policies/types.js';

/** Supported manifest API version */
export const MANIFEST_API_VERSION = 'fmc-sync/v1';

/** Manifest kinds this tool reconciles */
export const MANIFEST_KINDS = ['AccessPolicy'] as const;

export type ManifestKind = (typeof MANIFEST_KINDS)[number];

/** Supported file extensions for manifest files */
export const MANIFEST_EXTENSIONS = ['.yaml', '.yml', '.json'];

/**
 * Resource address: letters, digits, `_` and `-`, starting with a letter or `_`
 */
export const ADDRESS_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * A validated access policy manifest
 */
export interface AccessPolicyManifest {
  kind: 'AccessPolicy';
  /** `metadata.name`, unique across all manifests */
  address: string;
  attributes: AccessPolicyAttributes;
  /** File the manifest was read from */
  source: string;
}

export type Manifest = AccessPolicyManifest;
