/**
 * State file types
 */

/**
 * Resource kind recorded for access policies
 */
export const ACCESS_POLICY_KIND = 'AccessPolicy';

export type ResourceKind = typeof ACCESS_POLICY_KIND;

/**
 * One entry of the state file
 */
export interface StoredResource {
  kind: ResourceKind;
  /** Remote identity; '' once the resource has been deleted */
  id: string;
  /** Last known attributes, snake_case keys */
  attributes: Record<string, string>;
}

/**
 * On-disk layout of `.fmc/state.yaml`
 */
export interface StateFile {
  version: number;
  resources: Record<string, StoredResource>;
}

export const STATE_FILE_VERSION = 1;
