/**
 * State file persistence
 *
 * Keeps the identity and last known attributes of every managed resource
 * in `.fmc/state.yaml`, keyed by resource address.
 *
 * @example State file
 * ```yaml
 * version: 1
 * resources:
 *   access_policy:
 *     kind: AccessPolicy
 *     id: 0050568A-7F53-0ed3-0000-004294969346
 *     attributes:
 *       name: Terraform Access Policy
 *       default_action: permit
 *       type: AccessPolicy
 * ```
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as yaml from 'yaml';
import { StateFileError } from '../errors.js';
import {
  ACCESS_POLICY_KIND,
  STATE_FILE_VERSION,
  type StateFile,
  type StoredResource,
} from './types.js';

const HEADER = `# Managed by fmc-sync
# DO NOT EDIT MANUALLY

`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function parseEntry(path: string, address: string, raw: unknown): StoredResource {
  const corrupt = (message: string): StateFileError =>
    new StateFileError(path, `resource "${address}": ${message}`, 'STATE_FILE_CORRUPT');

  if (!isRecord(raw)) {
    throw corrupt('expected a mapping');
  }
  if (raw.kind !== ACCESS_POLICY_KIND) {
    throw corrupt(`unsupported kind ${JSON.stringify(raw.kind)}`);
  }
  if (typeof raw.id !== 'string') {
    throw corrupt('"id" must be a string');
  }

  const attributes: Record<string, string> = {};
  const rawAttributes = raw.attributes ?? {};
  if (!isRecord(rawAttributes)) {
    throw corrupt('"attributes" must be a mapping');
  }
  for (const [key, value] of Object.entries(rawAttributes)) {
    if (typeof value !== 'string') {
      throw corrupt(`attribute "${key}" must be a string`);
    }
    attributes[key] = value;
  }

  return { kind: ACCESS_POLICY_KIND, id: raw.id, attributes };
}

/**
 * Parse the content of a state file
 *
 * @throws StateFileError when the content is not a valid state file
 */
export function parseStateFile(content: string, path: string): StateFile {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new StateFileError(path, `invalid YAML: ${err instanceof Error ? err.message : String(err)}`, 'STATE_FILE_CORRUPT', { cause: err });
  }

  if (parsed === null || parsed === undefined) {
    return { version: STATE_FILE_VERSION, resources: {} };
  }
  if (!isRecord(parsed)) {
    throw new StateFileError(path, 'expected a mapping at the top level', 'STATE_FILE_CORRUPT');
  }
  if (parsed.version !== STATE_FILE_VERSION) {
    throw new StateFileError(
      path,
      `unsupported state file version ${JSON.stringify(parsed.version)} (expected ${STATE_FILE_VERSION})`,
      'STATE_FILE_CORRUPT'
    );
  }

  const rawResources = parsed.resources ?? {};
  if (!isRecord(rawResources)) {
    throw new StateFileError(path, '"resources" must be a mapping', 'STATE_FILE_CORRUPT');
  }

  const resources: Record<string, StoredResource> = {};
  for (const [address, entry] of Object.entries(rawResources)) {
    resources[address] = parseEntry(path, address, entry);
  }
  return { version: STATE_FILE_VERSION, resources };
}

/**
 * Serialize state for writing, with a header comment
 */
export function serializeStateFile(state: StateFile): string {
  return HEADER + yaml.stringify(state, { indent: 2 });
}

export class StateStore {
  private constructor(
    readonly path: string,
    private readonly resources: Map<string, StoredResource>
  ) {}

  static empty(path: string): StateStore {
    return new StateStore(path, new Map());
  }

  /**
   * Load the state file. A missing file is an empty state.
   */
  static async load(path: string): Promise<StateStore> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return StateStore.empty(path);
      }
      throw new StateFileError(
        path,
        `cannot read state file: ${err instanceof Error ? err.message : String(err)}`,
        'STATE_FILE_UNREADABLE',
        { cause: err }
      );
    }

    const state = parseStateFile(content, path);
    return new StateStore(path, new Map(Object.entries(state.resources)));
  }

  get(address: string): StoredResource | undefined {
    return this.resources.get(address);
  }

  put(address: string, resource: StoredResource): void {
    this.resources.set(address, resource);
  }

  remove(address: string): boolean {
    return this.resources.delete(address);
  }

  /**
   * Stored addresses, sorted
   */
  addresses(): string[] {
    return [...this.resources.keys()].sort();
  }

  toStateFile(): StateFile {
    const resources: Record<string, StoredResource> = {};
    for (const address of this.addresses()) {
      const entry = this.resources.get(address);
      if (entry) {
        resources[address] = entry;
      }
    }
    return { version: STATE_FILE_VERSION, resources };
  }

  /**
   * Write the state file, replacing it atomically
   */
  async save(): Promise<void> {
    const tmpPath = `${this.path}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmpPath, serializeStateFile(this.toStateFile()), 'utf-8');
      await rename(tmpPath, this.path);
    } catch (err) {
      throw new StateFileError(
        this.path,
        `cannot write state file: ${err instanceof Error ? err.message : String(err)}`,
        'STATE_FILE_UNWRITABLE',
        { cause: err }
      );
    }
  }
}
