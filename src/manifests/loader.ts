/**
 * Manifest loading
 *
 * Reads YAML (multi-document) and JSON manifest files, validates every
 * document and reports all problems at once through a ManifestError.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { extname, isAbsolute, relative, resolve } from 'node:path';
import { parseAllDocuments } from 'yaml';
import { ManifestError } from '../errors.js';
import { parseAccessPolicyAttributes } from '../reconcilers/access-policies/schema.js';
import {
  ADDRESS_PATTERN,
  MANIFEST_API_VERSION,
  MANIFEST_EXTENSIONS,
  MANIFEST_KINDS,
  type Manifest,
} from './types.js';

/**
 * Options for manifest loading
 */
export interface ManifestLoadOptions {
  /** Base directory for relative paths and for source labels */
  basePath?: string;
}

/**
 * One parsed document and where it came from
 */
export interface RawDocument {
  data: unknown;
  source: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * List manifest files below a directory, sorted by path
 */
async function listManifestFiles(dirPath: string): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of [...entries].sort((a, b) => a.name.localeCompare(b.name))) {
    const entryPath = resolve(dirPath, entry.name);
    if (entry.isFile() && MANIFEST_EXTENSIONS.includes(extname(entry.name).toLowerCase())) {
      files.push(entryPath);
    } else if (entry.isDirectory()) {
      files.push(...(await listManifestFiles(entryPath)));
    }
  }

  return files;
}

/**
 * Read the documents of one file. Read and parse failures are collected
 * into `issues`.
 */
async function readDocuments(filePath: string, label: string, issues: string[]): Promise<RawDocument[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    issues.push(`${label}: failed to read manifest file: ${errorMessage(err)}`);
    return [];
  }

  if (extname(filePath).toLowerCase() === '.json') {
    try {
      const data: unknown = JSON.parse(content);
      return [{ data, source: label }];
    } catch (err) {
      issues.push(`${label}: failed to parse manifest file: ${errorMessage(err)}`);
      return [];
    }
  }

  const docs = parseAllDocuments(content);
  const result: RawDocument[] = [];
  docs.forEach((doc, index) => {
    if (doc.errors.length > 0) {
      issues.push(`${label}: failed to parse manifest file: ${doc.errors.map((e) => e.message).join('; ')}`);
      return;
    }
    const data: unknown = doc.toJSON();
    // Skip empty documents (a trailing `---` and the like)
    if (data === null || data === undefined) {
      return;
    }
    result.push({ data, source: docs.length > 1 ? `${label}#${index + 1}` : label });
  });
  return result;
}

function isKnownKind(kind: unknown): kind is Manifest['kind'] {
  return MANIFEST_KINDS.some((known) => known === kind);
}

/**
 * Validate one document, appending problems to `issues`
 */
export function validateDocument(doc: RawDocument, issues: string[]): Manifest | undefined {
  const { data, source } = doc;
  if (!isRecord(data)) {
    issues.push(`${source}: expected a manifest mapping`);
    return undefined;
  }

  const before = issues.length;
  if (data.apiVersion !== MANIFEST_API_VERSION) {
    issues.push(
      `${source}: unsupported apiVersion ${JSON.stringify(data.apiVersion)} (expected "${MANIFEST_API_VERSION}")`
    );
  }
  if (!isKnownKind(data.kind)) {
    issues.push(
      `${source}: unsupported kind ${JSON.stringify(data.kind)} (expected one of: ${MANIFEST_KINDS.join(', ')})`
    );
  }

  const metadata = data.metadata;
  const address = isRecord(metadata) ? metadata.name : undefined;
  if (typeof address !== 'string' || !ADDRESS_PATTERN.test(address)) {
    issues.push(
      `${source}: metadata.name must be letters, digits, "_" or "-", got ${JSON.stringify(address)}`
    );
  }
  if (issues.length > before || typeof address !== 'string') {
    return undefined;
  }

  const attributes = parseAccessPolicyAttributes(data.spec, `${source} (${address})`);
  if (!attributes.ok) {
    issues.push(...attributes.diagnostics.map((d) => d.detail));
    return undefined;
  }

  return { kind: 'AccessPolicy', address, attributes: attributes.value, source };
}

/**
 * Load every manifest from a file or directory.
 *
 * Addresses must be unique across all files.
 *
 * @throws ManifestError listing every problem found
 */
export async function loadManifestPath(
  manifestPath: string,
  options: ManifestLoadOptions = {}
): Promise<Manifest[]> {
  const basePath = options.basePath ?? process.cwd();
  const absolutePath = isAbsolute(manifestPath) ? manifestPath : resolve(basePath, manifestPath);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(absolutePath)).isDirectory();
  } catch (err) {
    throw new ManifestError([`manifest path not found: ${absolutePath}`], { cause: err });
  }

  const files = isDirectory ? await listManifestFiles(absolutePath) : [absolutePath];
  const issues: string[] = [];
  const manifests: Manifest[] = [];
  const seen = new Map<string, string>();

  for (const file of files) {
    const label = relative(basePath, file) || file;
    for (const doc of await readDocuments(file, label, issues)) {
      const manifest = validateDocument(doc, issues);
      if (!manifest) {
        continue;
      }
      const previous = seen.get(manifest.address);
      if (previous !== undefined) {
        issues.push(`${manifest.source}: duplicate metadata.name "${manifest.address}" (first defined in ${previous})`);
        continue;
      }
      seen.set(manifest.address, manifest.source);
      manifests.push(manifest);
    }
  }

  if (issues.length > 0) {
    throw new ManifestError(issues);
  }
  return manifests;
}
