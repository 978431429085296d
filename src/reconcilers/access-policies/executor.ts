/**
 * Remote operations for access policies
 *
 * Each function performs exactly one remote call (or none, when the signal
 * is already aborted) and turns any failure into diagnostics. Nothing here
 * retries; that is left to the client or an outer loop.
 */

import type { AccessPolicy, AccessPolicyPayload } from '../../api/types.js';
import { isAbortError, isNotFoundError } from '../../api/retry.js';
import {
  type Diagnostic,
  type Err,
  type Result,
  error,
  fail,
  failWith,
  ok,
  warning,
} from '../diagnostics.js';
import type { AccessPolicyRemote } from './types.js';

export type RemoteOperation = 'create' | 'read' | 'delete';

/**
 * Summary line used for failures of each operation
 */
export const OPERATION_SUMMARIES: Readonly<Record<RemoteOperation, string>> = Object.freeze({
  create: 'unable to create access policy',
  read: 'unable to read access policy',
  delete: 'unable to delete access policy',
});

const MUTATING: ReadonlySet<RemoteOperation> = new Set(['create', 'delete']);

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Diagnostics for a call that was cancelled.
 *
 * A mutating call interrupted in flight may still have completed on the
 * server, so it carries an extra warning asking for a confirming read.
 */
function cancelled(operation: RemoteOperation, detail: string, inFlight: boolean): Err {
  const fatal = error('CANCELLED', OPERATION_SUMMARIES[operation], detail);
  if (inFlight && MUTATING.has(operation)) {
    return failWith(
      fatal,
      warning(
        'STATE_UNKNOWN',
        `access policy ${operation} outcome unknown`,
        `the ${operation} request may have completed on the server; read the resource again to confirm its state`
      )
    );
  }
  return failWith(fatal);
}

/**
 * Normalize a failed remote call into diagnostics
 */
export function remoteFailure(
  operation: RemoteOperation,
  err: unknown,
  signal?: AbortSignal
): Err {
  if (signal?.aborted || isAbortError(err)) {
    return cancelled(operation, messageOf(err), true);
  }

  if (isNotFoundError(err)) {
    return fail('REMOTE_NOT_FOUND', OPERATION_SUMMARIES[operation], messageOf(err));
  }

  return fail('REMOTE_ERROR', OPERATION_SUMMARIES[operation], messageOf(err));
}

/**
 * Refuse to start when the caller has already cancelled
 */
function checkNotCancelled(operation: RemoteOperation, signal?: AbortSignal): Result<void> {
  if (signal?.aborted) {
    return cancelled(operation, 'the operation was cancelled before it started', false);
  }
  return ok(undefined);
}

/**
 * Create the access policy. Calls `remote.create` at most once.
 */
export async function executeCreate(
  remote: AccessPolicyRemote,
  payload: AccessPolicyPayload,
  signal?: AbortSignal
): Promise<Result<AccessPolicy>> {
  const precondition = checkNotCancelled('create', signal);
  if (!precondition.ok) {
    return precondition;
  }

  let created: AccessPolicy;
  try {
    created = await remote.create(payload, { signal });
  } catch (err) {
    return remoteFailure('create', err, signal);
  }

  if (typeof created.id !== 'string' || created.id.length === 0) {
    return fail('REMOTE_ERROR', OPERATION_SUMMARIES.create, 'the server did not return an identity for the new access policy');
  }

  return ok(created);
}

/**
 * Fetch the access policy by identity
 */
export async function executeRead(
  remote: AccessPolicyRemote,
  id: string,
  signal?: AbortSignal
): Promise<Result<AccessPolicy>> {
  const precondition = checkNotCancelled('read', signal);
  if (!precondition.ok) {
    return precondition;
  }

  try {
    return ok(await remote.get(id, { signal }));
  } catch (err) {
    return remoteFailure('read', err, signal);
  }
}

/**
 * Delete the access policy by identity.
 *
 * Whether deleting an absent object succeeds is up to the remote client;
 * the FMC client treats 404 as success.
 */
export async function executeDelete(
  remote: AccessPolicyRemote,
  id: string,
  signal?: AbortSignal
): Promise<Result<void>> {
  const precondition = checkNotCancelled('delete', signal);
  if (!precondition.ok) {
    return precondition;
  }

  try {
    await remote.delete(id, { signal });
    return ok(undefined);
  } catch (err) {
    return remoteFailure('delete', err, signal);
  }
}

/**
 * True when the diagnostics report a missing remote object
 */
export function isNotFound(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.code === 'REMOTE_NOT_FOUND');
}
