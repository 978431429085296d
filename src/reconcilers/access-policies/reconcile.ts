/**
 * Access policy lifecycle
 *
 * Create, read and delete one access policy against the remote API.
 * Every operation returns an ordered diagnostic list; an empty list means
 * success. Nothing is thrown.
 *
 * @example
 * ```typescript
 * const reconciler = new AccessPolicyReconciler(client.accessPolicies);
 * const state = ResourceData.fromDeclared(attributes);
 * const diagnostics = await reconciler.reconcileCreate(state);
 * if (!hasErrors(diagnostics)) {
 *   console.log(`created ${state.id()}`);
 * }
 * ```
 */

import type { ApiLogger } from '../../api/logger.js';
import { logger as defaultLogger } from '../../api/logger.js';
import {
  type Diagnostic,
  type Result,
  andThen,
  andThenAsync,
  fail,
  ok,
  toDiagnostics,
  warning,
} from '../diagnostics.js';
import {
  OPERATION_SUMMARIES,
  executeCreate,
  executeDelete,
  executeRead,
  isNotFound,
} from './executor.js';
import { synchronizeAccessPolicy } from './synchronize.js';
import { translateAccessPolicy } from './translate.js';
import type { AccessPolicyRemote, AccessPolicyState, NotFoundPolicy } from './types.js';

/**
 * Options for {@link AccessPolicyReconciler}
 */
export interface ReconcilerOptions {
  /** What a read does when the remote object is missing (default: `error`) */
  notFound?: NotFoundPolicy;
  logger?: ApiLogger;
}

/**
 * Options for a single reconciliation call
 */
export interface ReconcileCallOptions {
  /** Cancels the in-flight remote call */
  signal?: AbortSignal;
}

function requireIdentity(state: AccessPolicyState, summary: string): Result<string> {
  const id = state.id();
  if (id === '') {
    return fail(
      'MISSING_IDENTITY',
      summary,
      'the access policy has no identity; it was never created or has been deleted'
    );
  }
  return ok(id);
}

export class AccessPolicyReconciler {
  private readonly notFound: NotFoundPolicy;
  private readonly logger: ApiLogger;

  constructor(
    private readonly remote: AccessPolicyRemote,
    options: ReconcilerOptions = {}
  ) {
    this.notFound = options.notFound ?? 'error';
    this.logger = (options.logger ?? defaultLogger).child({ resource: 'access_policy' });
  }

  /**
   * Create the remote object, then read it back into `state`.
   *
   * The create call is issued at most once. When it fails the identity
   * stays unset; once it succeeds the identity is stored even if the
   * confirming read fails.
   */
  async reconcileCreate(
    state: AccessPolicyState,
    options: ReconcileCallOptions = {}
  ): Promise<Diagnostic[]> {
    const { signal } = options;

    if (state.id() !== '') {
      return toDiagnostics(
        fail(
          'ALREADY_CREATED',
          OPERATION_SUMMARIES.create,
          `the access policy already exists with identity "${state.id()}"`
        )
      );
    }

    const created = await andThenAsync(translateAccessPolicy(state.attributes()), (payload) => {
      this.logger.debug('Creating access policy', { name: payload.name });
      return executeCreate(this.remote, payload, signal);
    });
    if (!created.ok) {
      return toDiagnostics(created);
    }

    const id = created.value.id;
    state.setId(id);
    this.logger.info('Created access policy', { id, name: created.value.name });

    const fetched = await executeRead(this.remote, id, signal);
    return toDiagnostics(andThen(fetched, (remote) => synchronizeAccessPolicy(state, remote)));
  }

  /**
   * Refresh `state` from the remote object
   */
  async reconcileRead(
    state: AccessPolicyState,
    options: ReconcileCallOptions = {}
  ): Promise<Diagnostic[]> {
    const identity = requireIdentity(state, OPERATION_SUMMARIES.read);
    if (!identity.ok) {
      return toDiagnostics(identity);
    }
    const id = identity.value;

    const fetched = await executeRead(this.remote, id, options.signal);
    if (!fetched.ok && this.notFound === 'remove' && isNotFound(fetched.diagnostics)) {
      state.setId('');
      this.logger.warn('Access policy no longer exists, identity cleared', { id });
      return [
        warning(
          'RESOURCE_GONE',
          'access policy no longer exists',
          `access policy "${id}" was not found on the server; it will be created again on the next apply`
        ),
      ];
    }

    return toDiagnostics(andThen(fetched, (remote) => synchronizeAccessPolicy(state, remote)));
  }

  /**
   * Delete the remote object and clear the identity
   */
  async reconcileDelete(
    state: AccessPolicyState,
    options: ReconcileCallOptions = {}
  ): Promise<Diagnostic[]> {
    const identity = requireIdentity(state, OPERATION_SUMMARIES.delete);
    if (!identity.ok) {
      return toDiagnostics(identity);
    }
    const id = identity.value;

    const deleted = await executeDelete(this.remote, id, options.signal);
    if (deleted.ok) {
      state.setId('');
      this.logger.info('Deleted access policy', { id });
    }
    return toDiagnostics(deleted);
  }
}
