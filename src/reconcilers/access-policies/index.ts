/**
 * Access Policy Reconciler
 *
 * Creates, reads and deletes FMC access policies from declared attributes.
 *
 * @example
 * ```typescript
 * import { AccessPolicyReconciler } from './reconcilers/access-policies/index.js';
 * import { ResourceData } from './state/index.js';
 *
 * const reconciler = new AccessPolicyReconciler(client.accessPolicies, { notFound: 'remove' });
 * const state = ResourceData.fromDeclared({ name: 'Terraform Access Policy', defaultAction: 'permit' });
 *
 * const diagnostics = await reconciler.reconcileCreate(state, { signal });
 * diagnostics.forEach((d) => console.log(formatDiagnostic(d)));
 * ```
 */

export * from './types.js';
export * from './schema.js';
export * from './translate.js';
export * from './executor.js';
export * from './synchronize.js';
export * from './reconcile.js';
export * from './plan.js';
