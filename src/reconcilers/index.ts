/**
 * Reconcilers module
 *
 * Reconciles declared FMC objects against the remote API and reports
 * through diagnostics.
 *
 * @module reconcilers
 */

export * as diagnostics from './diagnostics.js';
export * as accessPolicies from './access-policies/index.js';
