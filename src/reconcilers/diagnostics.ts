/**
 * Reconciliation diagnostics
 *
 * Every reconcile operation reports through an ordered list of diagnostics
 * instead of throwing. Internally the steps compose through `Result`, which
 * carries either a value or a non-empty list of diagnostics with at least
 * one error; the first failing step short-circuits the rest.
 */

// =============================================================================
// Diagnostic Types
// =============================================================================

/**
 * Severity of a diagnostic. `error` is fatal for the current call.
 */
export type DiagnosticSeverity = 'error' | 'warning';

/**
 * Diagnostic codes for programmatic handling
 */
export type DiagnosticCode =
  /** Declared attribute failed schema validation */
  | 'INVALID_ATTRIBUTE'
  /** Cross-reference identity is structurally invalid */
  | 'MALFORMED_REFERENCE'
  /** Read or delete attempted without a stored identity */
  | 'MISSING_IDENTITY'
  /** Create attempted while an identity is already stored */
  | 'ALREADY_CREATED'
  /** Transport or API failure */
  | 'REMOTE_ERROR'
  /** The remote object does not exist */
  | 'REMOTE_NOT_FOUND'
  /** The remote object vanished and its identity was cleared */
  | 'RESOURCE_GONE'
  /** A value could not be written to local state */
  | 'STATE_WRITE_FAILED'
  /** The call was cancelled */
  | 'CANCELLED'
  /** A mutating call was interrupted; its outcome is unknown */
  | 'STATE_UNKNOWN';

/**
 * A single structured diagnostic
 */
export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  /** Short, stable description of what failed */
  summary: string;
  /** Literal detail (remote error text, validation message) */
  detail: string;
  /** Manifest attribute the diagnostic is about */
  attribute?: string;
}

export type NonEmptyArray<T> = [T, ...T[]];

// =============================================================================
// Result Type
// =============================================================================

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err {
  readonly ok: false;
  readonly diagnostics: NonEmptyArray<Diagnostic>;
}

export type Result<T> = Ok<T> | Err;

// =============================================================================
// Builders
// =============================================================================

/**
 * Create an error diagnostic
 */
export function error(
  code: DiagnosticCode,
  summary: string,
  detail: string,
  attribute?: string
): Diagnostic {
  return attribute === undefined
    ? { severity: 'error', code, summary, detail }
    : { severity: 'error', code, summary, detail, attribute };
}

/**
 * Create a warning diagnostic
 */
export function warning(
  code: DiagnosticCode,
  summary: string,
  detail: string,
  attribute?: string
): Diagnostic {
  return { ...error(code, summary, detail, attribute), severity: 'warning' };
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * Create a failed result from a single error
 */
export function fail(
  code: DiagnosticCode,
  summary: string,
  detail: string,
  attribute?: string
): Err {
  return { ok: false, diagnostics: [error(code, summary, detail, attribute)] };
}

/**
 * Create a failed result from a fatal diagnostic plus accompanying ones
 */
export function failWith(fatal: Diagnostic, ...others: Diagnostic[]): Err {
  return { ok: false, diagnostics: [fatal, ...others] };
}

// =============================================================================
// Combinators
// =============================================================================

/**
 * Continue with `fn` when `result` succeeded, otherwise pass the failure on
 */
export function andThen<T, U>(result: Result<T>, fn: (value: T) => Result<U>): Result<U> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Async variant of {@link andThen}
 */
export async function andThenAsync<T, U>(
  result: Result<T>,
  fn: (value: T) => Promise<Result<U>>
): Promise<Result<U>> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Combine two independent results, keeping the diagnostics of both failures
 */
export function both<A, B>(a: Result<A>, b: Result<B>): Result<[A, B]> {
  if (!a.ok) {
    const [first, ...rest] = a.diagnostics;
    return { ok: false, diagnostics: [first, ...rest, ...(b.ok ? [] : b.diagnostics)] };
  }
  if (!b.ok) {
    return b;
  }
  return ok([a.value, b.value]);
}

/**
 * Flatten a result into the diagnostic sequence exposed to callers.
 * Success yields an empty list.
 */
export function toDiagnostics(result: Result<unknown>): Diagnostic[] {
  return result.ok ? [] : [...result.diagnostics];
}

// =============================================================================
// Inspection
// =============================================================================

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Format a diagnostic as a single line
 *
 * @example
 * formatDiagnostic(error('REMOTE_ERROR', 'unable to read access policy', 'timeout'))
 * // 'Error: unable to read access policy: timeout'
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const label = diagnostic.severity === 'error' ? 'Error' : 'Warning';
  const where = diagnostic.attribute ? ` (${diagnostic.attribute})` : '';
  return `${label}: ${diagnostic.summary}${where}: ${diagnostic.detail}`;
}
