/**
 * API types for the FMC client
 *
 * These mirror the JSON bodies of the FMC configuration API
 * (`/api/fmc_config/v1/domain/{domainUUID}/...`). Only the entities the
 * reconcilers touch are modelled here.
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * Pagination parameters for list endpoints
 */
export interface PaginationParams {
  /** Number of items to return per page (FMC default: 25, max 1000) */
  limit?: number;
  /** Index of the first item to return */
  offset?: number;
  /** Return full objects instead of references */
  expanded?: boolean;
}

/**
 * Paging block returned by FMC list endpoints
 */
export interface Paging {
  offset: number;
  limit: number;
  count: number;
  pages: number;
  next?: string[];
}

/**
 * Envelope returned by FMC list endpoints
 */
export interface ListResponse<T> {
  items?: T[];
  paging?: Paging;
}

/**
 * Error body returned by FMC on failed requests
 */
export interface FmcErrorBody {
  error?: {
    category?: string;
    severity?: string;
    messages?: Array<{ description?: string; code?: string }>;
  };
}

/**
 * Options accepted by every request
 */
export interface RequestOptions {
  /** Caller cancellation signal, forwarded to fetch */
  signal?: AbortSignal;
}

// =============================================================================
// Request/Response Types
// =============================================================================

/**
 * HTTP methods supported by the API
 */
export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * A typed reference to another FMC object
 */
export interface ObjectReference<TType extends string = string> {
  id: string;
  type: TType;
  name?: string;
}

/**
 * Self links attached to FMC objects
 */
export interface Links {
  self?: string;
  parent?: string;
}

// =============================================================================
// Access Policies
// =============================================================================

/**
 * Wire values of the access policy default action
 */
export type DefaultAction =
  | 'BLOCK'
  | 'TRUST'
  | 'PERMIT'
  | 'NETWORK_DISCOVERY'
  | 'INHERIT_FROM_PARENT';

/**
 * Default action sub-object sent on create
 */
export interface AccessPolicyDefaultActionPayload {
  type: 'AccessPolicyDefaultAction';
  action?: DefaultAction;
  intrusionPolicy?: ObjectReference<'IntrusionPolicy'>;
  syslogConfig?: ObjectReference<'SyslogAlert'>;
  logBegin?: boolean;
  logEnd?: boolean;
  sendEventsToFMC?: boolean;
}

/**
 * Body of `POST policy/accesspolicies`
 */
export interface AccessPolicyPayload {
  type: 'AccessPolicy';
  name: string;
  description?: string;
  defaultAction: AccessPolicyDefaultActionPayload;
}

/**
 * Default action as returned by the server
 */
export interface AccessPolicyDefaultAction {
  id?: string;
  type?: string;
  action?: string;
  intrusionPolicy?: ObjectReference;
  syslogConfig?: ObjectReference;
  logBegin?: boolean;
  logEnd?: boolean;
  sendEventsToFMC?: boolean;
}

/**
 * Access policy as returned by the server
 */
export interface AccessPolicy {
  id: string;
  name: string;
  type: string;
  description?: string;
  defaultAction?: AccessPolicyDefaultAction;
  links?: Links;
}

// =============================================================================
// Referenced Objects
// =============================================================================

/**
 * Intrusion (IPS) policy summary
 */
export interface IntrusionPolicy {
  id: string;
  name: string;
  type: string;
  description?: string;
}

/**
 * Syslog alert configuration summary
 */
export interface SyslogAlert {
  id: string;
  name: string;
  type: string;
}

// =============================================================================
// Authentication
// =============================================================================

/**
 * A domain advertised in the `DOMAINS` header of the token response
 */
export interface FmcDomain {
  name: string;
  uuid: string;
}

/**
 * Session established by `generatetoken`
 */
export interface AuthSession {
  accessToken: string;
  refreshToken?: string;
  domainUuid: string;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * FMC client configuration
 */
export interface FmcClientConfig {
  /** FMC host or base URL (https:// is assumed when no scheme is given) */
  host: string;
  /** API user */
  username: string;
  /** API password */
  password: string;
  /** Domain name to operate in (defaults to the token's own domain) */
  domain?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Retry tuning */
  retry?: RetryConfig;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };
