/**
 * FMC API client module
 *
 * Provides:
 * - FmcClient with access policy, intrusion policy and syslog alert sub-clients
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 * - Type definitions for the wire entities
 */

// Main client
export {
  createClient,
  decodeAccessPolicy,
  extractErrorMessage,
  normalizeBaseUrl,
  parseDomains,
  ResponseFormatError,
} from './client.js';

export type {
  FmcClient,
  AccessPoliciesClient,
  LookupClient,
  ListObjectsOptions,
} from './client.js';

// Retry utilities
export {
  withRetry,
  ApiRequestError,
  calculateDelay,
  isRetryableError,
  isNotFoundError,
  isAbortError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
  RATE_LIMIT_STATUS,
  NOT_FOUND_STATUS,
} from './retry.js';

export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  parseLogLevel,
  ApiLogger,
  redactString,
  redactPatterns,
  redactObject,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  // Common
  PaginationParams,
  Paging,
  ListResponse,
  HttpMethod,
  RequestOptions,
  ObjectReference,

  // Entities
  AccessPolicy,
  AccessPolicyDefaultAction,
  AccessPolicyPayload,
  AccessPolicyDefaultActionPayload,
  DefaultAction,
  IntrusionPolicy,
  SyslogAlert,
  FmcDomain,
  AuthSession,

  // Config
  FmcClientConfig,
  RetryConfig,
  RetryResult,
} from './types.js';
