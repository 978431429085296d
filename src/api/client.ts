/**
 * FMC API Client
 *
 * Provides a typed interface to the FMC configuration REST API with:
 * - Token authentication (generatetoken) with one re-authentication on 401
 * - Domain scoping via the DOMAIN_UUID returned by the token endpoint
 * - Retry with exponential backoff (create only retries on 429)
 * - JSON logging with secret redaction
 */

import type {
  AccessPolicy,
  AccessPolicyDefaultAction,
  AccessPolicyPayload,
  AuthSession,
  FmcClientConfig,
  FmcDomain,
  FmcErrorBody,
  HttpMethod,
  IntrusionPolicy,
  ListResponse,
  ObjectReference,
  PaginationParams,
  RequestOptions,
  RetryConfig,
  SyslogAlert,
} from './types.js';
import {
  withRetry,
  ApiRequestError,
  parseRetryAfter,
  RATE_LIMIT_STATUS,
  UNAUTHORIZED_STATUS,
  type RetryOptions,
} from './retry.js';
import { logger, ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * List filter options shared by the lookup endpoints
 */
export interface ListObjectsOptions extends PaginationParams, RequestOptions {
  /** Exact name filter (applied client-side) */
  name?: string;
}

/**
 * Access policies sub-client
 *
 * There is deliberately no update method: every access policy field is
 * replace-only.
 */
export interface AccessPoliciesClient {
  create(request: AccessPolicyPayload, options?: RequestOptions): Promise<AccessPolicy>;
  get(id: string, options?: RequestOptions): Promise<AccessPolicy>;
  delete(id: string, options?: RequestOptions): Promise<void>;
  list(options?: ListObjectsOptions): Promise<AccessPolicy[]>;
}

/**
 * Read-only sub-client for objects an access policy references
 */
export interface LookupClient<T> {
  list(options?: ListObjectsOptions): Promise<T[]>;
  findByName(name: string, options?: RequestOptions): Promise<T | undefined>;
}

/**
 * Main FMC client interface
 */
export interface FmcClient {
  readonly accessPolicies: AccessPoliciesClient;
  readonly intrusionPolicies: LookupClient<IntrusionPolicy>;
  readonly syslogAlerts: LookupClient<SyslogAlert>;

  /** Get current configuration (without secrets) */
  getConfig(): { baseUrl: string; username: string; domain?: string; authenticated: boolean };
}

/**
 * Response of one HTTP exchange with its body already read
 */
interface FetchedResponse {
  status: number;
  ok: boolean;
  headers: Headers;
  text: string;
}

// =============================================================================
// Constants
// =============================================================================

const TOKEN_PATH = '/api/fmc_platform/v1/auth/generatetoken';
const CONFIG_PREFIX = '/api/fmc_config/v1/domain';
const DEFAULT_PAGE_LIMIT = 1000;

// =============================================================================
// Response Decoding
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Raised when the server answers 2xx with a body we cannot interpret
 */
export class ResponseFormatError extends ApiRequestError {
  constructor(message: string, status: number) {
    super(message, status, { code: 'UNEXPECTED_RESPONSE' });
    this.name = 'ResponseFormatError';
  }
}

function decodeReference(value: unknown): ObjectReference | undefined {
  if (!isRecord(value) || typeof value.id !== 'string') {
    return undefined;
  }
  return {
    id: value.id,
    type: optionalString(value.type) ?? '',
    name: optionalString(value.name),
  };
}

function decodeDefaultAction(value: unknown): AccessPolicyDefaultAction | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  return {
    id: optionalString(value.id),
    type: optionalString(value.type),
    action: optionalString(value.action),
    intrusionPolicy: decodeReference(value.intrusionPolicy),
    syslogConfig: decodeReference(value.syslogConfig),
    logBegin: optionalBoolean(value.logBegin),
    logEnd: optionalBoolean(value.logEnd),
    sendEventsToFMC: optionalBoolean(value.sendEventsToFMC),
  };
}

function textField(body: Record<string, unknown>, key: string, status: number): string {
  const value = body[key];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new ResponseFormatError(`access policy ${key} is not a string`, status);
  }
  return value;
}

/**
 * Decode an access policy body.
 *
 * The identity is mandatory. `name` and `type` must be strings when
 * present; nested fields that do not decode are dropped.
 */
export function decodeAccessPolicy(body: unknown, status: number): AccessPolicy {
  if (!isRecord(body) || typeof body.id !== 'string' || body.id.length === 0) {
    throw new ResponseFormatError('access policy response has no id', status);
  }
  const links = isRecord(body.links)
    ? { self: optionalString(body.links.self), parent: optionalString(body.links.parent) }
    : undefined;
  return {
    id: body.id,
    name: textField(body, 'name', status),
    type: textField(body, 'type', status),
    description: optionalString(body.description),
    defaultAction: decodeDefaultAction(body.defaultAction),
    links,
  };
}

function decodeNamedObject(value: unknown): { id: string; name: string; type: string } | undefined {
  if (!isRecord(value) || typeof value.id !== 'string' || typeof value.name !== 'string') {
    return undefined;
  }
  return { id: value.id, name: value.name, type: optionalString(value.type) ?? '' };
}

function decodeList<T>(body: unknown, decodeItem: (item: unknown) => T | undefined): {
  items: T[];
  /** Items on the page before decoding */
  received: number;
  count: number;
} {
  const envelope: ListResponse<unknown> = isRecord(body)
    ? {
        items: Array.isArray(body.items) ? body.items : [],
        paging: isRecord(body.paging) && typeof body.paging.count === 'number'
          ? {
              offset: Number(body.paging.offset ?? 0),
              limit: Number(body.paging.limit ?? 0),
              count: body.paging.count,
              pages: Number(body.paging.pages ?? 0),
            }
          : undefined,
      }
    : {};
  const rawItems = envelope.items ?? [];
  const items: T[] = [];
  for (const raw of rawItems) {
    const item = decodeItem(raw);
    if (item !== undefined) {
      items.push(item);
    }
  }
  return { items, received: rawItems.length, count: envelope.paging?.count ?? rawItems.length };
}

/**
 * Extract a readable message from an FMC error body
 */
export function extractErrorMessage(body: string, status: number): string {
  const fallback = `FMC API error (${status})`;
  if (!body) {
    return fallback;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    const error: FmcErrorBody['error'] = isRecord(parsed) && isRecord(parsed.error)
      ? {
          messages: Array.isArray(parsed.error.messages)
            ? parsed.error.messages.filter(isRecord).map((m) => ({
                description: optionalString(m.description),
              }))
            : undefined,
        }
      : undefined;
    const descriptions = (error?.messages ?? [])
      .map((m) => m.description)
      .filter((d): d is string => typeof d === 'string' && d.length > 0);
    return descriptions.length > 0 ? descriptions.join('; ') : fallback;
  } catch {
    return body.substring(0, 200);
  }
}

/**
 * Parse the DOMAINS header of the token response
 */
export function parseDomains(header: string | null): FmcDomain[] {
  if (!header) {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(header);
    if (!Array.isArray(parsed)) {
      return [];
    }
    return parsed.flatMap((entry): FmcDomain[] =>
      isRecord(entry) && typeof entry.name === 'string' && typeof entry.uuid === 'string'
        ? [{ name: entry.name, uuid: entry.uuid }]
        : []
    );
  } catch {
    return [];
  }
}

/**
 * Normalize a host setting into a base URL
 */
export function normalizeBaseUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create an FMC API client with retry and logging
 */
export function createClient(config: FmcClientConfig): FmcClient {
  const baseUrl = normalizeBaseUrl(config.host);
  const timeout = config.timeout ?? 30000;
  const log = config.debug ? logger : new ApiLogger({ level: 'warn' });
  const retryConfig: RetryConfig = config.retry ?? {};

  let session: AuthSession | undefined;
  let pendingAuth: Promise<AuthSession> | undefined;

  /**
   * Run fetch and read the body under the per-request timeout and the
   * caller's signal. Both stay armed until the body has been read.
   */
  async function timedFetch(
    url: string,
    init: { method: HttpMethod; headers: Record<string, string>; body?: string },
    signal?: AbortSignal
  ): Promise<FetchedResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      const timeoutError = new Error(`Request timed out after ${timeout}ms`);
      timeoutError.name = 'TimeoutError';
      controller.abort(timeoutError);
    }, timeout);
    const forwardAbort = (): void => controller.abort(signal?.reason);

    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let rejectAborted: (reason: unknown) => void = () => undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
      rejectAborted = reject;
    });
    const onAbort = (): void => rejectAborted(controller.signal.reason);
    if (controller.signal.aborted) {
      onAbort();
    } else {
      controller.signal.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await Promise.race([fetch(url, { ...init, signal: controller.signal }), aborted]);
      const text = await Promise.race([response.text(), aborted]);
      return { status: response.status, ok: response.ok, headers: response.headers, text };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
      controller.signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Obtain an access token and the domain UUID to operate in
   */
  async function generateToken(signal?: AbortSignal): Promise<AuthSession> {
    const url = `${baseUrl}${TOKEN_PATH}`;
    const credentials = Buffer.from(`${config.username}:${config.password}`).toString('base64');
    const headers = { Authorization: `Basic ${credentials}` };

    log.request('POST', url, { headers });
    const startTime = Date.now();
    const response = await timedFetch(url, { method: 'POST', headers }, signal);
    log.response(response.status, url, { durationMs: Date.now() - startTime });

    if (!response.ok) {
      const message =
        response.status === UNAUTHORIZED_STATUS
          ? `FMC rejected the credentials for user "${config.username}"`
          : extractErrorMessage(response.text, response.status);
      throw new ApiRequestError(message, response.status, {
        code: 'AUTH_FAILED',
        retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
      });
    }

    const accessToken = response.headers.get('X-auth-access-token');
    if (!accessToken) {
      throw new ApiRequestError('token response has no X-auth-access-token header', response.status, {
        code: 'AUTH_FAILED',
      });
    }

    let domainUuid = response.headers.get('DOMAIN_UUID') ?? undefined;
    if (config.domain) {
      const domains = parseDomains(response.headers.get('DOMAINS'));
      const match = domains.find((d) => d.name === config.domain || d.uuid === config.domain);
      if (!match) {
        throw new ApiRequestError(
          `Domain "${config.domain}" is not available to user "${config.username}" ` +
            `(available: ${domains.map((d) => d.name).join(', ') || 'none'})`,
          response.status,
          { code: 'DOMAIN_NOT_FOUND' }
        );
      }
      domainUuid = match.uuid;
    }

    if (!domainUuid) {
      throw new ApiRequestError('token response has no DOMAIN_UUID header', response.status, {
        code: 'AUTH_FAILED',
      });
    }

    log.debug('Authenticated with FMC', { domainUuid });

    return {
      accessToken,
      refreshToken: response.headers.get('X-auth-refresh-token') ?? undefined,
      domainUuid,
    };
  }

  /**
   * Return the cached session, authenticating once if needed
   */
  async function authenticate(signal?: AbortSignal, force = false): Promise<AuthSession> {
    if (session && !force) {
      return session;
    }
    if (!pendingAuth) {
      pendingAuth = generateToken(signal).finally(() => {
        pendingAuth = undefined;
      });
    }
    session = await pendingAuth;
    return session;
  }

  /**
   * Make an API request with retry logic
   *
   * @returns The parsed JSON body (undefined for empty responses) and status
   */
  async function request(
    method: HttpMethod,
    path: string,
    options: {
      params?: Record<string, string | number | boolean | undefined>;
      body?: unknown;
      signal?: AbortSignal;
      retry?: Pick<RetryOptions<unknown>, 'isRetryable' | 'retryableStatuses'>;
      /** Status codes treated as success with an empty body */
      acceptStatuses?: number[];
    } = {}
  ): Promise<{ status: number; body: unknown }> {
    const makeRequest = async (): Promise<{ status: number; body: unknown }> => {
      let current = await authenticate(options.signal);

      const url = new URL(`${baseUrl}${CONFIG_PREFIX}/${current.domainUuid}${path}`);
      for (const [key, value] of Object.entries(options.params ?? {})) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }

      const send = async (auth: AuthSession): Promise<FetchedResponse> => {
        const headers: Record<string, string> = {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'X-auth-access-token': auth.accessToken,
        };
        log.request(method, url.toString(), { headers, body: options.body });
        const startTime = Date.now();
        const response = await timedFetch(
          url.toString(),
          {
            method,
            headers,
            body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          },
          options.signal
        );
        log.response(response.status, url.toString(), { durationMs: Date.now() - startTime });
        return response;
      };

      let response = await send(current);
      if (response.status === UNAUTHORIZED_STATUS) {
        log.info('Access token rejected, re-authenticating');
        current = await authenticate(options.signal, true);
        response = await send(current);
      }

      if (options.acceptStatuses?.includes(response.status)) {
        return { status: response.status, body: undefined };
      }

      if (!response.ok) {
        throw new ApiRequestError(extractErrorMessage(response.text, response.status), response.status, {
          retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
        });
      }

      const text = response.text;
      if (response.status === 204 || text.length === 0) {
        return { status: response.status, body: undefined };
      }

      try {
        const parsed: unknown = JSON.parse(text);
        return { status: response.status, body: parsed };
      } catch {
        throw new ResponseFormatError(`FMC returned a non-JSON body for ${method} ${path}`, response.status);
      }
    };

    const result = await withRetry(makeRequest, {
      ...retryConfig,
      ...options.retry,
      signal: options.signal,
      logger: log,
      onRetry: (attempt, error, delayMs) => {
        log.info(`Retrying request to ${path}`, {
          attempt,
          error: error.message,
          delayMs,
        });
      },
    });

    if (!result.success) {
      throw result.error;
    }

    return result.data;
  }

  /**
   * Fetch every page of a list endpoint
   */
  async function listAll<T>(
    path: string,
    decodeItem: (item: unknown) => T | undefined,
    options: ListObjectsOptions = {}
  ): Promise<T[]> {
    const limit = options.limit ?? DEFAULT_PAGE_LIMIT;
    const items: T[] = [];
    let offset = options.offset ?? 0;

    for (;;) {
      const { body } = await request('GET', path, {
        params: { offset, limit, expanded: options.expanded ?? true },
        signal: options.signal,
      });
      const page = decodeList(body, decodeItem);
      items.push(...page.items);
      offset += limit;
      if (page.received === 0 || offset >= page.count) {
        break;
      }
    }

    return options.name === undefined
      ? items
      : items.filter((item) => isRecord(item) && item.name === options.name);
  }

  function lookup<T>(path: string, decodeItem: (item: unknown) => T | undefined): LookupClient<T> {
    return {
      list: (options) => listAll(path, decodeItem, options),
      async findByName(name, options = {}) {
        const matches = await listAll(path, decodeItem, { ...options, name });
        return matches[0];
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Access Policies Client
  // ---------------------------------------------------------------------------

  const accessPolicies: AccessPoliciesClient = {
    async create(req, options = {}) {
      const { status, body } = await request('POST', '/policy/accesspolicies', {
        body: req,
        signal: options.signal,
        retry: {
          // Create is not idempotent: only rate-limit rejections are retried.
          isRetryable: (error) => error instanceof ApiRequestError && error.status === RATE_LIMIT_STATUS,
        },
      });
      return decodeAccessPolicy(body, status);
    },

    async get(id, options = {}) {
      const { status, body } = await request('GET', `/policy/accesspolicies/${encodeURIComponent(id)}`, {
        signal: options.signal,
      });
      return decodeAccessPolicy(body, status);
    },

    async delete(id, options = {}) {
      await request('DELETE', `/policy/accesspolicies/${encodeURIComponent(id)}`, {
        signal: options.signal,
        acceptStatuses: [404],
      });
    },

    list: (options) =>
      listAll(
        '/policy/accesspolicies',
        (item) => {
          try {
            return decodeAccessPolicy(item, 200);
          } catch {
            return undefined;
          }
        },
        options
      ),
  };

  // ---------------------------------------------------------------------------
  // Return Client
  // ---------------------------------------------------------------------------

  return {
    accessPolicies,
    intrusionPolicies: lookup<IntrusionPolicy>('/policy/intrusionpolicies', decodeNamedObject),
    syslogAlerts: lookup<SyslogAlert>('/policy/syslogalerts', decodeNamedObject),

    getConfig() {
      return {
        baseUrl,
        username: config.username,
        domain: config.domain,
        authenticated: session !== undefined,
      };
    },
  };
}
