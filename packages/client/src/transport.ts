/**
 * ╔══════════════════════════════════════════════════════════════════════════════╗
 * ║                         CONTROL-PLANE HTTP TRANSPORT                          ║
 * ║                                                                               ║
 * ║  Authenticated requests, JSON decoding, and mapping of HTTP and payload      ║
 * ║  failures onto the typed error taxonomy. No retries, no local recovery.      ║
 * ╚══════════════════════════════════════════════════════════════════════════════╝
 */

import {
  ApiError,
  AuthenticationError,
  ConfigurationError,
  ConflictError,
  NotFoundError,
  RateLimitError,
  TransportError,
  createLogger,
  formatIssues,
  type ApiErrorOptions,
  type ApiErrorPayload,
} from '@edgeconf/core';
import {
  ApiStatusSchema,
  FastlyClientConfigSchema,
  LoginCredentialsSchema,
  SessionSchema,
  type ApiStatus,
  type FastlyClientConfig,
  type FastlyClientOptions,
  type LoginCredentials,
  type Session,
} from '@edgeconf/types';
import type { z } from 'zod';

import { encodeForm } from './form.js';

const logger = createLogger({ name: 'fastly-transport' });

// =============================================================================
// CONSTANTS
// =============================================================================

export const API_KEY_HEADER = 'X-Fastly-Key';

/**
 * Session cookie as found in the login response's Set-Cookie header
 */
export const SESSION_COOKIE_PATTERN = /(fastly\.session=[^;,\s]+)/;

// Messages that mark a 400 as a name collision or a write to a locked version
const CONFLICT_MESSAGE_PATTERN = /locked|already exists|duplicate/i;

// =============================================================================
// TYPES
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PURGE';

export interface RequestOptions {
  method?: HttpMethod;
  form?: URLSearchParams;
  headers?: Record<string, string>;
  /** Hand a 2xx body whose `status` is not "ok" to the schema instead of raising it */
  allowFailureStatus?: boolean;
}

interface RawResponse {
  status: number;
  headers: Headers;
  payload: unknown;
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

function readStatusPayload(payload: unknown): ApiErrorPayload | undefined {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return undefined;
  }
  const record: Record<string, unknown> = { ...payload };
  const text = (value: unknown): string | undefined =>
    typeof value === 'string' && value.length > 0 ? value : undefined;
  return {
    ...record,
    msg: text(record.msg),
    detail: text(record.detail),
    status: text(record.status),
  };
}

/**
 * Map a non-2xx response onto the error taxonomy, keeping the server's
 * `msg` and `detail` verbatim. Non-JSON bodies (usually HTML) become the detail.
 */
export function errorFromResponse(
  httpStatus: number,
  payload: unknown,
  headers: Headers = new Headers()
): ApiError {
  const statusPayload = readStatusPayload(payload);
  const rawBody = typeof payload === 'string' ? payload.trim() : '';

  const options: ApiErrorOptions = {
    serverMessage: statusPayload?.msg ?? `HTTP Error ${httpStatus} occurred.`,
    serverDetail: statusPayload ? statusPayload.detail : rawBody || undefined,
    httpStatus,
    payload: statusPayload ? { ...statusPayload, status: 'error' } : undefined,
  };

  switch (httpStatus) {
    case 401:
    case 403:
      return new AuthenticationError(options);
    case 404:
      return new NotFoundError(options);
    case 409:
      return new ConflictError(options);
    case 429: {
      const retryAfter = parseInt(headers.get('Retry-After') ?? '60', 10);
      return new RateLimitError(Number.isNaN(retryAfter) ? 60 : retryAfter, options);
    }
    default:
      break;
  }

  if (
    httpStatus >= 400 &&
    httpStatus < 500 &&
    CONFLICT_MESSAGE_PATTERN.test(`${options.serverMessage} ${options.serverDetail ?? ''}`)
  ) {
    return new ConflictError(options);
  }

  return new ApiError(options);
}

// Statuses of a 2xx body that are not failures; stats report "success"
const SUCCESS_STATUSES = new Set(['ok', 'success']);

/**
 * The `{ status, msg, detail }` of a 2xx body that reports a failure.
 * Numeric statuses belong to entities (response objects) and are not failures.
 */
export function failureStatusOf(payload: unknown): ApiStatus | undefined {
  const statusPayload = readStatusPayload(payload);
  const status = statusPayload?.status;
  if (
    !statusPayload ||
    status === undefined ||
    SUCCESS_STATUSES.has(status) ||
    /^\d+$/.test(status)
  ) {
    return undefined;
  }
  return { status, msg: statusPayload.msg, detail: statusPayload.detail };
}

/**
 * Raise an `ApiError` (or the subclass `makeError` builds) unless status is "ok"
 */
export function assertStatusOk(
  status: ApiStatus,
  makeError: (options: ApiErrorOptions) => ApiError = (options) => new ApiError(options)
): true {
  if (status.status !== 'ok') {
    throw makeError({
      serverMessage: status.msg ?? `Request failed with status "${status.status}"`,
      serverDetail: status.detail,
      payload: { ...status },
    });
  }
  return true;
}

// =============================================================================
// TRANSPORT
// =============================================================================

/**
 * HTTP transport for the control-plane API
 *
 * Authenticates with the API key header until `login()` succeeds, then with
 * the session cookie. The session is mutable state owned by this object:
 * use one transport per logical actor and never interleave a login with
 * requests issued from other concurrent workflows on the same instance.
 *
 * @example
 * ```typescript
 * const transport = new FastlyTransport({ apiKey: process.env.FASTLY_API_KEY ?? '' });
 * const versions = await transport.request('/service/svc-123/version', z.array(VersionSchema));
 * ```
 */
export class FastlyTransport {
  private readonly config: FastlyClientConfig;
  private sessionCookie: string | undefined;

  constructor(options: FastlyClientOptions) {
    const result = FastlyClientConfigSchema.safeParse(options);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new ConfigurationError(`Invalid client configuration: ${issues.join('; ')}`, issues);
    }
    this.config = result.data;

    logger.debug({ baseUrl: this.config.baseUrl }, 'Transport initialized');
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * True once a session cookie has been obtained via `login()`
   */
  get isFullyAuthenticated(): boolean {
    return this.sessionCookie !== undefined;
  }

  /**
   * Log in with username and password. Required for user/customer
   * management and version locking.
   */
  async login(credentials: LoginCredentials): Promise<Session> {
    const { user, password } = LoginCredentialsSchema.parse(credentials);
    const form = encodeForm({ user, password }, ['user', 'password']);

    let response: RawResponse;
    try {
      response = await this.send('/login', { method: 'POST', form });
    } catch (error) {
      if (
        error instanceof ApiError &&
        !(error instanceof RateLimitError) &&
        error.httpStatus !== undefined &&
        error.httpStatus < 500
      ) {
        throw new AuthenticationError({
          serverMessage: error.serverMessage,
          serverDetail: error.serverDetail,
          httpStatus: error.httpStatus,
          payload: error.payload,
        });
      }
      throw error;
    }

    const cookie = SESSION_COOKIE_PATTERN.exec(response.headers.get('set-cookie') ?? '')?.[1];
    if (!cookie) {
      throw new AuthenticationError({
        serverMessage: 'Login response did not include a session cookie',
        httpStatus: response.status,
      });
    }

    const session = this.decode('/login', SessionSchema, response.payload);
    this.sessionCookie = cookie;
    logger.info({ userId: session.user.id }, 'Session established');
    return session;
  }

  /**
   * Drop the session and fall back to API key authentication
   */
  logout(): void {
    this.sessionCookie = undefined;
  }

  /**
   * Issue a request and decode the JSON body with `schema`
   */
  async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const response = await this.send(path, options);
    return this.decode(path, schema, response.payload);
  }

  /**
   * Issue a request answered by a `{ status, msg, detail }` payload.
   * Any status other than "ok" is raised through `makeError`.
   */
  async requestStatus(
    path: string,
    options: RequestOptions = {},
    makeError?: (options: ApiErrorOptions) => ApiError
  ): Promise<true> {
    const response = await this.send(path, options, makeError);
    return assertStatusOk(this.decode(path, ApiStatusSchema, response.payload), makeError);
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private decode<S extends z.ZodTypeAny>(path: string, schema: S, payload: unknown): z.output<S> {
    const result = schema.safeParse(payload);
    if (!result.success) {
      const issues = formatIssues(result.error);
      logger.warn({ path, issues }, 'Response failed schema validation');
      throw new TransportError(
        `Malformed response from ${path}: ${issues.slice(0, 3).join('; ')}`,
        result.error
      );
    }
    return result.data;
  }

  private assertSafePath(path: string): void {
    const pathname = path.split('?')[0] ?? '';
    const segments = pathname.split('/');
    if (
      !path.startsWith('/') ||
      path.startsWith('//') ||
      path.includes('://') ||
      segments.some((segment) => segment === '..' || segment === '.')
    ) {
      throw new TransportError(`Refusing to make request: unsafe path "${path}"`);
    }
  }

  private buildHeaders(options: RequestOptions): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
    };

    if (this.sessionCookie) {
      headers.Cookie = this.sessionCookie;
    } else {
      headers[API_KEY_HEADER] = this.config.apiKey;
    }

    if (this.config.userAgent) {
      headers['User-Agent'] = this.config.userAgent;
    }

    if (options.form && (options.method === 'POST' || options.method === 'PUT')) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    return { ...headers, ...options.headers };
  }

  private async send(
    path: string,
    options: RequestOptions,
    makeError?: (options: ApiErrorOptions) => ApiError
  ): Promise<RawResponse> {
    this.assertSafePath(path);

    const method = options.method ?? 'GET';
    const url = `${this.config.baseUrl}${path}`;
    const timeoutMs = this.config.timeoutMs;
    const startTime = Date.now();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: this.buildHeaders(options),
        body: options.form?.toString(),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timeout after ${timeoutMs}ms`, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request to ${path} failed: ${reason}`, error);
    } finally {
      clearTimeout(timeoutId);
    }

    const latencyMs = Date.now() - startTime;
    logger.debug({ method, path, status: response.status, latencyMs }, 'Control-plane request');

    let payload: unknown = undefined;
    let decoded = true;
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
        decoded = false;
      }
    }

    if (!response.ok) {
      const error = errorFromResponse(response.status, payload, response.headers);
      logger.warn(
        {
          method,
          path,
          status: response.status,
          code: error.code,
          serverMessage: error.serverMessage,
        },
        'Control-plane request failed'
      );
      throw error;
    }

    if (!decoded) {
      throw new TransportError(
        `Response from ${path} is not valid JSON (status ${response.status})`
      );
    }

    const failure = options.allowFailureStatus ? undefined : failureStatusOf(payload);
    if (failure) {
      logger.warn(
        { method, path, status: response.status, serverMessage: failure.msg },
        'Control-plane request reported failure'
      );
      const build = makeError ?? ((errorOptions: ApiErrorOptions) => new ApiError(errorOptions));
      assertStatusOk(failure, (errorOptions) =>
        build({ ...errorOptions, httpStatus: response.status })
      );
    }

    return { status: response.status, headers: response.headers, payload };
  }
}
