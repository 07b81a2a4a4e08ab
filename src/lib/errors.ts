/**
 * Error taxonomy for credential discovery and token refresh.
 *
 * Every error is classified as fatal or transient when it is created, so the
 * refresh driver's retry policy is a single predicate ({@link isFatal}).
 */

export type AuthErrorKind =
  | 'NoProviderFound'
  | 'CredentialShape'
  | 'InvalidTokenShape'
  | 'Crypto'
  | 'Transport'
  | 'TokenEndpoint'
  | 'BadResponse'
  | 'Subprocess'
  | 'Revoked';

export interface AuthErrorOptions {
  /** Provider that raised the error, e.g. "service account" */
  provider?: string;
  /** Overrides the default classification of the kind */
  fatal?: boolean;
  /** Endpoint that answered with a non-success status */
  uri?: string;
  status?: number;
  /** Message extracted from the endpoint's error payload */
  upstreamMessage?: string;
  /** Low-level error code (ECONNREFUSED, ENOENT, ...) */
  code?: string;
  cause?: unknown;
}

const FATAL_BY_DEFAULT: Record<AuthErrorKind, boolean> = {
  NoProviderFound: true,
  CredentialShape: true,
  InvalidTokenShape: true,
  Crypto: true,
  Transport: false,
  TokenEndpoint: false,
  BadResponse: true,
  Subprocess: false,
  Revoked: true,
};

/**
 * Error raised by providers, the token cache and detection.
 * Shared as-is between all waiters of a coalesced refresh.
 * @public
 */
export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  readonly fatal: boolean;
  readonly provider: string | undefined;
  readonly uri: string | undefined;
  readonly status: number | undefined;
  readonly upstreamMessage: string | undefined;
  readonly code: string | undefined;

  constructor(kind: AuthErrorKind, message: string, options: AuthErrorOptions = {}) {
    super(options.provider ? `[${options.provider}] ${message}` : message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AuthError';
    this.kind = kind;
    this.fatal = options.fatal ?? FATAL_BY_DEFAULT[kind];
    this.provider = options.provider;
    this.uri = options.uri;
    this.status = options.status;
    this.upstreamMessage = options.upstreamMessage;
    this.code = options.code;
  }

  /**
   * Non-success status from an OAuth or metadata endpoint.
   * 4xx other than 408/429 is fatal; everything else may be retried.
   */
  static fromResponse(uri: string, status: number, body: string, provider?: string): AuthError {
    const upstreamMessage = extractErrorMessage(body);
    const message = upstreamMessage ? `${uri} - ${status}: ${upstreamMessage}` : `${uri} - ${status}`;

    return new AuthError('TokenEndpoint', message, {
      provider,
      uri,
      status,
      upstreamMessage,
      fatal: isFatalStatus(status),
    });
  }
}

export function isFatalStatus(status: number): boolean {
  return status >= 400 && status < 500 && status !== 408 && status !== 429;
}

/**
 * Retry predicate used by the refresh driver.
 * Errors that did not come from this library are treated as transient.
 */
export function isFatal(error: unknown): boolean {
  return error instanceof AuthError && error.fatal;
}

/**
 * Pull a human-readable message out of an error payload.
 *
 * JSON bodies: the first string among `message`, `error` (or Google's nested
 * `error.message`), otherwise the longest string value. Anything else is
 * returned trimmed, or undefined when empty.
 */
export function extractErrorMessage(body: string): string | undefined {
  const trimmed = body.trim();
  if (!trimmed) return undefined;

  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      return messageFromJson(parsed) ?? undefined;
    } catch {
      // not JSON after all, surface the raw text
      return trimmed;
    }
  }

  return trimmed;
}

function messageFromJson(value: unknown): string | null {
  if (typeof value === 'string') return value;

  if (Array.isArray(value)) {
    for (const item of value) {
      const found = messageFromJson(item);
      if (found !== null) return found;
    }
    return null;
  }

  if (!isRecord(value)) return null;

  if (typeof value.message === 'string') return value.message;
  if (typeof value.error === 'string') return value.error;
  if (isRecord(value.error) && typeof value.error.message === 'string') return value.error.message;

  let longest: string | null = null;
  for (const entry of Object.values(value)) {
    if (typeof entry === 'string' && (longest === null || entry.length > longest.length)) {
      longest = entry;
    }
  }
  return longest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Error code carried by an error or its cause chain (ECONNREFUSED, ENOENT, TimeoutError, ...).
 * undici wraps socket errors as `TypeError('fetch failed', { cause })`.
 */
export function errorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    const code = 'code' in current ? current.code : undefined;
    if (typeof code === 'string') return code;
    if (current.name === 'TimeoutError' || current.name === 'AbortError') return current.name;
    current = current.cause;
  }
  return undefined;
}

const CONNECT_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH', 'UND_ERR_CONNECT_TIMEOUT', 'TimeoutError']);

/** True when the request never reached a server (refused, unresolvable, unreachable, timed out) */
export function isConnectError(error: unknown): boolean {
  const code = error instanceof AuthError ? error.code : errorCode(error);
  return code !== undefined && CONNECT_ERROR_CODES.has(code);
}

/**
 * Error surfaced by {@link AuthService}: either authentication failed before
 * the request was sent, or the wrapped service itself failed.
 * @public
 */
export class ServiceError extends Error {
  readonly kind: 'auth' | 'service';

  constructor(kind: 'auth' | 'service', cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(kind === 'auth' ? `Authentication failed: ${detail}` : detail, { cause });
    this.name = 'ServiceError';
    this.kind = kind;
  }
}
