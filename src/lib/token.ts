import { AuthError } from './errors.ts';

/** Tokens are refreshed this long before they actually expire */
export const REFRESH_SKEW_MS = 60_000;

/** Lifetime assumed for tokens whose source does not report one (gcloud) */
export const DEFAULT_TOKEN_LIFETIME_MS = 3600_000;

/** Latest instant representable by a Date */
const FAR_FUTURE_MS = 8.64e15;

const BEARER_PREFIX = 'Bearer ';

// HTAB, or visible ASCII plus space
const HEADER_VALUE_CHARS = /^[\t\x20-\x7e]+$/;

/**
 * Bearer credential with its validity window.
 * The `Authorization` header value is computed once at construction.
 */
export class Token {
  readonly accessToken: string;
  /** When the token was obtained (ms since epoch) */
  readonly acquiredAt: number;
  /** When the issuer considers the token expired (ms since epoch) */
  readonly expiresAt: number;
  /** `Bearer <accessToken>` */
  readonly header: string;

  constructor(accessToken: string, acquiredAt: number, expiresAt: number) {
    if (!HEADER_VALUE_CHARS.test(accessToken)) {
      throw new AuthError('InvalidTokenShape', accessToken.length === 0 ? 'Access token is empty' : 'Access token contains characters not allowed in an HTTP header value');
    }

    this.accessToken = accessToken;
    this.acquiredAt = acquiredAt;
    this.expiresAt = expiresAt;
    this.header = `${BEARER_PREFIX}${accessToken}`;
    Object.freeze(this);
  }

  /** Token from an OAuth-style `{ access_token, expires_in }` payload (expires_in in seconds) */
  static fromExpiresIn(accessToken: string, expiresInSeconds: number, now: number): Token {
    return new Token(accessToken, now, now + expiresInSeconds * 1000);
  }

  static fromResponse(body: { access_token: string; expires_in: number }, now: number): Token {
    return Token.fromExpiresIn(body.access_token, body.expires_in, now);
  }

  static withDefaultLifetime(accessToken: string, now: number): Token {
    return new Token(accessToken, now, now + DEFAULT_TOKEN_LIFETIME_MS);
  }

  /**
   * Milliseconds this token can still be handed out, or undefined once it is
   * inside the refresh skew window.
   */
  validFor(now: number): number | undefined {
    const remaining = this.expiresAt - now - REFRESH_SKEW_MS;
    return remaining > 0 ? remaining : undefined;
  }

  isValid(now: number): boolean {
    return this.validFor(now) !== undefined;
  }

  // keep the secret out of logs and JSON dumps
  toJSON(): Record<string, unknown> {
    return { accessToken: '...', acquiredAt: this.acquiredAt, expiresAt: this.expiresAt };
  }

  toString(): string {
    return `Token(expiresAt=${new Date(this.expiresAt).toISOString()})`;
  }
}

/** Constant credential accepted by the Google Cloud emulators */
export const EMULATOR_TOKEN = new Token('owner', 0, FAR_FUTURE_MS);
