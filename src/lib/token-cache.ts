import type { PendingToken } from '../providers/metadata.ts';
import type { ScopedProvider } from '../providers/scoped.ts';
import { type Clock, type GetHeaderResult, type Logger, silentLogger, type ValidAuth } from '../types.ts';
import { AuthError } from './errors.ts';
import { type RetryPolicy, refreshWithRetries } from './refresh-driver.ts';
import type { Token } from './token.ts';

export interface TokenCacheOptions {
  clock?: Clock;
  logger?: Logger;
  retry?: Omit<RetryPolicy, 'signal' | 'logger' | 'providerName'>;
  /** Token request already in flight (from detection); used as the first refresh attempt */
  initialToken?: PendingToken;
}

export interface TokenCacheState {
  token: 'empty' | 'valid' | 'expired';
  refreshing: boolean;
  closed: boolean;
  expiresAt?: number;
}

interface InFlight {
  promise: Promise<ValidAuth>;
  controller: AbortController;
}

/**
 * One bearer token shared by every request of an `Auth` handle.
 *
 * At most one refresh runs at a time and every caller that needs a token
 * while it runs awaits that same refresh. When it finishes, the in-flight
 * slot is cleared first, then the token is stored, then waiters resume.
 * Failures reach every waiter and leave the cache empty.
 */
export class TokenCache {
  private token: Token | undefined;
  private inFlight: InFlight | undefined;
  private closed = false;
  private initialToken: PendingToken | undefined;

  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly retry: TokenCacheOptions['retry'];

  constructor(
    readonly source: ScopedProvider,
    options: TokenCacheOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.retry = options.retry;
    this.initialToken = options.initialToken;
  }

  getValid(): GetHeaderResult {
    const auth = this.cachedAuth();
    if (auth) return { kind: 'cached', auth };
    return { kind: 'refreshing', promise: this.refresh() };
  }

  /**
   * Resolves with the cached header if it is still valid, otherwise with the
   * result of the shared refresh (started here if none is running).
   */
  refresh(): Promise<ValidAuth> {
    if (this.closed) return Promise.reject(this.closedError());

    const auth = this.cachedAuth();
    if (auth) return Promise.resolve(auth);
    return this.startRefresh();
  }

  /** Drop the cached token; with `startNew`, begin refreshing unless a refresh is already running */
  revoke(startNew: boolean): void {
    this.token = undefined;
    if (startNew && !this.closed && !this.inFlight) {
      this.logger.debug('Token revoked, refreshing', { provider: this.source.name });
      void this.startRefresh();
    }
  }

  /** Abort any running refresh and reject all later requests */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.token = undefined;
    this.initialToken = undefined;
    this.inFlight?.controller.abort(this.closedError());
  }

  state(): TokenCacheState {
    const token = this.token;
    return {
      token: !token ? 'empty' : token.isValid(this.clock()) ? 'valid' : 'expired',
      refreshing: this.inFlight !== undefined,
      closed: this.closed,
      expiresAt: token?.expiresAt,
    };
  }

  private cachedAuth(): ValidAuth | undefined {
    if (this.closed || !this.token) return undefined;
    const validForMs = this.token.validFor(this.clock());
    return validForMs === undefined ? undefined : { header: this.token.header, validForMs };
  }

  private startRefresh(): Promise<ValidAuth> {
    if (this.inFlight) return this.inFlight.promise;

    const controller = new AbortController();
    const promise = this.runRefresh(controller);
    this.inFlight = { promise, controller };

    // revoke() starts refreshes nobody awaits
    promise.catch((error: unknown) => {
      this.logger.warn('Token refresh failed', { provider: this.source.name, error: error instanceof Error ? error.message : String(error) });
    });
    return promise;
  }

  private async runRefresh(controller: AbortController): Promise<ValidAuth> {
    const initial = this.initialToken;
    this.initialToken = undefined;

    let token: Token;
    try {
      token = await refreshWithRetries((attempt, signal) => (attempt === 1 && initial ? initial() : this.source.getToken(signal)), {
        ...this.retry,
        signal: controller.signal,
        logger: this.logger,
        providerName: this.source.name,
      });
    } finally {
      if (this.inFlight?.controller === controller) this.inFlight = undefined;
    }

    if (this.closed) throw this.closedError();

    this.token = token;
    const now = this.clock();
    this.logger.debug('Token refreshed', { provider: this.source.name, expiresAt: token.expiresAt });
    return { header: token.header, validForMs: token.validFor(now) ?? 0 };
  }

  private closedError(): AuthError {
    return new AuthError('Revoked', 'Token cache is closed', { provider: this.source.name });
  }
}
