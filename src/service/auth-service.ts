import { ServiceError } from '../lib/errors.ts';
import { type HeaderSource, type HttpService, type Layer, type Logger, silentLogger } from '../types.ts';

/** Statuses that mean the server rejected our credentials */
export const REJECTED_STATUSES: ReadonlySet<number> = new Set([401, 403]);

export interface AuthServiceOptions {
  logger?: Logger;
}

/**
 * Wraps an inner service so every request carries a current
 * `Authorization` header.
 *
 * Each call first resolves a header (immediately when cached, otherwise by
 * awaiting the shared refresh), then forwards the request. A 401 or 403
 * response drops the cached token and starts a refresh, and is still
 * returned to the caller as is.
 */
export class AuthService {
  private readonly logger: Logger;

  constructor(
    private readonly auth: HeaderSource,
    private readonly inner: HttpService,
    options: AuthServiceOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async call(request: Request): Promise<Response> {
    let header: string;
    try {
      const result = this.auth.getHeader();
      header = result.kind === 'cached' ? result.auth.header : (await result.promise).header;
    } catch (error) {
      throw new ServiceError('auth', error);
    }

    const authorized = new Request(request);
    authorized.headers.set('authorization', header);

    let response: Response;
    try {
      response = await this.inner(authorized);
    } catch (error) {
      throw new ServiceError('service', error);
    }

    if (REJECTED_STATUSES.has(response.status)) {
      this.logger.warn('Credentials rejected, refreshing token', { status: response.status, url: request.url });
      this.auth.revoke(true);
    }
    return response;
  }

  /** This service as a plain function */
  toService(): HttpService {
    return (request) => this.call(request);
  }
}

/** {@link AuthService} as a {@link Layer} */
export function authLayer(auth: HeaderSource, options: AuthServiceOptions = {}): Layer {
  return (inner) => new AuthService(auth, inner, options).toService();
}
