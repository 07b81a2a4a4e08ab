import { type gaxios, OAuth2Client } from 'google-auth-library';
import { type DetectedProvider, type DetectOptions, detectProvider } from './detect.ts';
import { AuthError } from './lib/errors.ts';
import type { RetryPolicy } from './lib/refresh-driver.ts';
import { Scopes } from './lib/scopes.ts';
import { TokenCache, type TokenCacheOptions, type TokenCacheState } from './lib/token-cache.ts';
import { DEFAULT_EMULATOR_PROJECT, EmulatorProvider } from './providers/emulator.ts';
import { GCloudProvider } from './providers/gcloud.ts';
import { MetadataServerProvider, metadataHostFromEnv, type PendingToken } from './providers/metadata.ts';
import type { Provider } from './providers/provider.ts';
import { ScopedProvider } from './providers/scoped.ts';
import { type ServiceAccountOptions, ServiceAccountProvider } from './providers/service-account.ts';
import { authLayer, REJECTED_STATUSES } from './service/auth-service.ts';
import { parseConfig } from './setup/config.ts';
import { type GetHeaderResult, type HeaderSource, type Layer, type Logger, silentLogger } from './types.ts';

export type ScopesInput = Scopes | Iterable<string> | string;

export interface AuthOptions extends DetectOptions {
  /** Scopes requested from providers that take them; defaults to GCP_AUTH_SCOPES or cloud-platform */
  scopes?: ScopesInput;
  retry?: Omit<RetryPolicy, 'signal' | 'logger' | 'providerName'>;
}

/**
 * Authentication handle: a detected provider, its project ID and one shared
 * token cache. Cheap to pass around; every consumer shares the same token.
 *
 * @example
 * ```typescript
 * const auth = await Auth.detect();
 * const gcsFetch = authorizedFetch(auth);
 * const res = await gcsFetch(`https://storage.googleapis.com/storage/v1/b?project=${auth.projectId}`);
 * ```
 */
export class Auth implements HeaderSource {
  private constructor(
    private readonly cache: TokenCache,
    readonly projectId: string,
    private readonly options: AuthOptions
  ) {}

  /** Detect credentials from the environment (see {@link detectProvider}) */
  static detect(options: AuthOptions = {}): Promise<Auth> {
    return new AuthBuilder(options).detect();
  }

  static fromProvider(provider: Provider, projectId: string, options: AuthOptions = {}, initialToken?: PendingToken): Auth {
    const scoped = new ScopedProvider(provider, options.scopes ?? parseConfig(options.env ?? process.env).scopes);
    return new Auth(new TokenCache(scoped, cacheOptions(options, initialToken)), projectId, options);
  }

  static async fromServiceAccountFile(path: string, options: AuthOptions & Pick<ServiceAccountOptions, 'subject'> = {}): Promise<Auth> {
    const provider = await ServiceAccountProvider.fromFile(path, options);
    return Auth.fromProvider(provider, provider.projectId, options);
  }

  static async fromServiceAccountKey(key: string | object, options: AuthOptions & Pick<ServiceAccountOptions, 'subject'> = {}): Promise<Auth> {
    const provider = await ServiceAccountProvider.fromKey(key, options);
    return Auth.fromProvider(provider, provider.projectId, options);
  }

  static async fromMetadataServer(options: AuthOptions = {}): Promise<Auth> {
    const env = options.env ?? process.env;
    const probe = await MetadataServerProvider.tryLoad({ ...options, host: metadataHostFromEnv(env) });
    if (!probe) throw new AuthError('NoProviderFound', 'Metadata server is not reachable', { provider: 'metadata server' });
    return Auth.fromProvider(probe.provider, probe.projectId, options, probe.token);
  }

  static async fromGCloud(options: AuthOptions = {}): Promise<Auth> {
    const probe = await GCloudProvider.tryLoad({ runner: options.commandRunner, clock: options.clock, logger: options.logger });
    if (!probe) throw new AuthError('NoProviderFound', 'gcloud is not installed', { provider: 'gcloud' });
    return Auth.fromProvider(probe.provider, probe.projectId, options);
  }

  static emulator(projectId: string = DEFAULT_EMULATOR_PROJECT, options: AuthOptions = {}): Auth {
    return Auth.fromProvider(new EmulatorProvider(), projectId, options);
  }

  get provider(): Provider {
    return this.cache.source.provider;
  }

  get providerName(): string {
    return this.cache.source.name;
  }

  get scopes(): Scopes {
    return Scopes.from(this.cache.source.scopes);
  }

  getHeader(): GetHeaderResult {
    return this.cache.getValid();
  }

  /** Current `Authorization` header value, waiting for a refresh if needed */
  async header(): Promise<string> {
    const result = this.cache.getValid();
    return result.kind === 'cached' ? result.auth.header : (await result.promise).header;
  }

  /** Forget the cached token, e.g. after the server rejected it */
  revoke(startNew = true): void {
    this.cache.revoke(startNew);
  }

  /** New handle over the same provider with `added` merged into the scope set; it has its own cache */
  withScopes(added: ScopesInput): Auth {
    const scoped = this.cache.source.withNewScope(Scopes.union(this.cache.source.scopes, Scopes.from(added)));
    return new Auth(new TokenCache(scoped, cacheOptions(this.options)), this.projectId, this.options);
  }

  state(): TokenCacheState {
    return this.cache.state();
  }

  close(): void {
    this.cache.close();
  }

  layer(): Layer {
    return authLayer(this, { logger: this.options.logger });
  }

  /**
   * `OAuth2Client` backed by this handle's cache, for googleapis clients.
   *
   * @example
   * ```typescript
   * const storage = google.storage({ version: 'v1', auth: auth.toAuthClient() });
   * ```
   */
  toAuthClient(): OAuth2Client {
    return new CachedTokenClient(this, this.options.logger ?? silentLogger);
  }
}

class CachedTokenClient extends OAuth2Client {
  constructor(
    private readonly tokenSource: Auth,
    private readonly log: Logger
  ) {
    super();
  }

  protected override async getRequestMetadataAsync(_url?: string | null) {
    const header = await this.headerOrLog();
    return { headers: { Authorization: header } };
  }

  override async getAccessToken() {
    const header = await this.headerOrLog();
    return { token: header.slice('Bearer '.length) };
  }

  /** A 401 or 403 from the API drops the shared token */
  protected override async requestAsync<T>(opts: gaxios.GaxiosOptions, reAuthRetried = false): Promise<gaxios.GaxiosResponse<T>> {
    try {
      return await super.requestAsync<T>(opts, reAuthRetried);
    } catch (error) {
      const status = responseStatus(error);
      if (status !== undefined && REJECTED_STATUSES.has(status)) {
        this.log.warn('Credentials rejected, refreshing token', { status, url: opts.url === undefined ? undefined : String(opts.url) });
        this.tokenSource.revoke(true);
      }
      throw error;
    }
  }

  private async headerOrLog(): Promise<string> {
    try {
      return await this.tokenSource.header();
    } catch (error) {
      this.log.error('Failed to get access token for API request', { provider: this.tokenSource.providerName, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }
}

/** `response.status` of a gaxios request error */
function responseStatus(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('response' in error)) return undefined;
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('status' in response)) return undefined;
  return typeof response.status === 'number' ? response.status : undefined;
}

/**
 * Detection entry point.
 *
 * @example
 * ```typescript
 * const auth = await new AuthBuilder({ scopes: [Scope.BIG_QUERY] }).detect();
 * ```
 */
export class AuthBuilder {
  constructor(private readonly options: AuthOptions = {}) {}

  detectProvider(): Promise<DetectedProvider> {
    return detectProvider(this.options);
  }

  async detect(): Promise<Auth> {
    const found = await this.detectProvider();
    return Auth.fromProvider(found.provider, found.projectId, this.options, found.token);
  }
}

/** GCP_AUTH_MAX_RETRIES applies unless `retry.maxRetries` is given */
function cacheOptions(options: AuthOptions, initialToken?: PendingToken): TokenCacheOptions {
  const maxRetries = options.retry?.maxRetries ?? parseConfig(options.env ?? process.env).maxRetries;
  return { clock: options.clock, logger: options.logger, retry: { ...options.retry, maxRetries }, initialToken };
}
