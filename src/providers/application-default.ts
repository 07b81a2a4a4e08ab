import { join } from 'path';
import { AuthError, errorCode } from '../lib/errors.ts';
import { formPost, requestJson, requestToken } from '../lib/http.ts';
import type { Scopes } from '../lib/scopes.ts';
import { Token } from '../lib/token.ts';
import { type AuthorizedUser, type CredentialFile, CredentialFileSchema, ImpersonationResponseSchema } from '../schemas/index.ts';
import { type Clock, type Env, type FetchFn, type Logger, type ReadFileFn, silentLogger } from '../types.ts';
import { MetadataServerProvider, metadataHostFromEnv, type PendingToken } from './metadata.ts';
import { readUtf8File, ServiceAccountProvider } from './service-account.ts';

export const OAUTH_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const ADC_FILE_NAME = 'application_default_credentials.json';
const IMPERSONATION_LIFETIME = '3600s';
const PROVIDER_NAME = 'application default';

export interface ApplicationDefaultOptions {
  env?: Env;
  fetch?: FetchFn;
  clock?: Clock;
  readFile?: ReadFileFn;
  logger?: Logger;
  /** Skip the metadata-server fallback (detection has already probed it) */
  skipMetadata?: boolean;
  probeTimeoutMs?: number;
  platform?: NodeJS.Platform;
}

/** `authorized_user` credentials: exchanges a refresh token at the OAuth token endpoint */
export class AuthorizedUserCredentials {
  readonly type = 'authorized_user' as const;
  readonly requiresScopes = false;

  constructor(
    private readonly credentials: Pick<AuthorizedUser, 'client_id' | 'client_secret' | 'refresh_token'>,
    private readonly fetch: FetchFn,
    private readonly clock: Clock,
    private readonly tokenUrl = OAUTH_TOKEN_URL
  ) {}

  getToken(_scopes?: Scopes, signal?: AbortSignal): Promise<Token> {
    const { client_id, client_secret, refresh_token } = this.credentials;
    return requestToken(
      {
        fetch: this.fetch,
        url: this.tokenUrl,
        init: formPost({ grant_type: 'refresh_token', client_id, client_secret, refresh_token }, signal),
        provider: PROVIDER_NAME,
      },
      this.clock
    );
  }
}

/**
 * `impersonated_service_account` credentials: a user token from the source
 * credentials is traded for a service-account token via IAM Credentials.
 */
export class ImpersonatedCredentials {
  readonly type = 'impersonated_service_account' as const;
  readonly requiresScopes = true;

  constructor(
    private readonly source: AuthorizedUserCredentials,
    readonly impersonationUrl: string,
    readonly delegates: readonly string[],
    private readonly fetch: FetchFn,
    private readonly clock: Clock
  ) {}

  async getToken(scopes: Scopes, signal?: AbortSignal): Promise<Token> {
    const sourceToken = await this.source.getToken(undefined, signal);
    const body = await requestJson(
      {
        fetch: this.fetch,
        url: this.impersonationUrl,
        init: {
          method: 'POST',
          headers: { Authorization: sourceToken.header, 'Content-Type': 'application/json' },
          body: JSON.stringify({ delegates: this.delegates, scope: scopes.toArray(), lifetime: IMPERSONATION_LIFETIME }),
          signal,
        },
        provider: PROVIDER_NAME,
      },
      ImpersonationResponseSchema
    );
    return new Token(body.accessToken, this.clock(), Date.parse(body.expireTime));
  }
}

export type ApplicationDefaultSource = ServiceAccountProvider | AuthorizedUserCredentials | ImpersonatedCredentials | MetadataServerProvider;

export interface ApplicationDefaultProbe {
  provider: ApplicationDefaultProvider;
  projectId: string;
  token?: PendingToken;
}

/**
 * Project embedded in an impersonation URL's service-account email
 * (`...serviceAccounts/name@PROJECT.iam.gserviceaccount.com:generateAccessToken`).
 */
export function projectFromImpersonationUrl(url: string): string | undefined {
  const at = url.indexOf('@');
  if (at === -1) return undefined;
  const rest = url.slice(at + 1);
  const dot = rest.indexOf('.');
  return dot > 0 ? rest.slice(0, dot) : undefined;
}

/** Path of the gcloud user-config credential file */
export function userConfigCredentialsPath(env: Env, platform: NodeJS.Platform = process.platform): string | undefined {
  if (env.CLOUDSDK_CONFIG) return join(env.CLOUDSDK_CONFIG, ADC_FILE_NAME);
  if (platform === 'win32') return env.APPDATA ? join(env.APPDATA, 'gcloud', ADC_FILE_NAME) : undefined;
  return env.HOME ? join(env.HOME, '.config', 'gcloud', ADC_FILE_NAME) : undefined;
}

/** Project ID from the environment, if set */
export function projectFromEnv(env: Env): string | undefined {
  return env.GOOGLE_CLOUD_PROJECT?.trim() || env.GCLOUD_PROJECT?.trim() || undefined;
}

/**
 * Application-default credentials: the `GOOGLE_APPLICATION_CREDENTIALS`
 * file, the gcloud user-config file, then the metadata server.
 */
export class ApplicationDefaultProvider {
  readonly kind = 'application-default' as const;
  readonly name = PROVIDER_NAME;

  constructor(readonly source: ApplicationDefaultSource) {}

  get requiresScopes(): boolean {
    return this.source.requiresScopes;
  }

  getToken(scopes: Scopes, signal?: AbortSignal): Promise<Token> {
    return this.source.getToken(scopes, signal);
  }

  /** Build a provider from a parsed credential file. Throws `CredentialShape` when no project ID can be found. */
  static async fromCredentialFile(data: unknown, options: ApplicationDefaultOptions = {}, source = 'credential file'): Promise<{ provider: ApplicationDefaultProvider; projectId: string }> {
    const fetchFn = options.fetch ?? fetch;
    const clock = options.clock ?? Date.now;
    const env = options.env ?? process.env;

    const parsed = CredentialFileSchema.safeParse(data);
    if (!parsed.success) {
      const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.') || '(root)'))];
      throw new AuthError('CredentialShape', `Invalid ${source}: check ${fields.join(', ')}`, { provider: PROVIDER_NAME, cause: parsed.error });
    }

    const file = parsed.data;
    const inner = await buildSource(file, fetchFn, clock, options, source);
    const projectId = projectFromFile(file) ?? projectFromEnv(env);
    if (!projectId) throw new AuthError('CredentialShape', `No project ID found in ${source}; set GOOGLE_CLOUD_PROJECT`, { provider: PROVIDER_NAME });

    return { provider: new ApplicationDefaultProvider(inner), projectId };
  }

  /** Resolves undefined when no credential file exists and the metadata server is unreachable (or skipped) */
  static async tryLoad(options: ApplicationDefaultOptions = {}): Promise<ApplicationDefaultProbe | undefined> {
    const env = options.env ?? process.env;
    const logger = options.logger ?? silentLogger;

    const explicitPath = env.GOOGLE_APPLICATION_CREDENTIALS?.trim();
    if (explicitPath) {
      const contents = await readCredentialFile(explicitPath, options, true);
      if (contents !== undefined) return ApplicationDefaultProvider.fromCredentialFile(parseJson(contents, explicitPath), options, explicitPath);
    }

    const userPath = userConfigCredentialsPath(env, options.platform);
    if (userPath) {
      const contents = await readCredentialFile(userPath, options, false);
      if (contents !== undefined) return ApplicationDefaultProvider.fromCredentialFile(parseJson(contents, userPath), options, userPath);
      logger.debug('No user-config credential file', { path: userPath });
    }

    if (options.skipMetadata) return undefined;

    const probe = await MetadataServerProvider.tryLoad({
      host: metadataHostFromEnv(env),
      fetch: options.fetch,
      clock: options.clock,
      logger: options.logger,
      probeTimeoutMs: options.probeTimeoutMs,
    });
    if (!probe) return undefined;
    return { provider: new ApplicationDefaultProvider(probe.provider), projectId: probe.projectId, token: probe.token };
  }
}

async function buildSource(file: CredentialFile, fetchFn: FetchFn, clock: Clock, options: ApplicationDefaultOptions, source: string): Promise<ApplicationDefaultSource> {
  switch (file.type) {
    case 'service_account':
      return ServiceAccountProvider.fromKey(file, { fetch: fetchFn, clock, logger: options.logger }, source);
    case 'authorized_user':
      return new AuthorizedUserCredentials(file, fetchFn, clock);
    case 'impersonated_service_account': {
      const user = new AuthorizedUserCredentials(file.source_credentials, fetchFn, clock);
      return new ImpersonatedCredentials(user, file.service_account_impersonation_url, file.delegates, fetchFn, clock);
    }
  }
}

function projectFromFile(file: CredentialFile): string | undefined {
  switch (file.type) {
    case 'service_account':
      return file.project_id;
    case 'authorized_user':
      return file.quota_project_id;
    case 'impersonated_service_account':
      return file.quota_project_id ?? file.source_credentials.quota_project_id ?? projectFromImpersonationUrl(file.service_account_impersonation_url);
  }
}

/** File contents, or undefined when the file does not exist and `required` is false */
async function readCredentialFile(path: string, options: ApplicationDefaultOptions, required: boolean): Promise<string | undefined> {
  const readFile = options.readFile ?? readUtf8File;
  try {
    return await readFile(path);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' && !required) return undefined;
    throw new AuthError('CredentialShape', `Could not read credential file ${path}${code ? ` (${code})` : ''}`, { provider: PROVIDER_NAME, code, cause: error });
  }
}

function parseJson(contents: string, path: string): unknown {
  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new AuthError('CredentialShape', `Failed to parse ${path} as JSON`, { provider: PROVIDER_NAME, cause: error });
  }
}
