import { promises as fs } from 'fs';
import { importPKCS8, type KeyLike, SignJWT } from 'jose';
import { AuthError, errorCode } from '../lib/errors.ts';
import { formPost, requestToken } from '../lib/http.ts';
import type { Scopes } from '../lib/scopes.ts';
import type { Token } from '../lib/token.ts';
import { type ServiceAccountKey, ServiceAccountKeySchema } from '../schemas/index.ts';
import { type Clock, type FetchFn, type Logger, type ReadFileFn, silentLogger } from '../types.ts';

const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const ASSERTION_LIFETIME_S = 3600;
const PROVIDER_NAME = 'service account';

/**
 * Service Account Provider Configuration
 */
export interface ServiceAccountOptions {
  fetch?: FetchFn;
  clock?: Clock;
  readFile?: ReadFileFn;
  logger?: Logger;
  /** User to impersonate through domain-wide delegation (`sub` claim) */
  subject?: string;
}

export const readUtf8File: ReadFileFn = (path) => fs.readFile(path, 'utf-8');

/**
 * ServiceAccountProvider mints tokens with a self-signed JWT (2-legged OAuth).
 *
 * The private key is imported once at load; every token request signs a new
 * assertion and exchanges it at the key's `token_uri`.
 *
 * @example
 * ```typescript
 * const provider = await ServiceAccountProvider.fromFile('/path/to/key.json');
 * const token = await provider.getToken(Scopes.CLOUD_PLATFORM_ADMIN);
 * ```
 */
export class ServiceAccountProvider {
  readonly kind = 'service-account' as const;
  readonly name = PROVIDER_NAME;
  readonly requiresScopes = true;

  private readonly fetch: FetchFn;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly subject: string | undefined;

  private constructor(
    readonly key: ServiceAccountKey,
    private readonly signingKey: KeyLike,
    options: ServiceAccountOptions
  ) {
    this.fetch = options.fetch ?? fetch;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.subject = options.subject;
  }

  /**
   * Load a key file from disk.
   * Missing or unreadable files, malformed JSON and rejected keys are fatal `CredentialShape`/`Crypto` errors.
   */
  static async fromFile(path: string, options: ServiceAccountOptions = {}): Promise<ServiceAccountProvider> {
    const readFile = options.readFile ?? readUtf8File;

    let contents: string;
    try {
      contents = await readFile(path);
    } catch (error) {
      const code = errorCode(error);
      const reason = code === 'ENOENT' ? 'not found' : code === 'EACCES' ? 'not readable (permission denied)' : 'could not be read';
      throw new AuthError('CredentialShape', `Service account key file ${reason}: ${path}`, { provider: PROVIDER_NAME, code, cause: error });
    }

    return ServiceAccountProvider.fromKey(contents, options, path);
  }

  /** Load a key from its JSON text or an already parsed object */
  static async fromKey(key: string | object, options: ServiceAccountOptions = {}, source = 'service account key'): Promise<ServiceAccountProvider> {
    let data: unknown = key;
    if (typeof key === 'string') {
      try {
        data = JSON.parse(key);
      } catch (error) {
        throw new AuthError('CredentialShape', `Failed to parse ${source} as JSON`, { provider: PROVIDER_NAME, cause: error });
      }
    }

    const parsed = ServiceAccountKeySchema.safeParse(data);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
      throw new AuthError('CredentialShape', `Invalid ${source}: check ${[...new Set(fields)].join(', ')}`, { provider: PROVIDER_NAME, cause: parsed.error });
    }

    let signingKey: KeyLike;
    try {
      signingKey = await importPKCS8(parsed.data.private_key, 'RS256');
    } catch (error) {
      throw new AuthError('Crypto', `Private key in ${source} is not a PKCS#8 RSA key`, { provider: PROVIDER_NAME, cause: error });
    }

    return new ServiceAccountProvider(parsed.data, signingKey, options);
  }

  get projectId(): string {
    return this.key.project_id;
  }

  get clientEmail(): string {
    return this.key.client_email;
  }

  /**
   * Signed JWT assertion for `scopes`, issued at `now` (ms since epoch).
   * RS256 signatures are deterministic, so equal inputs give equal strings.
   */
  async buildAssertion(scopes: Scopes, now: number): Promise<string> {
    const iat = Math.floor(now / 1000);
    const claims: Record<string, string | number> = {
      iss: this.key.client_email,
      scope: scopes.encode(),
      aud: this.key.token_uri,
      iat,
      exp: iat + ASSERTION_LIFETIME_S,
    };
    if (this.subject) claims.sub = this.subject;

    try {
      return await new SignJWT(claims).setProtectedHeader({ alg: 'RS256', typ: 'JWT', kid: this.key.private_key_id }).sign(this.signingKey);
    } catch (error) {
      throw new AuthError('Crypto', 'Failed to sign JWT assertion', { provider: PROVIDER_NAME, cause: error });
    }
  }

  async getToken(scopes: Scopes, signal?: AbortSignal): Promise<Token> {
    const assertion = await this.buildAssertion(scopes, this.clock());
    const token = await requestToken(
      {
        fetch: this.fetch,
        url: this.key.token_uri,
        init: formPost({ grant_type: JWT_BEARER_GRANT, assertion }, signal),
        provider: PROVIDER_NAME,
      },
      this.clock
    );

    this.logger.debug('Service account token issued', { clientEmail: this.key.client_email, expiresAt: token.expiresAt });
    return token;
  }
}
