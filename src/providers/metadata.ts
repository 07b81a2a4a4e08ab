import { AuthError, errorCode, isConnectError } from '../lib/errors.ts';
import { readBody, requestToken } from '../lib/http.ts';
import type { Scopes } from '../lib/scopes.ts';
import type { Token } from '../lib/token.ts';
import { type Clock, type Env, type FetchFn, type Logger, silentLogger } from '../types.ts';

export const DEFAULT_METADATA_HOST = 'metadata.google.internal';
export const DEFAULT_PROBE_TIMEOUT_MS = 3000;

const PROVIDER_NAME = 'metadata server';
const METADATA_HEADERS = { 'Metadata-Flavor': 'Google' };

export interface MetadataServerOptions {
  /** Host (and optional port) of the metadata server */
  host?: string;
  fetch?: FetchFn;
  clock?: Clock;
  logger?: Logger;
}

export interface MetadataProbeOptions extends MetadataServerOptions {
  probeTimeoutMs?: number;
}

/** Token request started during a probe, resolved lazily so a discarded one never rejects unobserved */
export type PendingToken = () => Promise<Token>;

export interface MetadataProbe {
  provider: MetadataServerProvider;
  projectId: string;
  token: PendingToken;
}

/** Metadata host from `GCE_METADATA_HOST`, else the default */
export function metadataHostFromEnv(env: Env): string {
  return env.GCE_METADATA_HOST?.trim() || DEFAULT_METADATA_HOST;
}

/**
 * Tokens for the instance's default service account, from the GCE/GKE/Cloud Run metadata server.
 * The server picks the scopes, so none are sent.
 */
export class MetadataServerProvider {
  readonly kind = 'metadata-server' as const;
  readonly name = PROVIDER_NAME;
  readonly requiresScopes = false;

  readonly host: string;
  private readonly fetch: FetchFn;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: MetadataServerOptions = {}) {
    this.host = options.host ?? DEFAULT_METADATA_HOST;
    this.fetch = options.fetch ?? fetch;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  get tokenUrl(): string {
    return `http://${this.host}/computeMetadata/v1/instance/service-accounts/default/token`;
  }

  get projectIdUrl(): string {
    return `http://${this.host}/computeMetadata/v1/project/project-id`;
  }

  async getToken(_scopes?: Scopes, signal?: AbortSignal): Promise<Token> {
    const token = await requestToken({ fetch: this.fetch, url: this.tokenUrl, init: { headers: METADATA_HEADERS, signal }, provider: PROVIDER_NAME }, this.clock);
    this.logger.debug('Metadata server token issued', { expiresAt: token.expiresAt });
    return token;
  }

  async getProjectId(signal?: AbortSignal): Promise<string> {
    const url = this.projectIdUrl;

    let response: Response;
    try {
      response = await this.fetch(url, { headers: METADATA_HEADERS, signal });
    } catch (error) {
      throw new AuthError('Transport', `Request to ${url} failed`, { provider: PROVIDER_NAME, uri: url, code: errorCode(error), cause: error });
    }

    const body = await readBody(response, url, PROVIDER_NAME);
    if (!response.ok) throw AuthError.fromResponse(url, response.status, body, PROVIDER_NAME);

    const projectId = body.trim();
    if (!projectId) throw new AuthError('BadResponse', `${url} returned an empty project ID`, { provider: PROVIDER_NAME, uri: url, status: response.status });
    return projectId;
  }

  /**
   * Probe the metadata server: resolves undefined when it cannot be reached.
   * The project-id lookup and a first token request run concurrently; the
   * token request is handed back so the cache can use it as its first refresh.
   */
  static async tryLoad(options: MetadataProbeOptions = {}): Promise<MetadataProbe | undefined> {
    const provider = new MetadataServerProvider(options);
    const logger = options.logger ?? silentLogger;

    // aborted when the probe gives up
    const tokenRequest = new AbortController();
    const settled = provider.getToken(undefined, tokenRequest.signal).then(
      (token) => ({ ok: true as const, token }),
      (error: unknown) => ({ ok: false as const, error })
    );
    const token: PendingToken = async () => {
      const result = await settled;
      if (result.ok) return result.token;
      throw result.error;
    };

    let projectId: string;
    try {
      projectId = await provider.getProjectId(AbortSignal.timeout(options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS));
    } catch (error) {
      tokenRequest.abort(error);
      if (isConnectError(error)) {
        logger.debug('Metadata server not reachable', { host: provider.host, code: errorCode(error) });
        return undefined;
      }
      throw error;
    }

    return { provider, projectId, token };
  }
}
