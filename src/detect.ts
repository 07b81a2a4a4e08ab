import { AuthError } from './lib/errors.ts';
import { ApplicationDefaultProvider } from './providers/application-default.ts';
import { EmulatorProvider } from './providers/emulator.ts';
import { GCloudProvider } from './providers/gcloud.ts';
import { MetadataServerProvider, type PendingToken } from './providers/metadata.ts';
import type { Provider } from './providers/provider.ts';
import { readUtf8File, ServiceAccountProvider } from './providers/service-account.ts';
import { parseConfig } from './setup/config.ts';
import { type Clock, type CommandRunner, type Env, type FetchFn, type Logger, type ReadFileFn, silentLogger } from './types.ts';

export interface DetectOptions {
  /** Defaults to process.env */
  env?: Env;
  fetch?: FetchFn;
  commandRunner?: CommandRunner;
  readFile?: ReadFileFn;
  logger?: Logger;
  clock?: Clock;
  /** Metadata probe timeout; defaults to GCP_AUTH_METADATA_TIMEOUT_MS or 3 s */
  probeTimeoutMs?: number;
  platform?: NodeJS.Platform;
}

/**
 * Result of credential detection.
 * `token` is a token request the metadata probe already started.
 */
export interface DetectedProvider {
  provider: Provider;
  projectId: string;
  token?: PendingToken;
}

interface Probe {
  name: string;
  load: () => Promise<DetectedProvider | undefined>;
}

/**
 * Find the first usable credential source, in order: emulator, service
 * account key from `GOOGLE_APPLICATION_CREDENTIALS`, metadata server, gcloud
 * CLI, application-default credentials.
 *
 * A probe that throws is logged and skipped.
 *
 * @throws AuthError `NoProviderFound` when every probe comes up empty
 */
export async function detectProvider(options: DetectOptions = {}): Promise<DetectedProvider> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? silentLogger;
  const config = parseConfig(env);
  const probeTimeoutMs = options.probeTimeoutMs ?? config.metadataTimeoutMs;

  const probes: Probe[] = [
    { name: 'emulator', load: async () => EmulatorProvider.tryLoad(env) },
    { name: 'service account', load: () => loadServiceAccountFromEnv(config.credentialsFile, options) },
    {
      name: 'metadata server',
      load: () => MetadataServerProvider.tryLoad({ host: config.metadataHost, fetch: options.fetch, clock: options.clock, logger: options.logger, probeTimeoutMs }),
    },
    { name: 'gcloud', load: () => GCloudProvider.tryLoad({ runner: options.commandRunner, clock: options.clock, logger: options.logger }) },
    {
      name: 'application default',
      load: () =>
        ApplicationDefaultProvider.tryLoad({
          env,
          fetch: options.fetch,
          clock: options.clock,
          readFile: options.readFile,
          logger: options.logger,
          platform: options.platform,
          skipMetadata: true,
        }),
    },
  ];

  const failures: string[] = [];
  for (const probe of probes) {
    let found: DetectedProvider | undefined;
    try {
      found = await probe.load();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Credential probe failed', { provider: probe.name, error: message });
      failures.push(`${probe.name}: ${message}`);
      continue;
    }

    if (found) {
      logger.info('Using Google Cloud credentials', { provider: found.provider.name, projectId: found.projectId });
      return found;
    }
    logger.debug('Credential source not available', { provider: probe.name });
  }

  const detail = failures.length > 0 ? ` (${failures.join('; ')})` : '';
  throw new AuthError('NoProviderFound', `No Google Cloud credentials found${detail}`);
}

/**
 * Service-account key named by GOOGLE_APPLICATION_CREDENTIALS.
 * Other credential types in that file are left to the application-default probe.
 */
async function loadServiceAccountFromEnv(path: string | undefined, options: DetectOptions): Promise<DetectedProvider | undefined> {
  if (!path) return undefined;

  const readFile = options.readFile ?? readUtf8File;
  let contents: string;
  try {
    contents = await readFile(path);
  } catch (error) {
    throw new AuthError('CredentialShape', `Could not read GOOGLE_APPLICATION_CREDENTIALS file ${path}`, { provider: 'service account', cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(contents);
  } catch (error) {
    throw new AuthError('CredentialShape', `Failed to parse ${path} as JSON`, { provider: 'service account', cause: error });
  }

  if (typeof data !== 'object' || data === null) {
    throw new AuthError('CredentialShape', `${path} must contain a JSON object`, { provider: 'service account' });
  }
  if ('type' in data && data.type !== 'service_account') return undefined;

  const provider = await ServiceAccountProvider.fromKey(data, { fetch: options.fetch, clock: options.clock, logger: options.logger }, path);
  return { provider, projectId: provider.projectId };
}
