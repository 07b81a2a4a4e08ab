import { Scope, Scopes } from '../lib/scopes.ts';
import { DEFAULT_METADATA_HOST, DEFAULT_PROBE_TIMEOUT_MS } from '../providers/metadata.ts';
import { emulatorHostVariables } from '../providers/emulator.ts';
import { EnvSchema } from '../schemas/index.ts';
import type { Env } from '../types.ts';

/**
 * Settings read from the environment.
 * Every field can also be passed to `AuthBuilder` directly.
 */
export interface AuthConfig {
  /** GOOGLE_APPLICATION_CREDENTIALS */
  credentialsFile?: string;
  /** GOOGLE_CLOUD_PROJECT, else GCLOUD_PROJECT */
  projectId?: string;
  /** GCE_METADATA_HOST */
  metadataHost: string;
  /** GCP_AUTH_SCOPES (space or comma separated), default cloud-platform */
  scopes: Scopes;
  /** GCP_AUTH_MAX_RETRIES */
  maxRetries?: number;
  /** GCP_AUTH_METADATA_TIMEOUT_MS */
  metadataTimeoutMs: number;
  /** Set `*_EMULATOR_HOST` variables, sorted */
  emulatorHosts: string[];
}

/**
 * Parse the environment into an {@link AuthConfig}.
 *
 * @throws Error naming the offending variable when a value is malformed
 */
export function parseConfig(env: Env = process.env): AuthConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue ? issue.path.join('.') : 'environment';
    throw new Error(`Environment variable ${name} is invalid: ${issue ? issue.message : parsed.error.message}`);
  }

  const vars = parsed.data;
  const scopes = vars.GCP_AUTH_SCOPES ? Scopes.parse(vars.GCP_AUTH_SCOPES.replace(/,/g, ' ')) : new Scopes([Scope.CLOUD_PLATFORM]);

  return {
    credentialsFile: vars.GOOGLE_APPLICATION_CREDENTIALS,
    projectId: vars.GOOGLE_CLOUD_PROJECT ?? vars.GCLOUD_PROJECT,
    metadataHost: vars.GCE_METADATA_HOST ?? DEFAULT_METADATA_HOST,
    scopes,
    maxRetries: vars.GCP_AUTH_MAX_RETRIES,
    metadataTimeoutMs: vars.GCP_AUTH_METADATA_TIMEOUT_MS ?? DEFAULT_PROBE_TIMEOUT_MS,
    emulatorHosts: emulatorHostVariables(env),
  };
}
