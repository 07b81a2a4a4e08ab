import type { Scopes } from '../lib/scopes.ts';
import type { Token } from '../lib/token.ts';
import type { ApplicationDefaultProvider } from './application-default.ts';
import type { EmulatorProvider } from './emulator.ts';
import type { GCloudProvider } from './gcloud.ts';
import type { MetadataServerProvider } from './metadata.ts';
import type { ServiceAccountProvider } from './service-account.ts';

/**
 * Every credential source this library can detect.
 * @public
 */
export type Provider = ServiceAccountProvider | MetadataServerProvider | GCloudProvider | ApplicationDefaultProvider | EmulatorProvider;

export type ProviderKind = Provider['kind'];

/** Token request for any provider; every kind takes the scope set and an abort signal */
export function getProviderToken(provider: Provider, scopes: Scopes, signal?: AbortSignal): Promise<Token> {
  return provider.getToken(scopes, signal);
}

/** Whether tokens from `provider` are minted for an explicit scope set */
export function requiresScopes(provider: Provider): boolean {
  return provider.requiresScopes;
}
