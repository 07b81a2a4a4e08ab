import { AuthError } from '../lib/errors.ts';
import { Scopes } from '../lib/scopes.ts';
import type { Token } from '../lib/token.ts';
import { getProviderToken, type Provider, requiresScopes } from './provider.ts';

/**
 * A provider bound to the scope set its tokens are requested for.
 * This is the token source the cache refreshes from.
 */
export class ScopedProvider {
  readonly scopes: Scopes;

  constructor(
    readonly provider: Provider,
    scopes: Scopes | Iterable<string> | string
  ) {
    this.scopes = Scopes.from(scopes);
    if (this.scopes.isEmpty && requiresScopes(provider)) {
      throw new AuthError('CredentialShape', 'At least one scope is required', { provider: provider.name });
    }
  }

  get name(): string {
    return this.provider.name;
  }

  getToken(signal?: AbortSignal): Promise<Token> {
    return getProviderToken(this.provider, this.scopes, signal);
  }

  /** Same provider, different scopes */
  withNewScope(scopes: Scopes | Iterable<string> | string): ScopedProvider {
    return new ScopedProvider(this.provider, scopes);
  }
}
