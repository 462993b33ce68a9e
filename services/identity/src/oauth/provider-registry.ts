import type { Env } from '../env';
import type { ResolvedProfile } from '../domain/models';
import { AppleIdentityResolver, type AppleKeySource } from './apple-resolver';
import { FacebookIdentityResolver } from './facebook-resolver';
import { GitHubIdentityResolver } from './github-resolver';
import { GoogleIdentityResolver } from './google-resolver';
import type { FetchFn } from './http';

/**
 * Turns a client-supplied provider credential into verified profile attributes.
 * Implementations reject with OAuthResolutionError when the credential is
 * invalid or the provider cannot be reached.
 */
export interface OAuthIdentityResolver {
  readonly provider: string;
  readonly scope: string;
  readonly clientId: string | null;
  resolve(credential: string): Promise<ResolvedProfile>;
}

export interface ProviderDescription {
  provider: string;
  clientId: string;
  redirectUrl: string;
  scope: string;
}

export class OAuthProviderRegistry {
  private readonly resolvers = new Map<string, OAuthIdentityResolver>();

  constructor(resolvers: Iterable<OAuthIdentityResolver> = []) {
    for (const resolver of resolvers) {
      this.register(resolver);
    }
  }

  register(resolver: OAuthIdentityResolver) {
    if (this.resolvers.has(resolver.provider)) {
      throw new Error(`OAuth provider "${resolver.provider}" is already registered`);
    }
    this.resolvers.set(resolver.provider, resolver);
    return this;
  }

  get(provider: string): OAuthIdentityResolver | null {
    return this.resolvers.get(provider) ?? null;
  }

  has(provider: string) {
    return this.resolvers.has(provider);
  }

  list(): string[] {
    return [...this.resolvers.keys()];
  }

  /** Providers a client can start a sign-in with, i.e. those with a client id. */
  describe(redirectUrl: string): ProviderDescription[] {
    const descriptions: ProviderDescription[] = [];
    for (const resolver of this.resolvers.values()) {
      if (resolver.clientId) {
        descriptions.push({
          provider: resolver.provider,
          clientId: resolver.clientId,
          redirectUrl,
          scope: resolver.scope,
        });
      }
    }
    return descriptions;
  }
}

export type ProviderRegistryEnv = Pick<
  Env,
  'OAUTH_PROVIDERS' | 'GOOGLE_CLIENT_ID' | 'FACEBOOK_CLIENT_ID' | 'GITHUB_CLIENT_ID' | 'APPLE_CLIENT_ID'
>;

export interface CreateProviderRegistryOptions {
  fetchFn?: FetchFn;
  appleKeys?: AppleKeySource;
}

/**
 * Builds the registry for the providers enabled in configuration. Apple is
 * skipped without APPLE_CLIENT_ID, since its ID tokens are checked against it.
 */
export function createProviderRegistry(
  env: ProviderRegistryEnv,
  options: CreateProviderRegistryOptions = {},
) {
  const fetchFn = options.fetchFn ?? fetch;
  const registry = new OAuthProviderRegistry();

  for (const provider of env.OAUTH_PROVIDERS) {
    switch (provider) {
      case 'google':
        registry.register(new GoogleIdentityResolver({ clientId: env.GOOGLE_CLIENT_ID, fetchFn }));
        break;
      case 'facebook':
        registry.register(
          new FacebookIdentityResolver({ clientId: env.FACEBOOK_CLIENT_ID, fetchFn }),
        );
        break;
      case 'github':
        registry.register(new GitHubIdentityResolver({ clientId: env.GITHUB_CLIENT_ID, fetchFn }));
        break;
      case 'apple':
        if (env.APPLE_CLIENT_ID) {
          registry.register(
            new AppleIdentityResolver({ clientId: env.APPLE_CLIENT_ID, keys: options.appleKeys }),
          );
        }
        break;
      default:
        throw new Error(`No resolver is available for OAuth provider "${provider}"`);
    }
  }

  return registry;
}
