import { vi } from 'vitest';

import type { Env } from '../src/env';
import type { ResolvedProfile } from '../src/domain/models';
import { PasswordHasher } from '../src/lib/password-hasher';
import { SessionTokenCodec } from '../src/lib/session-token';
import { OAuthResolutionError } from '../src/oauth/errors';
import {
  OAuthProviderRegistry,
  type OAuthIdentityResolver,
} from '../src/oauth/provider-registry';
import { AccountLinkingService } from '../src/services/account-linking-service';
import { AuthService } from '../src/services/auth-service';
import { InMemoryIdentityRepository } from './in-memory-identity-repository';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';

export function buildTestEnv(overrides: Partial<Env> = {}): Env {
  return {
    NODE_ENV: 'test',
    PORT: 8001,
    HOST: '127.0.0.1',
    DATABASE_URL: 'postgres://localhost:5432/test',
    LOG_LEVEL: 'silent',
    JWT_SECRET: TEST_SECRET,
    JWT_ISSUER: 'wardrobe-identity',
    JWT_AUDIENCE: 'wardrobe-app',
    ACCESS_TOKEN_EXPIRE_MINUTES: 30,
    PASSWORD_HASH_TIME_COST: 2,
    MIN_USERNAME_LENGTH: 3,
    MIN_PASSWORD_LENGTH: 8,
    USERNAME_MAX_ATTEMPTS: 100,
    OAUTH_LINK_MAX_ATTEMPTS: 3,
    OAUTH_PROVIDERS: ['google', 'github'],
    OAUTH_REDIRECT_URL: 'http://localhost:8001/api/v1/auth/oauth/callback',
    GOOGLE_CLIENT_ID: 'google-client-id',
    FACEBOOK_CLIENT_ID: undefined,
    GITHUB_CLIENT_ID: undefined,
    APPLE_CLIENT_ID: undefined,
    RATE_LIMIT_MAX: 1000,
    RATE_LIMIT_WINDOW_MINUTES: 1,
    isProduction: false,
    ...overrides,
  };
}

/**
 * Resolver backed by a fixed table of credential -> profile. Unknown credentials
 * are rejected the way a provider would reject a bad token.
 */
export class StubResolver implements OAuthIdentityResolver {
  readonly scope = 'email';

  readonly clientId: string | null;

  readonly resolve = vi.fn(async (credential: string): Promise<ResolvedProfile> => {
    const profile = this.profiles.get(credential);
    if (!profile) {
      throw new OAuthResolutionError(this.provider, 'invalid access token');
    }
    return profile;
  });

  private readonly profiles = new Map<string, ResolvedProfile>();

  constructor(
    readonly provider: string,
    clientId: string | null = null,
  ) {
    this.clientId = clientId;
  }

  accept(credential: string, profile: ResolvedProfile) {
    this.profiles.set(credential, profile);
    return this;
  }
}

export function profileFor(overrides: Partial<ResolvedProfile> = {}): ResolvedProfile {
  return {
    providerUserId: 'g-100',
    email: 'alice@example.com',
    isVerified: true,
    displayNameHint: 'Alice',
    avatarHint: null,
    ...overrides,
  };
}

export function createTestLogger() {
  return { debug: vi.fn(), warn: vi.fn() };
}

export interface IdentityHarnessOptions {
  env?: Partial<Env>;
  resolvers?: OAuthIdentityResolver[];
  clock?: () => number;
  randomSuffix?: () => string;
}

export function createIdentityHarness(options: IdentityHarnessOptions = {}) {
  const env = buildTestEnv(options.env);
  const repository = new InMemoryIdentityRepository();
  const providers = new OAuthProviderRegistry(options.resolvers ?? []);
  const logger = createTestLogger();
  const tokens = new SessionTokenCodec({
    secret: env.JWT_SECRET,
    defaultTtlMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
    issuer: env.JWT_ISSUER,
    audience: env.JWT_AUDIENCE,
    clock: options.clock,
  });
  const linking = new AccountLinkingService({
    repository,
    providers,
    tokens,
    logger,
    usernameMaxAttempts: env.USERNAME_MAX_ATTEMPTS,
    maxLinkAttempts: env.OAUTH_LINK_MAX_ATTEMPTS,
    randomSuffix: options.randomSuffix,
  });
  const authService = new AuthService({
    repository,
    env,
    hasher: new PasswordHasher({ timeCost: env.PASSWORD_HASH_TIME_COST }),
    tokens,
    providers,
    linking,
  });

  return { env, repository, providers, logger, tokens, linking, authService };
}
