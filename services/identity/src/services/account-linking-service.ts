import type { FastifyBaseLogger } from 'fastify';

import {
  stripSecrets,
  type AuthSession,
  type IdentityUser,
  type ResolvedProfile,
} from '../domain/models';
import { UniqueConstraintError } from '../errors';
import { normalizeEmail } from '../lib/credential-policy';
import type { SessionTokenCodec } from '../lib/session-token';
import { deriveUsernameBase, generateUniqueUsername } from '../lib/username';
import { OAuthResolutionError } from '../oauth/errors';
import type { OAuthProviderRegistry } from '../oauth/provider-registry';
import type { IdentityRepository } from '../repositories/identity-repository';

export type LinkOutcome = 'linked' | 'merged' | 'created';

export interface ExternalLoginResult extends AuthSession {
  outcome: LinkOutcome;
}

export interface AccountLinkingServiceOptions {
  repository: IdentityRepository;
  providers: OAuthProviderRegistry;
  tokens: SessionTokenCodec;
  logger: Pick<FastifyBaseLogger, 'debug' | 'warn'>;
  usernameMaxAttempts: number;
  maxLinkAttempts: number;
  randomSuffix?: () => string;
}

interface LinkDecision {
  user: IdentityUser;
  outcome: LinkOutcome;
}

/**
 * Maps a provider identity onto a local user. The decision order is: reuse an
 * existing link, else attach to the user with the same email, else create a new
 * user. Matching on email means whoever controls the provider account can sign
 * into the local account with that address.
 */
export class AccountLinkingService {
  private readonly repository: IdentityRepository;

  private readonly providers: OAuthProviderRegistry;

  private readonly tokens: SessionTokenCodec;

  private readonly logger: Pick<FastifyBaseLogger, 'debug' | 'warn'>;

  private readonly usernameMaxAttempts: number;

  private readonly maxLinkAttempts: number;

  private readonly randomSuffix?: () => string;

  constructor(options: AccountLinkingServiceOptions) {
    this.repository = options.repository;
    this.providers = options.providers;
    this.tokens = options.tokens;
    this.logger = options.logger;
    this.usernameMaxAttempts = options.usernameMaxAttempts;
    this.maxLinkAttempts = Math.max(1, options.maxLinkAttempts);
    this.randomSuffix = options.randomSuffix;
  }

  /**
   * Resolves `credential` with the named provider and signs the matching local
   * user in. Returns null, without touching the store, when the provider is not
   * enabled or rejects the credential.
   */
  async loginWithProvider(
    provider: string,
    credential: string,
  ): Promise<ExternalLoginResult | null> {
    const resolver = this.providers.get(provider);
    if (!resolver) {
      this.logger.warn({ provider }, 'OAuth login for unsupported provider');
      return null;
    }

    let profile: ResolvedProfile;
    try {
      profile = await resolver.resolve(credential);
    } catch (error) {
      if (error instanceof OAuthResolutionError) {
        this.logger.warn({ provider, reason: error.message }, 'OAuth credential rejected');
        return null;
      }
      throw error;
    }

    const { user, outcome } = await this.linkWithRetry(provider, credential, profile);
    const session = this.tokens.issue(user.id);

    return { token: session.token, expiresAt: session.expiresAt, user, outcome };
  }

  /**
   * Retries the decision after a unique conflict. Email and link conflicts mean
   * another sign-in for the same person wrote first and count against
   * `maxLinkAttempts`. A username conflict means an unrelated sign-in took the
   * probed name; the next pass skips probing and uses a random suffix, under a
   * separate budget of the same size.
   */
  private async linkWithRetry(
    provider: string,
    credential: string,
    profile: ResolvedProfile,
  ): Promise<LinkDecision> {
    let linkConflicts = 0;
    let usernameConflicts = 0;

    for (;;) {
      try {
        return await this.linkOnce(provider, credential, profile, usernameConflicts > 0);
      } catch (error) {
        if (!(error instanceof UniqueConstraintError)) {
          throw error;
        }

        if (error.target === 'username') {
          usernameConflicts += 1;
          if (usernameConflicts > this.maxLinkAttempts) {
            throw error;
          }
        } else {
          linkConflicts += 1;
          if (linkConflicts >= this.maxLinkAttempts) {
            throw error;
          }
        }

        this.logger.debug(
          { provider, target: error.target, linkConflicts, usernameConflicts },
          'OAuth link decision lost a race, retrying',
        );
      }
    }
  }

  private async linkOnce(
    provider: string,
    credential: string,
    profile: ResolvedProfile,
    randomUsername: boolean,
  ): Promise<LinkDecision> {
    const existing = await this.repository.findLinkedIdentity(provider, profile.providerUserId);

    if (existing) {
      await this.repository.updateLinkedIdentityTokens(existing.id, {
        accessToken: profile.tokens?.accessToken ?? credential,
        refreshToken: profile.tokens?.refreshToken ?? undefined,
        expiresAt: profile.tokens?.expiresAt ?? undefined,
      });

      const owner = await this.repository.findUserById(existing.userId);
      if (!owner) {
        throw new Error(`Linked identity ${existing.id} references a missing user`);
      }

      return { user: owner, outcome: 'linked' };
    }

    const email = normalizeEmail(profile.email);
    const linkInput = {
      provider,
      providerUserId: profile.providerUserId,
      accessToken: profile.tokens?.accessToken ?? credential,
      refreshToken: profile.tokens?.refreshToken ?? null,
      expiresAt: profile.tokens?.expiresAt ?? null,
    };

    const sameEmail = await this.repository.findUserByEmail(email);
    if (sameEmail) {
      await this.repository.createLinkedIdentity({ ...linkInput, userId: sameEmail.id });
      return { user: stripSecrets(sameEmail), outcome: 'merged' };
    }

    const username = await generateUniqueUsername(
      deriveUsernameBase(profile.displayNameHint, email),
      async (candidate) => (await this.repository.findUserByUsername(candidate)) !== null,
      {
        maxAttempts: this.usernameMaxAttempts,
        randomSuffix: this.randomSuffix,
        skipProbe: randomUsername,
      },
    );

    const user = await this.repository.createUser({
      username,
      email,
      passwordHash: null,
      firstName: profile.firstName ?? null,
      lastName: profile.lastName ?? null,
      avatarUrl: profile.avatarHint,
      isVerified: profile.isVerified,
    });
    await this.repository.createLinkedIdentity({ ...linkInput, userId: user.id });

    return { user, outcome: 'created' };
  }
}
