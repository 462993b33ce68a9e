import type { Env } from '../env';
import {
  stripSecrets,
  type AuthSession,
  type IdentityUser,
  type IdentityUserWithSecrets,
  type LinkedIdentity,
} from '../domain/models';
import { conflict, UniqueConstraintError, unauthorized } from '../errors';
import { normalizeEmail, parseLoginIdentifier } from '../lib/credential-policy';
import type { PasswordHasher } from '../lib/password-hasher';
import type { SessionTokenCodec } from '../lib/session-token';
import type { OAuthProviderRegistry, ProviderDescription } from '../oauth/provider-registry';
import type {
  IdentityRepository,
  UpdateUserProfileInput,
} from '../repositories/identity-repository';
import type { AccountLinkingService, ExternalLoginResult } from './account-linking-service';

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
  firstName?: string | null;
  lastName?: string | null;
}

export interface LoginInput {
  identifier: string;
  password: string;
}

export interface AuthServiceOptions {
  repository: IdentityRepository;
  env: Pick<Env, 'OAUTH_REDIRECT_URL'>;
  hasher: PasswordHasher;
  tokens: SessionTokenCodec;
  providers: OAuthProviderRegistry;
  linking: AccountLinkingService;
}

function emailTaken() {
  return conflict('AUTH_EMAIL_EXISTS', 'An account with this email already exists.');
}

function usernameTaken() {
  return conflict('AUTH_USERNAME_TAKEN', 'This username is already taken.');
}

function invalidCredentials() {
  return unauthorized('AUTH_INVALID_CREDENTIALS', 'Invalid credentials.');
}

export class AuthService {
  private readonly repository: IdentityRepository;

  private readonly env: Pick<Env, 'OAUTH_REDIRECT_URL'>;

  private readonly hasher: PasswordHasher;

  private readonly tokens: SessionTokenCodec;

  private readonly providers: OAuthProviderRegistry;

  private readonly linking: AccountLinkingService;

  constructor(options: AuthServiceOptions) {
    this.repository = options.repository;
    this.env = options.env;
    this.hasher = options.hasher;
    this.tokens = options.tokens;
    this.providers = options.providers;
    this.linking = options.linking;
  }

  async register(input: RegisterInput): Promise<AuthSession> {
    const email = normalizeEmail(input.email);

    if (await this.repository.findUserByEmail(email)) {
      throw emailTaken();
    }

    if (await this.repository.findUserByUsername(input.username)) {
      throw usernameTaken();
    }

    const passwordHash = await this.hasher.hash(input.password);

    let user: IdentityUser;
    try {
      user = await this.repository.createUser({
        username: input.username,
        email,
        passwordHash,
        firstName: input.firstName ?? null,
        lastName: input.lastName ?? null,
      });
    } catch (error) {
      // Lost a race with a concurrent registration.
      if (error instanceof UniqueConstraintError && error.target === 'email') {
        throw emailTaken();
      }
      if (error instanceof UniqueConstraintError && error.target === 'username') {
        throw usernameTaken();
      }
      throw error;
    }

    return this.createSession(user);
  }

  /**
   * Unknown identifiers, accounts without a password and wrong passwords all
   * fail with the same error.
   */
  async login(input: LoginInput): Promise<AuthSession> {
    const identifier = parseLoginIdentifier(input.identifier);

    const record: IdentityUserWithSecrets | null =
      identifier.kind === 'email'
        ? await this.repository.findUserByEmail(identifier.email)
        : await this.repository.findUserByUsername(identifier.username);

    if (!record || !record.passwordHash) {
      throw invalidCredentials();
    }

    const valid = await this.hasher.verify(input.password, record.passwordHash);
    if (!valid) {
      throw invalidCredentials();
    }

    return this.createSession(stripSecrets(record));
  }

  async loginWithProvider(provider: string, credential: string): Promise<ExternalLoginResult | null> {
    return this.linking.loginWithProvider(provider.toLowerCase(), credential);
  }

  async getUserById(id: string) {
    return this.repository.findUserById(id);
  }

  async updateProfile(userId: string, input: UpdateUserProfileInput): Promise<IdentityUser> {
    return this.repository.updateUserProfile(userId, input);
  }

  async listLinkedIdentities(userId: string): Promise<LinkedIdentity[]> {
    return this.repository.listLinkedIdentities(userId);
  }

  listProviders(): ProviderDescription[] {
    return this.providers.describe(this.env.OAUTH_REDIRECT_URL);
  }

  enabledProviders(): string[] {
    return this.providers.list();
  }

  private createSession(user: IdentityUser): AuthSession {
    const issued = this.tokens.issue(user.id);
    return { token: issued.token, expiresAt: issued.expiresAt, user };
  }
}
