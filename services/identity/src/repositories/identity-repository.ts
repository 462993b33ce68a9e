import type { IdentityUser, IdentityUserWithSecrets, LinkedIdentity } from '../domain/models';

export interface CreateUserInput {
  username: string;
  email: string;
  passwordHash: string | null;
  firstName?: string | null;
  lastName?: string | null;
  avatarUrl?: string | null;
  isVerified?: boolean;
}

export interface CreateLinkedIdentityInput {
  userId: string;
  provider: string;
  providerUserId: string;
  accessToken?: string | null;
  refreshToken?: string | null;
  expiresAt?: Date | null;
}

/** Fields left undefined keep their stored value. */
export interface UpdateUserProfileInput {
  firstName?: string | null;
  lastName?: string | null;
}

/** Fields left undefined keep their stored value. */
export interface UpdateLinkedIdentityTokensInput {
  accessToken?: string;
  refreshToken?: string;
  expiresAt?: Date;
}

/**
 * Record access used by the identity core. Implementations enforce uniqueness of
 * email, username and (provider, providerUserId), raising UniqueConstraintError.
 */
export interface IdentityRepository {
  findUserById(id: string): Promise<IdentityUser | null>;
  findUserByEmail(email: string): Promise<IdentityUserWithSecrets | null>;
  findUserByUsername(username: string): Promise<IdentityUserWithSecrets | null>;
  createUser(input: CreateUserInput): Promise<IdentityUser>;
  /** Also bumps `updatedAt`. */
  updateUserProfile(id: string, input: UpdateUserProfileInput): Promise<IdentityUser>;

  findLinkedIdentity(provider: string, providerUserId: string): Promise<LinkedIdentity | null>;
  createLinkedIdentity(input: CreateLinkedIdentityInput): Promise<LinkedIdentity>;
  updateLinkedIdentityTokens(
    id: string,
    input: UpdateLinkedIdentityTokensInput,
  ): Promise<LinkedIdentity>;
  listLinkedIdentities(userId: string): Promise<LinkedIdentity[]>;
}
