export interface IdentityUser {
  id: string;
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  avatarUrl: string | null;
  isVerified: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface IdentityUserWithSecrets extends IdentityUser {
  /** Null for accounts that only ever signed in through a provider. */
  passwordHash: string | null;
}

export interface LinkedIdentity {
  id: string;
  userId: string;
  provider: string;
  providerUserId: string;
  accessToken: string | null;
  refreshToken: string | null;
  expiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProviderTokens {
  accessToken?: string | null;
  refreshToken?: string | null;
  expiresAt?: Date | null;
}

/**
 * Verified attributes of an external account, as returned by a provider resolver.
 * The linking engine trusts these values as-is.
 */
export interface ResolvedProfile {
  providerUserId: string;
  email: string;
  isVerified: boolean;
  displayNameHint: string | null;
  avatarHint: string | null;
  firstName?: string | null;
  lastName?: string | null;
  tokens?: ProviderTokens;
}

export interface AuthSession {
  token: string;
  expiresAt: Date;
  user: IdentityUser;
}

export function stripSecrets(record: IdentityUserWithSecrets): IdentityUser {
  const { passwordHash, ...rest } = record;
  return rest;
}

export function isProfileComplete(user: IdentityUser) {
  return Boolean(user.firstName && user.lastName);
}

export type ProfileField = 'firstName' | 'lastName';

export interface ProfileCompletionStatus {
  isComplete: boolean;
  missingFields: ProfileField[];
  /** Client screens to show before the profile counts as complete. */
  requiredScreens: string[];
}

export function profileCompletionStatus(user: IdentityUser): ProfileCompletionStatus {
  const missingFields: ProfileField[] = [];
  if (!user.firstName) {
    missingFields.push('firstName');
  }
  if (!user.lastName) {
    missingFields.push('lastName');
  }

  const isComplete = isProfileComplete(user);
  return {
    isComplete,
    missingFields,
    requiredScreens: isComplete ? [] : ['confirmation'],
  };
}
