import { isProfileComplete, type AuthSession, type IdentityUser, type LinkedIdentity } from '../domain/models';

export function serializeUser(user: IdentityUser) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    avatarUrl: user.avatarUrl,
    isProfileComplete: isProfileComplete(user),
    isVerified: user.isVerified,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

export function serializeSession(session: AuthSession) {
  return {
    token: session.token,
    tokenType: 'bearer',
    expiresAt: session.expiresAt.toISOString(),
    user: serializeUser(session.user),
  };
}

// Cached provider tokens never leave the service.
export function serializeLinkedIdentity(identity: LinkedIdentity) {
  return {
    id: identity.id,
    provider: identity.provider,
    providerUserId: identity.providerUserId,
    createdAt: identity.createdAt.toISOString(),
    updatedAt: identity.updatedAt.toISOString(),
  };
}
