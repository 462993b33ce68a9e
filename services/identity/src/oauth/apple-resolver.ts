import { createRemoteJWKSet, jwtVerify, type JWTVerifyGetKey } from 'jose';
import { z } from 'zod';

import type { ResolvedProfile } from '../domain/models';
import { OAuthResolutionError } from './errors';
import type { OAuthIdentityResolver } from './provider-registry';

const APPLE_ISSUER = 'https://appleid.apple.com';
const APPLE_JWKS_URL = 'https://appleid.apple.com/auth/keys';

export type AppleKeySource = JWTVerifyGetKey;

const AppleClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email().optional(),
  // Apple has sent this both as a boolean and as "true"/"false".
  email_verified: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
});

/**
 * Verifies a Sign in with Apple ID token. The credential is the ID token itself,
 * so there is no access token to cache.
 */
export class AppleIdentityResolver implements OAuthIdentityResolver {
  readonly provider = 'apple';

  readonly scope = 'name email';

  readonly clientId: string;

  private readonly keys: AppleKeySource;

  constructor(options: { clientId: string; keys?: AppleKeySource }) {
    this.clientId = options.clientId;
    this.keys = options.keys ?? createRemoteJWKSet(new URL(APPLE_JWKS_URL));
  }

  async resolve(idToken: string): Promise<ResolvedProfile> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(idToken, this.keys, {
        issuer: APPLE_ISSUER,
        audience: this.clientId,
      }));
    } catch (error) {
      throw new OAuthResolutionError(this.provider, 'ID token verification failed', {
        cause: error,
      });
    }

    const parsed = AppleClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new OAuthResolutionError(this.provider, 'ID token is missing required claims', {
        cause: parsed.error,
      });
    }

    const claims = parsed.data;
    if (!claims.email) {
      throw new OAuthResolutionError(this.provider, 'ID token carries no email address');
    }

    return {
      providerUserId: claims.sub,
      email: claims.email,
      isVerified: claims.email_verified === true || claims.email_verified === 'true',
      displayNameHint: null,
      avatarHint: null,
    };
  }
}
