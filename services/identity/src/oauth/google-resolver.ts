import { z } from 'zod';

import type { ResolvedProfile } from '../domain/models';
import { OAuthResolutionError } from './errors';
import { fetchProviderJson, type FetchFn } from './http';
import type { OAuthIdentityResolver } from './provider-registry';

const USERINFO_URL = 'https://www.googleapis.com/oauth2/v3/userinfo';

const GoogleUserInfoSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email().optional(),
  email_verified: z.boolean().optional(),
  given_name: z.string().optional(),
  family_name: z.string().optional(),
  name: z.string().optional(),
  picture: z.string().url().optional(),
});

export class GoogleIdentityResolver implements OAuthIdentityResolver {
  readonly provider = 'google';

  readonly scope = 'openid email profile';

  readonly clientId: string | null;

  private readonly fetchFn: FetchFn;

  constructor(options: { clientId?: string; fetchFn: FetchFn }) {
    this.clientId = options.clientId ?? null;
    this.fetchFn = options.fetchFn;
  }

  async resolve(accessToken: string): Promise<ResolvedProfile> {
    const info = await fetchProviderJson(
      this.fetchFn,
      this.provider,
      USERINFO_URL,
      { headers: { Authorization: `Bearer ${accessToken}` } },
      GoogleUserInfoSchema,
    );

    if (!info.email) {
      throw new OAuthResolutionError(this.provider, 'account has no email address');
    }

    return {
      providerUserId: info.sub,
      email: info.email,
      isVerified: info.email_verified ?? false,
      displayNameHint: info.given_name ?? info.name ?? null,
      avatarHint: info.picture ?? null,
      firstName: info.given_name ?? null,
      lastName: info.family_name ?? null,
      tokens: { accessToken },
    };
  }
}
