import { z } from 'zod';

import type { ResolvedProfile } from '../domain/models';
import { OAuthResolutionError } from './errors';
import { fetchProviderJson, type FetchFn } from './http';
import type { OAuthIdentityResolver } from './provider-registry';

const GRAPH_ME_URL = 'https://graph.facebook.com/me';
const FIELDS = 'id,email,first_name,last_name,name,picture.type(large)';

const FacebookProfileSchema = z.object({
  id: z.string().min(1),
  email: z.string().email().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  name: z.string().optional(),
  picture: z
    .object({
      data: z.object({ url: z.string().url() }).partial(),
    })
    .optional(),
});

export class FacebookIdentityResolver implements OAuthIdentityResolver {
  readonly provider = 'facebook';

  readonly scope = 'email public_profile';

  readonly clientId: string | null;

  private readonly fetchFn: FetchFn;

  constructor(options: { clientId?: string; fetchFn: FetchFn }) {
    this.clientId = options.clientId ?? null;
    this.fetchFn = options.fetchFn;
  }

  async resolve(accessToken: string): Promise<ResolvedProfile> {
    const url = new URL(GRAPH_ME_URL);
    url.searchParams.set('fields', FIELDS);

    const profile = await fetchProviderJson(
      this.fetchFn,
      this.provider,
      url.toString(),
      { headers: { Authorization: `Bearer ${accessToken}` } },
      FacebookProfileSchema,
    );

    if (!profile.email) {
      throw new OAuthResolutionError(this.provider, 'account has no email address');
    }

    return {
      providerUserId: profile.id,
      email: profile.email,
      // Graph only exposes confirmed addresses.
      isVerified: true,
      displayNameHint: profile.first_name ?? profile.name ?? null,
      avatarHint: profile.picture?.data.url ?? null,
      firstName: profile.first_name ?? null,
      lastName: profile.last_name ?? null,
      tokens: { accessToken },
    };
  }
}
