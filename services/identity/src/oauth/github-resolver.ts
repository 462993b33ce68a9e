import { z } from 'zod';

import type { ResolvedProfile } from '../domain/models';
import { OAuthResolutionError } from './errors';
import { fetchProviderJson, type FetchFn } from './http';
import type { OAuthIdentityResolver } from './provider-registry';

const API_BASE = 'https://api.github.com';

const GitHubUserSchema = z.object({
  id: z.number().int(),
  login: z.string().min(1),
  name: z.string().nullable().optional(),
  email: z.string().nullable().optional(),
  avatar_url: z.string().url().nullable().optional(),
});

const GitHubEmailsSchema = z.array(
  z.object({
    email: z.string().email(),
    primary: z.boolean(),
    verified: z.boolean(),
  }),
);

type GitHubEmail = z.infer<typeof GitHubEmailsSchema>[number];

function pickEmail(emails: GitHubEmail[]): GitHubEmail | null {
  return (
    emails.find((entry) => entry.primary && entry.verified) ??
    emails.find((entry) => entry.verified) ??
    emails.find((entry) => entry.primary) ??
    null
  );
}

function splitName(name: string | null | undefined) {
  if (!name) {
    return { firstName: null, lastName: null };
  }
  const [first, ...rest] = name.trim().split(/\s+/);
  return { firstName: first || null, lastName: rest.length > 0 ? rest.join(' ') : null };
}

export class GitHubIdentityResolver implements OAuthIdentityResolver {
  readonly provider = 'github';

  readonly scope = 'read:user user:email';

  readonly clientId: string | null;

  private readonly fetchFn: FetchFn;

  constructor(options: { clientId?: string; fetchFn: FetchFn }) {
    this.clientId = options.clientId ?? null;
    this.fetchFn = options.fetchFn;
  }

  async resolve(accessToken: string): Promise<ResolvedProfile> {
    const headers = {
      Authorization: `Bearer ${accessToken}`,
      // The API rejects requests without one.
      'User-Agent': 'wardrobe-identity',
    };

    const user = await fetchProviderJson(
      this.fetchFn,
      this.provider,
      `${API_BASE}/user`,
      { headers },
      GitHubUserSchema,
    );
    const emails = await fetchProviderJson(
      this.fetchFn,
      this.provider,
      `${API_BASE}/user/emails`,
      { headers },
      GitHubEmailsSchema,
    );

    const chosen = pickEmail(emails);
    const email = chosen?.email ?? user.email ?? null;
    if (!email) {
      throw new OAuthResolutionError(this.provider, 'account has no email address');
    }

    return {
      providerUserId: String(user.id),
      email,
      isVerified: chosen?.verified ?? false,
      displayNameHint: user.login,
      avatarHint: user.avatar_url ?? null,
      ...splitName(user.name),
      tokens: { accessToken },
    };
  }
}
