import { randomUUID } from 'node:crypto';

import {
  stripSecrets,
  type IdentityUser,
  type IdentityUserWithSecrets,
  type LinkedIdentity,
} from '../src/domain/models';
import { notFound, UniqueConstraintError } from '../src/errors';
import type {
  CreateLinkedIdentityInput,
  CreateUserInput,
  IdentityRepository,
  UpdateLinkedIdentityTokensInput,
  UpdateUserProfileInput,
} from '../src/repositories/identity-repository';

function linkKey(provider: string, providerUserId: string) {
  return `${provider}:${providerUserId}`;
}

/**
 * Enforces the same unique constraints as the Postgres schema. Each write checks
 * and inserts without yielding, so concurrent callers see single-row atomicity.
 */
export class InMemoryIdentityRepository implements IdentityRepository {
  private users = new Map<string, IdentityUserWithSecrets>();

  private emailIndex = new Map<string, string>();

  private usernameIndex = new Map<string, string>();

  private links = new Map<string, LinkedIdentity>();

  private linkIndex = new Map<string, string>();

  private now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get userCount() {
    return this.users.size;
  }

  get linkCount() {
    return this.links.size;
  }

  allLinks(): LinkedIdentity[] {
    return [...this.links.values()].map((link) => ({ ...link }));
  }

  async findUserById(id: string): Promise<IdentityUser | null> {
    const user = this.users.get(id);
    return user ? stripSecrets({ ...user }) : null;
  }

  async findUserByEmail(email: string): Promise<IdentityUserWithSecrets | null> {
    const id = this.emailIndex.get(email);
    const user = id ? this.users.get(id) : undefined;
    return user ? { ...user } : null;
  }

  async findUserByUsername(username: string): Promise<IdentityUserWithSecrets | null> {
    const id = this.usernameIndex.get(username);
    const user = id ? this.users.get(id) : undefined;
    return user ? { ...user } : null;
  }

  async createUser(input: CreateUserInput): Promise<IdentityUser> {
    if (this.emailIndex.has(input.email)) {
      throw new UniqueConstraintError('email');
    }
    if (this.usernameIndex.has(input.username)) {
      throw new UniqueConstraintError('username');
    }

    const timestamp = this.now();
    const user: IdentityUserWithSecrets = {
      id: randomUUID(),
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      firstName: input.firstName ?? null,
      lastName: input.lastName ?? null,
      avatarUrl: input.avatarUrl ?? null,
      isVerified: input.isVerified ?? false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.users.set(user.id, user);
    this.emailIndex.set(user.email, user.id);
    this.usernameIndex.set(user.username, user.id);

    return stripSecrets({ ...user });
  }

  async updateUserProfile(id: string, input: UpdateUserProfileInput): Promise<IdentityUser> {
    const user = this.users.get(id);
    if (!user) {
      throw notFound('USER_NOT_FOUND', 'User no longer exists.');
    }

    const updated: IdentityUserWithSecrets = {
      ...user,
      firstName: input.firstName !== undefined ? input.firstName : user.firstName,
      lastName: input.lastName !== undefined ? input.lastName : user.lastName,
      updatedAt: this.now(),
    };
    this.users.set(id, updated);

    return stripSecrets({ ...updated });
  }

  async findLinkedIdentity(
    provider: string,
    providerUserId: string,
  ): Promise<LinkedIdentity | null> {
    const id = this.linkIndex.get(linkKey(provider, providerUserId));
    const link = id ? this.links.get(id) : undefined;
    return link ? { ...link } : null;
  }

  async createLinkedIdentity(input: CreateLinkedIdentityInput): Promise<LinkedIdentity> {
    const key = linkKey(input.provider, input.providerUserId);
    if (this.linkIndex.has(key)) {
      throw new UniqueConstraintError('linked_identity');
    }
    if (!this.users.has(input.userId)) {
      throw new Error(`Unknown user ${input.userId}`);
    }

    const timestamp = this.now();
    const link: LinkedIdentity = {
      id: randomUUID(),
      userId: input.userId,
      provider: input.provider,
      providerUserId: input.providerUserId,
      accessToken: input.accessToken ?? null,
      refreshToken: input.refreshToken ?? null,
      expiresAt: input.expiresAt ?? null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.links.set(link.id, link);
    this.linkIndex.set(key, link.id);

    return { ...link };
  }

  async updateLinkedIdentityTokens(
    id: string,
    input: UpdateLinkedIdentityTokensInput,
  ): Promise<LinkedIdentity> {
    const link = this.links.get(id);
    if (!link) {
      throw notFound('IDENTITY_LINK_NOT_FOUND', 'Linked identity no longer exists.');
    }

    const updated: LinkedIdentity = {
      ...link,
      accessToken: input.accessToken ?? link.accessToken,
      refreshToken: input.refreshToken ?? link.refreshToken,
      expiresAt: input.expiresAt ?? link.expiresAt,
      updatedAt: this.now(),
    };
    this.links.set(id, updated);

    return { ...updated };
  }

  async listLinkedIdentities(userId: string): Promise<LinkedIdentity[]> {
    return [...this.links.values()]
      .filter((link) => link.userId === userId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((link) => ({ ...link }));
  }
}
