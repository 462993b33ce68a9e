import { randomUUID } from 'node:crypto';
import { eq, and, asc } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';

import * as schema from '../db/schema';
import { oauthAccounts, users, type OAuthAccountRow, type UserRow } from '../db/schema';
import type {
  IdentityUser,
  IdentityUserWithSecrets,
  LinkedIdentity,
} from '../domain/models';
import { notFound, UniqueConstraintError, type UniqueTarget } from '../errors';
import type {
  CreateLinkedIdentityInput,
  CreateUserInput,
  IdentityRepository,
  UpdateLinkedIdentityTokensInput,
  UpdateUserProfileInput,
} from './identity-repository';

export type IdentityDatabase = NodePgDatabase<typeof schema>;

const PG_UNIQUE_VIOLATION = '23505';

const CONSTRAINT_TARGETS = new Map<string, UniqueTarget>([
  ['users_email_unique', 'email'],
  ['users_username_unique', 'username'],
  ['oauth_accounts_provider_user_unique', 'linked_identity'],
]);

/**
 * Finds a Postgres unique violation on one of the identity constraints, looking
 * through wrapping errors' `cause`.
 */
export function uniqueViolationTarget(error: unknown): UniqueTarget | null {
  let current: unknown = error;

  for (let depth = 0; depth < 4 && current instanceof Error; depth += 1) {
    if ('code' in current && current.code === PG_UNIQUE_VIOLATION) {
      const constraint =
        'constraint' in current && typeof current.constraint === 'string'
          ? current.constraint
          : '';
      return CONSTRAINT_TARGETS.get(constraint) ?? null;
    }

    current = current.cause;
  }

  return null;
}

function translateWriteError(error: unknown): unknown {
  const target = uniqueViolationTarget(error);
  return target ? new UniqueConstraintError(target, { cause: error }) : error;
}

function mapUser(row: UserRow): IdentityUser {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    firstName: row.firstName,
    lastName: row.lastName,
    avatarUrl: row.avatarUrl,
    isVerified: row.isVerified,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function mapUserWithSecrets(row: UserRow): IdentityUserWithSecrets {
  return {
    ...mapUser(row),
    passwordHash: row.passwordHash,
  };
}

function mapLinkedIdentity(row: OAuthAccountRow): LinkedIdentity {
  return {
    id: row.id,
    userId: row.userId,
    provider: row.provider,
    providerUserId: row.providerUserId,
    accessToken: row.accessToken,
    refreshToken: row.refreshToken,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleIdentityRepository implements IdentityRepository {
  constructor(private readonly db: IdentityDatabase) {}

  async findUserById(id: string): Promise<IdentityUser | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ? mapUser(row) : null;
  }

  async findUserByEmail(email: string): Promise<IdentityUserWithSecrets | null> {
    const [row] = await this.db.select().from(users).where(eq(users.email, email)).limit(1);
    return row ? mapUserWithSecrets(row) : null;
  }

  async findUserByUsername(username: string): Promise<IdentityUserWithSecrets | null> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(eq(users.username, username))
      .limit(1);
    return row ? mapUserWithSecrets(row) : null;
  }

  async createUser(input: CreateUserInput): Promise<IdentityUser> {
    try {
      const [row] = await this.db
        .insert(users)
        .values({
          id: randomUUID(),
          username: input.username,
          email: input.email,
          passwordHash: input.passwordHash,
          firstName: input.firstName ?? null,
          lastName: input.lastName ?? null,
          avatarUrl: input.avatarUrl ?? null,
          isVerified: input.isVerified ?? false,
        })
        .returning();

      return mapUser(row);
    } catch (error) {
      throw translateWriteError(error);
    }
  }

  async updateUserProfile(id: string, input: UpdateUserProfileInput): Promise<IdentityUser> {
    const [row] = await this.db
      .update(users)
      .set({
        ...(input.firstName !== undefined ? { firstName: input.firstName } : {}),
        ...(input.lastName !== undefined ? { lastName: input.lastName } : {}),
        updatedAt: new Date(),
      })
      .where(eq(users.id, id))
      .returning();

    if (!row) {
      throw notFound('USER_NOT_FOUND', 'User no longer exists.');
    }

    return mapUser(row);
  }

  async findLinkedIdentity(
    provider: string,
    providerUserId: string,
  ): Promise<LinkedIdentity | null> {
    const [row] = await this.db
      .select()
      .from(oauthAccounts)
      .where(
        and(eq(oauthAccounts.provider, provider), eq(oauthAccounts.providerUserId, providerUserId)),
      )
      .limit(1);

    return row ? mapLinkedIdentity(row) : null;
  }

  async createLinkedIdentity(input: CreateLinkedIdentityInput): Promise<LinkedIdentity> {
    try {
      const [row] = await this.db
        .insert(oauthAccounts)
        .values({
          id: randomUUID(),
          userId: input.userId,
          provider: input.provider,
          providerUserId: input.providerUserId,
          accessToken: input.accessToken ?? null,
          refreshToken: input.refreshToken ?? null,
          expiresAt: input.expiresAt ?? null,
        })
        .returning();

      return mapLinkedIdentity(row);
    } catch (error) {
      throw translateWriteError(error);
    }
  }

  async updateLinkedIdentityTokens(
    id: string,
    input: UpdateLinkedIdentityTokensInput,
  ): Promise<LinkedIdentity> {
    const [row] = await this.db
      .update(oauthAccounts)
      .set({
        ...(input.accessToken !== undefined ? { accessToken: input.accessToken } : {}),
        ...(input.refreshToken !== undefined ? { refreshToken: input.refreshToken } : {}),
        ...(input.expiresAt !== undefined ? { expiresAt: input.expiresAt } : {}),
        updatedAt: new Date(),
      })
      .where(eq(oauthAccounts.id, id))
      .returning();

    if (!row) {
      throw notFound('IDENTITY_LINK_NOT_FOUND', 'Linked identity no longer exists.');
    }

    return mapLinkedIdentity(row);
  }

  async listLinkedIdentities(userId: string): Promise<LinkedIdentity[]> {
    const rows = await this.db
      .select()
      .from(oauthAccounts)
      .where(eq(oauthAccounts.userId, userId))
      .orderBy(asc(oauthAccounts.createdAt));

    return rows.map(mapLinkedIdentity);
  }
}
