import { describe, expect, it } from 'vitest';

import { uniqueViolationTarget } from '../src/repositories/drizzle-identity-repository';

function pgError(code: string, constraint?: string) {
  return Object.assign(new Error('duplicate key value violates unique constraint'), {
    code,
    constraint,
  });
}

describe('uniqueViolationTarget', () => {
  it('maps each identity constraint to its target', () => {
    expect(uniqueViolationTarget(pgError('23505', 'users_email_unique'))).toBe('email');
    expect(uniqueViolationTarget(pgError('23505', 'users_username_unique'))).toBe('username');
    expect(uniqueViolationTarget(pgError('23505', 'oauth_accounts_provider_user_unique'))).toBe(
      'linked_identity',
    );
  });

  it('finds the driver error behind a wrapping error', () => {
    const wrapped = new Error('Failed query: insert into "users"', {
      cause: pgError('23505', 'users_email_unique'),
    });

    expect(uniqueViolationTarget(wrapped)).toBe('email');
  });

  it('ignores other failures', () => {
    expect(uniqueViolationTarget(pgError('23503', 'oauth_accounts_user_id_users_id_fk'))).toBeNull();
    expect(uniqueViolationTarget(pgError('23505', 'some_other_unique'))).toBeNull();
    expect(uniqueViolationTarget(pgError('23505'))).toBeNull();
    expect(uniqueViolationTarget(new Error('connection terminated'))).toBeNull();
    expect(uniqueViolationTarget('23505')).toBeNull();
  });
});
