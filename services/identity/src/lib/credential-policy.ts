import { z } from 'zod';

import { badRequest } from '../errors';

export interface CredentialPolicy {
  minUsernameLength: number;
  minPasswordLength: number;
}

export const MAX_USERNAME_LENGTH = 50;
export const MAX_PASSWORD_LENGTH = 128;

const USERNAME_PATTERN = /^[A-Za-z0-9_\-#$!]+$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function createCredentialSchemas(policy: CredentialPolicy) {
  const username = z
    .string()
    .min(policy.minUsernameLength, `Username must be at least ${policy.minUsernameLength} characters`)
    .max(MAX_USERNAME_LENGTH, `Username must be at most ${MAX_USERNAME_LENGTH} characters`)
    .refine((value) => !/\s/.test(value), 'Username must not contain spaces')
    .refine(
      (value) => USERNAME_PATTERN.test(value),
      'Username may only contain letters, digits and _ - # $ !',
    );

  const password = z
    .string()
    .min(policy.minPasswordLength, `Password must be at least ${policy.minPasswordLength} characters`)
    .max(MAX_PASSWORD_LENGTH, `Password must be at most ${MAX_PASSWORD_LENGTH} characters`)
    .refine((value) => !/\s/.test(value), 'Password must not contain spaces')
    .refine((value) => /[A-Za-z]/.test(value), 'Password must include a letter')
    .refine((value) => /[0-9]/.test(value), 'Password must include a digit');

  return { username, password };
}

export type LoginIdentifier = { kind: 'email'; email: string } | { kind: 'username'; username: string };

/**
 * Classifies a login identifier as an email (normalized) or a username.
 */
export function parseLoginIdentifier(identifier: string): LoginIdentifier {
  const value = identifier.trim();

  if (EMAIL_PATTERN.test(value)) {
    return { kind: 'email', email: normalizeEmail(value) };
  }

  if (USERNAME_PATTERN.test(value)) {
    return { kind: 'username', username: value };
  }

  throw badRequest('AUTH_INVALID_IDENTIFIER', 'Login identifier must be an email or a username.');
}

export function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}
