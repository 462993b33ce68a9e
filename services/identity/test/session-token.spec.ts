import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';

import { SessionTokenCodec } from '../src/lib/session-token';

const ISSUED_AT_MS = 1_700_000_000_000;
const EXPIRES_AT_S = 1_700_000_000 + 15 * 60;

function createCodec(now: { value: number }, secret = 'test-secret-test-secret-test-secret') {
  return new SessionTokenCodec({
    secret,
    defaultTtlMinutes: 30,
    issuer: 'wardrobe-identity',
    audience: 'wardrobe-app',
    clock: () => now.value,
  });
}

describe('SessionTokenCodec', () => {
  it('issues a token whose expiry is issue time plus ttl', () => {
    const now = { value: ISSUED_AT_MS };
    const codec = createCodec(now);

    const issued = codec.issue('user-1', 15);

    expect(issued.expiresAt.toISOString()).toBe(new Date(EXPIRES_AT_S * 1000).toISOString());
    expect(codec.verify(issued.token)).toBe('user-1');
  });

  it('falls back to the configured ttl', () => {
    const now = { value: ISSUED_AT_MS };
    const codec = createCodec(now);

    const issued = codec.issue('user-1');

    expect(issued.expiresAt.getTime()).toBe(ISSUED_AT_MS + 30 * 60 * 1000);
  });

  it('counts the validity window from the start of the issuing second', () => {
    const now = { value: ISSUED_AT_MS + 900 };
    const codec = createCodec(now);

    const issued = codec.issue('user-1', 1);

    expect(issued.expiresAt.getTime()).toBe(ISSUED_AT_MS + 60_000);
    now.value = ISSUED_AT_MS + 59_999;
    expect(codec.verify(issued.token)).toBe('user-1');
    now.value = ISSUED_AT_MS + 60_400;
    expect(codec.verify(issued.token)).toBeNull();
  });

  it('stays valid until the last second before expiry and not after', () => {
    const now = { value: ISSUED_AT_MS };
    const codec = createCodec(now);
    const { token } = codec.issue('user-1', 15);

    now.value = (EXPIRES_AT_S - 1) * 1000;
    expect(codec.verify(token)).toBe('user-1');

    now.value = EXPIRES_AT_S * 1000;
    expect(codec.verify(token)).toBeNull();

    now.value = (EXPIRES_AT_S + 60) * 1000;
    expect(codec.verify(token)).toBeNull();
  });

  it('rejects tokens signed with another secret', () => {
    const now = { value: ISSUED_AT_MS };
    const other = createCodec(now, 'another-test-secret-another-test-secret');
    const { token } = other.issue('user-1');

    expect(createCodec(now).verify(token)).toBeNull();
  });

  it('rejects garbage and tampered payloads', () => {
    const now = { value: ISSUED_AT_MS };
    const codec = createCodec(now);
    const { token } = codec.issue('user-1');
    const [header, , signature] = token.split('.');
    const forgedPayload = Buffer.from(
      JSON.stringify({ sub: 'user-2', iat: 1_700_000_000, exp: EXPIRES_AT_S }),
    ).toString('base64url');

    expect(codec.verify('not-a-token')).toBeNull();
    expect(codec.verify('')).toBeNull();
    expect(codec.verify(`${header}.${forgedPayload}.${signature}`)).toBeNull();
  });

  it('rejects tokens minted for another audience', () => {
    const now = { value: ISSUED_AT_MS };
    const token = jwt.sign(
      { sub: 'user-1', iat: 1_700_000_000, exp: EXPIRES_AT_S },
      'test-secret-test-secret-test-secret',
      { algorithm: 'HS256', issuer: 'wardrobe-identity', audience: 'someone-else' },
    );

    expect(createCodec(now).verify(token)).toBeNull();
  });

  it('rejects tokens without a subject', () => {
    const now = { value: ISSUED_AT_MS };
    const token = jwt.sign(
      { iat: 1_700_000_000, exp: EXPIRES_AT_S },
      'test-secret-test-secret-test-secret',
      { algorithm: 'HS256', issuer: 'wardrobe-identity', audience: 'wardrobe-app' },
    );

    expect(createCodec(now).verify(token)).toBeNull();
  });
});
