import jwt from 'jsonwebtoken';

export interface SessionTokenCodecOptions {
  secret: string;
  defaultTtlMinutes: number;
  issuer: string;
  audience: string;
  /** Milliseconds since epoch; defaults to Date.now. */
  clock?: () => number;
}

export interface IssuedSessionToken {
  token: string;
  expiresAt: Date;
}

const ALGORITHM = 'HS256';

/**
 * Signs and checks stateless bearer tokens. There is no revocation list: a token
 * stays valid until its `exp`, so logout cannot invalidate it early.
 */
export class SessionTokenCodec {
  private readonly secret: string;

  private readonly defaultTtlMinutes: number;

  private readonly issuer: string;

  private readonly audience: string;

  private readonly clock: () => number;

  constructor(options: SessionTokenCodecOptions) {
    this.secret = options.secret;
    this.defaultTtlMinutes = options.defaultTtlMinutes;
    this.issuer = options.issuer;
    this.audience = options.audience;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Works at whole seconds: `iat` is the clock floored to a second and the token
   * is valid over `[iat, iat + ttl)`. A token issued late in a second therefore
   * expires up to a second before the unfloored issue time plus ttl, and
   * `expiresAt` reports that earlier instant.
   */
  issue(subjectId: string, ttlMinutes: number = this.defaultTtlMinutes): IssuedSessionToken {
    const issuedAt = Math.floor(this.clock() / 1000);
    const expiresAtSeconds = issuedAt + Math.round(ttlMinutes * 60);

    const token = jwt.sign({ sub: subjectId, iat: issuedAt, exp: expiresAtSeconds }, this.secret, {
      algorithm: ALGORITHM,
      issuer: this.issuer,
      audience: this.audience,
    });

    return { token, expiresAt: new Date(expiresAtSeconds * 1000) };
  }

  /**
   * Returns the subject id, or null when the token is malformed, tampered with,
   * issued for another audience, or expired.
   */
  verify(token: string): string | null {
    try {
      const payload = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        issuer: this.issuer,
        audience: this.audience,
        clockTimestamp: Math.floor(this.clock() / 1000),
      });

      if (typeof payload === 'string' || typeof payload.sub !== 'string' || !payload.sub) {
        return null;
      }

      return payload.sub;
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        return null;
      }

      throw error;
    }
  }
}
