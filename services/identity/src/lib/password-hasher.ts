import argon2 from 'argon2';

export interface PasswordHasherOptions {
  /** argon2 iterations; the tunable work factor. */
  timeCost: number;
  memoryCost?: number;
}

const DEFAULT_MEMORY_COST = 19456;

export class PasswordHasher {
  private readonly options: argon2.Options;

  constructor(options: PasswordHasherOptions) {
    this.options = {
      type: argon2.argon2id,
      timeCost: options.timeCost,
      memoryCost: options.memoryCost ?? DEFAULT_MEMORY_COST,
      parallelism: 1,
    };
  }

  async hash(plaintext: string): Promise<string> {
    return argon2.hash(plaintext, this.options);
  }

  /**
   * Resolves false for a wrong password and for digests argon2 cannot parse.
   */
  async verify(plaintext: string, digest: string): Promise<boolean> {
    if (!digest.startsWith('$argon2')) {
      return false;
    }

    return argon2.verify(digest, plaintext).catch(() => false);
  }
}
