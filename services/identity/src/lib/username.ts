import { randomBytes } from 'node:crypto';

const MAX_BASE_LENGTH = 40;
const FALLBACK_BASE = 'user';
const DISALLOWED = /[^\p{L}\p{N}_-]/gu;

export function normalizeUsernameBase(value: string | null | undefined): string {
  if (!value) {
    return '';
  }

  const filtered = value.toLowerCase().replace(DISALLOWED, '');
  // Cap by code point so a surrogate pair is never split.
  return Array.from(filtered).slice(0, MAX_BASE_LENGTH).join('');
}

/**
 * Picks the stem for a generated username: the provider's display-name hint,
 * else the email local part, else "user".
 */
export function deriveUsernameBase(hint: string | null | undefined, email: string): string {
  const fromHint = normalizeUsernameBase(hint);
  if (fromHint) {
    return fromHint;
  }

  const localPart = email.split('@')[0];
  const fromEmail = normalizeUsernameBase(localPart);
  return fromEmail || FALLBACK_BASE;
}

export interface GenerateUsernameOptions {
  maxAttempts: number;
  randomSuffix?: () => string;
  /** Go straight to `base-<random>`, e.g. after a probed name was lost to a concurrent writer. */
  skipProbe?: boolean;
}

function defaultRandomSuffix() {
  return randomBytes(4).toString('hex');
}

/**
 * Probes `base`, `base1`, `base2`, … and returns the first free name. After
 * `maxAttempts` probes it gives up and returns `base-<random>` without checking;
 * the store's unique constraint catches the unlikely clash.
 */
export async function generateUniqueUsername(
  base: string,
  isTaken: (candidate: string) => Promise<boolean>,
  options: GenerateUsernameOptions,
): Promise<string> {
  const probes = options.skipProbe ? 0 : options.maxAttempts;
  for (let attempt = 0; attempt < probes; attempt += 1) {
    const candidate = attempt === 0 ? base : `${base}${attempt}`;
    if (!(await isTaken(candidate))) {
      return candidate;
    }
  }

  const suffix = (options.randomSuffix ?? defaultRandomSuffix)();
  return `${base}-${suffix}`;
}
