import { config as loadEnv } from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { KNOWN_PROVIDERS } from './oauth/known-providers';

const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
const candidatePath = path.resolve(__dirname, '..', envFile);

if (fs.existsSync(candidatePath)) {
  loadEnv({ path: candidatePath });
} else {
  loadEnv();
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const providerList = z
  .string()
  .default(KNOWN_PROVIDERS.join(','))
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0),
  )
  .refine(
    (providers) => providers.every((provider) => KNOWN_PROVIDERS.includes(provider)),
    `OAUTH_PROVIDERS may only contain: ${KNOWN_PROVIDERS.join(', ')}`,
  );

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    HOST: z.string().default('0.0.0.0'),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),
    JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
    JWT_ISSUER: z.string().min(1).default('wardrobe-identity'),
    JWT_AUDIENCE: z.string().min(1).default('wardrobe-app'),
    ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
    PASSWORD_HASH_TIME_COST: z.coerce.number().int().min(2).max(10).default(3),
    MIN_USERNAME_LENGTH: z.coerce.number().int().min(1).max(50).default(3),
    MIN_PASSWORD_LENGTH: z.coerce.number().int().min(6).max(128).default(8),
    USERNAME_MAX_ATTEMPTS: z.coerce.number().int().positive().default(100),
    OAUTH_LINK_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
    OAUTH_PROVIDERS: providerList,
    OAUTH_REDIRECT_URL: z
      .string()
      .url()
      .default('http://localhost:8000/api/v1/auth/oauth/callback'),
    GOOGLE_CLIENT_ID: optionalString,
    FACEBOOK_CLIENT_ID: optionalString,
    GITHUB_CLIENT_ID: optionalString,
    APPLE_CLIENT_ID: optionalString,
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(200),
    RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().int().positive().default(1),
  })
  .transform((value) => ({
    ...value,
    isProduction: value.NODE_ENV === 'production',
  }));

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
