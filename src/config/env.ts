import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

// -------------------------------------------------
// Env
// -------------------------------------------------
dotenv.config({
  quiet: process.env.NODE_ENV === 'test',
});

const DOCKER_SECRET_PREFIX = '/run/secrets/';

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Runtime mode on its own, for modules that load before the full config.
 * An unknown value reads as production here; `loadConfig` rejects it.
 */
export function readNodeEnv(source: NodeJS.ProcessEnv = process.env): NodeEnv {
  return NodeEnvSchema.catch('production').parse(source.NODE_ENV);
}

const envSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    SERVER_PORT: z.string().regex(/^\d+$/).default('5002'),
    SESSION_SECRET: z.string().min(1),
    WEATHER_API_KEY: z.string().min(1),
    WEATHER_API_URL: z
      .string()
      .url()
      .default('https://api.openweathermap.org/data/2.5/weather'),
    WEATHER_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    WEATHER_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
    DATABASE_PATH: z.string().min(1).default(path.join('instance', 'users.db')),
    AUTH_MODE: z.enum(['local', 'oidc']).default('local'),
    OIDC_ISSUER_URL: z.string().url().optional(),
    OIDC_CLIENT_ID: z.string().min(1).optional(),
    OIDC_CLIENT_SECRET: z.string().min(1).optional(),
    OIDC_REDIRECT_URI: z.string().url().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.AUTH_MODE !== 'oidc') return;

    const required = [
      'OIDC_ISSUER_URL',
      'OIDC_CLIENT_ID',
      'OIDC_CLIENT_SECRET',
      'OIDC_REDIRECT_URI',
    ] as const;

    for (const key of required) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when AUTH_MODE=oidc`,
        });
      }
    }
  });

export interface OidcConfig {
  issuerUrl: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface AppConfig {
  env: NodeEnv;
  port: number;
  sessionSecret: string;
  weather: {
    apiKey: string;
    apiUrl: string;
    timeoutMs: number;
    cacheTtlSeconds: number;
  };
  databasePath: string;
  auth: { mode: 'local' } | { mode: 'oidc'; oidc: OidcConfig };
}

/**
 * Secrets can be passed either literally or as a Docker secrets path,
 * in which case the file content is used.
 */
export function resolveSecret(value: string): string {
  if (value.startsWith(DOCKER_SECRET_PREFIX)) {
    return fs.readFileSync(value, 'utf8').trim();
  }
  return value;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  let auth: AppConfig['auth'] = { mode: 'local' };
  if (
    env.AUTH_MODE === 'oidc' &&
    env.OIDC_ISSUER_URL &&
    env.OIDC_CLIENT_ID &&
    env.OIDC_CLIENT_SECRET &&
    env.OIDC_REDIRECT_URI
  ) {
    auth = {
      mode: 'oidc',
      oidc: {
        issuerUrl: env.OIDC_ISSUER_URL,
        clientId: env.OIDC_CLIENT_ID,
        clientSecret: resolveSecret(env.OIDC_CLIENT_SECRET),
        redirectUri: env.OIDC_REDIRECT_URI,
      },
    };
  }

  return {
    env: env.NODE_ENV,
    port: Number(env.SERVER_PORT),
    sessionSecret: resolveSecret(env.SESSION_SECRET),
    weather: {
      apiKey: resolveSecret(env.WEATHER_API_KEY),
      apiUrl: env.WEATHER_API_URL,
      timeoutMs: env.WEATHER_API_TIMEOUT_MS,
      cacheTtlSeconds: env.WEATHER_CACHE_TTL_SECONDS,
    },
    databasePath: env.DATABASE_PATH,
    auth,
  };
}
