/**
 * Process-wide configuration, built once from the environment.
 * Everything downstream receives the frozen AppConfig through the APP_CONFIG token.
 */
import type { LogLevel } from '@nestjs/common';
import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type Environment = 'local' | 'staging' | 'production';

export interface OAuthCredentials {
  github: { clientId: string; clientSecret: string };
  google: { clientId: string; clientSecret: string };
  microsoft: { clientId: string; clientSecret: string; tenant: string };
}

export interface AppConfig {
  environment: Environment;
  port: number;
  backendHost: string;
  corsOrigins: string[];
  /** Honour X-Forwarded-* from one reverse proxy, so secure cookies work behind TLS termination. */
  trustProxy: boolean;
  logLevels: LogLevel[];
  auth: {
    secretKey: string;
    accessTokenExpireMinutes: number;
    refreshTokenExpireDays: number;
    enablePasswordAuth: boolean;
  };
  oauth: OAuthCredentials & {
    httpTimeoutMs: number;
  };
  database: {
    path: string;
  };
  queue: {
    workerEnabled: boolean;
    pollIntervalMs: number;
    maxConcurrency: number;
  };
  firstUser: {
    name: string;
    email: string;
    username: string;
    password: string;
  };
}

const LOG_LEVELS = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'] as const;
const DEFAULT_SECRET_KEY = 'secret-key';

const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === '') return defaultValue;
      return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
    });

const int = (defaultValue: number, min = 0) =>
  z.coerce.number().int().min(min).default(defaultValue);

// Credentials are optional; an empty value disables the provider rather than failing startup.
const credential = z
  .string()
  .optional()
  .transform((value) => value?.trim() ?? '');

const list = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const EnvSchema = z.object({
  ENVIRONMENT: z.enum(['local', 'staging', 'production']).default('local'),
  PORT: int(8000, 1),
  APP_BACKEND_HOST: z.string().url().default('http://localhost:8000'),
  CORS_ORIGINS: list('*'),
  TRUST_PROXY: flag(false),
  LOG_LEVELS: list('log,warn,error').pipe(z.array(z.enum(LOG_LEVELS))),

  SECRET_KEY: z.string().min(1).default(DEFAULT_SECRET_KEY),
  ACCESS_TOKEN_EXPIRE_MINUTES: int(30, 1),
  REFRESH_TOKEN_EXPIRE_DAYS: int(7, 1),
  ENABLE_PASSWORD_AUTH: flag(true),

  GITHUB_CLIENT_ID: credential,
  GITHUB_CLIENT_SECRET: credential,
  GOOGLE_CLIENT_ID: credential,
  GOOGLE_CLIENT_SECRET: credential,
  MICROSOFT_CLIENT_ID: credential,
  MICROSOFT_CLIENT_SECRET: credential,
  MICROSOFT_TENANT: credential,
  OAUTH_HTTP_TIMEOUT_MS: int(10_000, 1),

  DATABASE_PATH: z.string().min(1).default('./data/app.db'),

  QUEUE_WORKER_ENABLED: flag(true),
  QUEUE_POLL_INTERVAL_MS: int(1000, 10),
  QUEUE_MAX_CONCURRENCY: int(5, 1),

  ADMIN_NAME: z.string().default('admin'),
  ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  ADMIN_USERNAME: z.string().default('admin'),
  ADMIN_PASSWORD: z.string().default(''),
});

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  if (vars.ENVIRONMENT !== 'local' && vars.SECRET_KEY === DEFAULT_SECRET_KEY) {
    throw new Error(`Invalid configuration: SECRET_KEY must be set when ENVIRONMENT=${vars.ENVIRONMENT}`);
  }

  const config: AppConfig = {
    environment: vars.ENVIRONMENT,
    port: vars.PORT,
    backendHost: vars.APP_BACKEND_HOST.replace(/\/+$/, ''),
    corsOrigins: vars.CORS_ORIGINS,
    trustProxy: vars.TRUST_PROXY,
    logLevels: vars.LOG_LEVELS,
    auth: {
      secretKey: vars.SECRET_KEY,
      accessTokenExpireMinutes: vars.ACCESS_TOKEN_EXPIRE_MINUTES,
      refreshTokenExpireDays: vars.REFRESH_TOKEN_EXPIRE_DAYS,
      enablePasswordAuth: vars.ENABLE_PASSWORD_AUTH,
    },
    oauth: {
      github: {
        clientId: vars.GITHUB_CLIENT_ID,
        clientSecret: vars.GITHUB_CLIENT_SECRET,
      },
      google: {
        clientId: vars.GOOGLE_CLIENT_ID,
        clientSecret: vars.GOOGLE_CLIENT_SECRET,
      },
      microsoft: {
        clientId: vars.MICROSOFT_CLIENT_ID,
        clientSecret: vars.MICROSOFT_CLIENT_SECRET,
        tenant: vars.MICROSOFT_TENANT,
      },
      httpTimeoutMs: vars.OAUTH_HTTP_TIMEOUT_MS,
    },
    database: {
      path: vars.DATABASE_PATH,
    },
    queue: {
      workerEnabled: vars.QUEUE_WORKER_ENABLED,
      pollIntervalMs: vars.QUEUE_POLL_INTERVAL_MS,
      maxConcurrency: vars.QUEUE_MAX_CONCURRENCY,
    },
    firstUser: {
      name: vars.ADMIN_NAME,
      email: vars.ADMIN_EMAIL,
      username: vars.ADMIN_USERNAME,
      password: vars.ADMIN_PASSWORD,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
