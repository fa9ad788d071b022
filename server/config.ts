/**
 * Application configuration
 *
 * Parses process.env once into a typed AppConfig. Entry points call
 * `config()` from dotenv before importing this module so that .env values
 * are visible here.
 */

import { z } from 'zod';

export const SERVICE_NAME = 'forecast-api';
export const SERVICE_VERSION = '1.0.0';

const booleanFlag = z
  .string()
  .optional()
  .transform((val) => (val === undefined ? undefined : ['1', 'true', 'yes'].includes(val.toLowerCase())));

const blankToUndefined = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : val.trim()));

export const DATA_BACKENDS = ['parquet', 'database', 'cloud'] as const;
export type DataBackendKind = (typeof DATA_BACKENDS)[number];

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  API_PREFIX: z
    .string()
    .regex(/^\/[a-zA-Z0-9/_-]*$/, 'must start with "/"')
    .default('/api/v1'),
  API_KEY: blankToUndefined,

  DATA_BACKEND: z
    .string()
    .optional()
    .transform((val) => val?.toLowerCase())
    .pipe(z.enum(DATA_BACKENDS).optional()),
  DATA_PATH: z.string().default('data/sample'),
  USE_LOCAL_DATA: booleanFlag,

  DATABASE_URL: blankToUndefined,
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().default(5432),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: blankToUndefined,
  POSTGRES_DATABASE: z.string().default('forecasts'),

  CLOUD_BUCKET_NAME: blankToUndefined,
  CLOUD_BUCKET_REGION: z.string().default('eu-north-1'),
  CLOUD_DATA_PREFIX: z.string().default('api_ready/'),
  CLOUD_DATA_KEY: blankToUndefined,
  AWS_ACCESS_KEY_ID: blankToUndefined,
  AWS_SECRET_ACCESS_KEY: blankToUndefined,

  CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(3600),
  CACHE_MAX_SIZE: z.coerce.number().int().min(1).default(16),

  BACKEND_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  BACKEND_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  BACKEND_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),

  ALLOW_FULL_SCAN: booleanFlag,
});

export interface RetryPolicy {
  /** Attempts after the first one */
  maxRetries: number;
  baseDelayMs: number;
  timeoutMs: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  apiPrefix: string;
  apiKey?: string;
  dataBackend: DataBackendKind;
  useLocalData: boolean;
  dataPath: string;
  databaseUrl?: string;
  cloud: {
    bucketName?: string;
    region: string;
    dataPrefix: string;
    dataKey?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
  };
  cache: {
    ttlMs: number;
    maxEntries: number;
  };
  retry: RetryPolicy;
  allowFullScan: boolean;
}

/**
 * Build the connection string for the relational backend.
 * DATABASE_URL wins; otherwise POSTGRES_PASSWORD must be set explicitly.
 */
function resolveDatabaseUrl(env: z.infer<typeof EnvSchema>): string | undefined {
  if (env.DATABASE_URL) return env.DATABASE_URL;
  if (!env.POSTGRES_PASSWORD) return undefined;
  const password = encodeURIComponent(env.POSTGRES_PASSWORD);
  return `postgresql://${env.POSTGRES_USER}:${password}@${env.POSTGRES_HOST}:${env.POSTGRES_PORT}/${env.POSTGRES_DATABASE}`;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const detail = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const env = result.data;

  // DATA_BACKEND unset: the legacy USE_LOCAL_DATA flag picks between local
  // parquet files and the cloud bucket.
  const dataBackend: DataBackendKind =
    env.DATA_BACKEND ?? (env.USE_LOCAL_DATA === false ? 'cloud' : 'parquet');

  const config: AppConfig = {
    env: env.NODE_ENV,
    port: env.PORT,
    apiPrefix: env.API_PREFIX.replace(/\/+$/, '') || '/',
    apiKey: env.API_KEY,
    dataBackend,
    useLocalData: env.USE_LOCAL_DATA ?? false,
    dataPath: env.DATA_PATH,
    databaseUrl: resolveDatabaseUrl(env),
    cloud: {
      bucketName: env.CLOUD_BUCKET_NAME,
      region: env.CLOUD_BUCKET_REGION,
      dataPrefix: env.CLOUD_DATA_PREFIX,
      dataKey: env.CLOUD_DATA_KEY,
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    },
    cache: {
      ttlMs: env.CACHE_TTL_SECONDS * 1000,
      maxEntries: env.CACHE_MAX_SIZE,
    },
    retry: {
      maxRetries: env.BACKEND_MAX_RETRIES,
      baseDelayMs: env.BACKEND_RETRY_BASE_DELAY_MS,
      timeoutMs: env.BACKEND_TIMEOUT_MS,
    },
    allowFullScan: env.ALLOW_FULL_SCAN ?? true,
  };

  return Object.freeze(config);
}
