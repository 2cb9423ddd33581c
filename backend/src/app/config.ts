/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - The result is frozen and passed explicitly into every component;
 *   nothing else reads process.env for application settings.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In the cluster, the ConfigMap/Secret injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv / assets.delivery / records.deleteMissing are unions, not plain strings.
 *   Invalid values ('prod', 'signed') are caught at startup by Zod rather than
 *   silently falling through to the wrong branch.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const AssetDeliverySchema = z.enum(['presigned', 'proxy']).default('presigned');

const LogLevelSchema = z
  .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .default('info');

const DeleteMissingSchema = z.enum(['not_found', 'ignore']).default('not_found');

// z.coerce.boolean() treats "false" as true; only the literal strings count.
const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const OptionalTextSchema = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),

  // Logging / service identity
  LOG_LEVEL: LogLevelSchema,
  SERVICE_NAME: z.string().default('employee-directory'),

  // Presentation
  DISPLAY_NAME: z.string().trim().min(1).default('Employee Directory'),
  SLOGAN: z.string().trim().default(''),
  BACKGROUND_IMAGE_KEY: OptionalTextSchema,

  // Relational store (MySQL)
  DB_HOST: z.string().min(1),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(3306),
  DB_NAME: z.string().min(1),
  DB_USER: z.string().min(1),
  DB_PASSWORD: z.string().min(1),
  DB_POOL_SIZE: z.coerce.number().int().min(1).max(100).default(10),
  DB_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5000),

  // Object store (S3); credentials come from the AWS SDK provider chain
  ASSET_BUCKET: OptionalTextSchema,
  ASSET_REGION: z.string().min(1).default('us-east-1'),
  ASSET_ENDPOINT: OptionalTextSchema,
  ASSET_DELIVERY: AssetDeliverySchema,
  ASSET_URL_TTL_SECONDS: z.coerce.number().int().min(60).max(604800).default(900),
  ASSET_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(3000),

  // Record policy
  DELETE_MISSING: DeleteMissingSchema,

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanFlagSchema,
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type AssetDelivery = z.infer<typeof AssetDeliverySchema>;
export type DeleteMissingPolicy = z.infer<typeof DeleteMissingSchema>;

export type DbConfig = Readonly<{
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
  poolSize: number;
  timeoutMs: number;
}>;

export type AssetConfig = Readonly<{
  bucket: string | null;
  region: string;
  endpoint: string | null;
  delivery: AssetDelivery;
  urlTtlSeconds: number;
  timeoutMs: number;
}>;

export type AppConfig = Readonly<{
  nodeEnv: NodeEnv;
  port: number;
  host: string;

  logLevel: LogLevel;
  serviceName: string;

  displayName: string;
  slogan: string;
  backgroundImageKey: string | null;

  db: DbConfig;
  assets: AssetConfig;

  records: Readonly<{
    deleteMissing: DeleteMissingPolicy;
  }>;

  seed: Readonly<{
    enabled: boolean;
  }>;
}>;

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    displayName: parsed.DISPLAY_NAME,
    slogan: parsed.SLOGAN,
    backgroundImageKey: parsed.BACKGROUND_IMAGE_KEY,

    db: Object.freeze({
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      name: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      poolSize: parsed.DB_POOL_SIZE,
      timeoutMs: parsed.DB_TIMEOUT_MS,
    }),

    assets: Object.freeze({
      bucket: parsed.ASSET_BUCKET,
      region: parsed.ASSET_REGION,
      endpoint: parsed.ASSET_ENDPOINT,
      delivery: parsed.ASSET_DELIVERY,
      urlTtlSeconds: parsed.ASSET_URL_TTL_SECONDS,
      timeoutMs: parsed.ASSET_TIMEOUT_MS,
    }),

    records: Object.freeze({
      deleteMissing: parsed.DELETE_MISSING,
    }),

    seed: Object.freeze({
      enabled: parsed.SEED_ON_START,
    }),
  });
}

/**
 * Log-safe view of the config (no credentials).
 */
export function describeConfig(config: AppConfig) {
  return {
    env: config.nodeEnv,
    service: config.serviceName,
    port: config.port,
    host: config.host,
    displayName: config.displayName,
    backgroundImageKey: config.backgroundImageKey,
    db: {
      host: config.db.host,
      port: config.db.port,
      name: config.db.name,
      user: config.db.user,
    },
    assets: {
      bucket: config.assets.bucket,
      region: config.assets.region,
      delivery: config.assets.delivery,
    },
    deleteMissing: config.records.deleteMissing,
  };
}
