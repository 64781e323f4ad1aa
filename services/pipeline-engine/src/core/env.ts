import 'dotenv/config';

import { z } from 'zod';

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}, z.string().optional());

const optionalEmail = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}, z.string().email().optional());

const optionalUrl = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}, z.string().url().optional());

const emailList = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}, z.array(z.string().email()));

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  PROJECT_NAME: z.string().min(1).default('telco-churn-prediction'),
  PIPELINE_FILE: optionalString,
  WORKSPACE_DIR: z.string().default('.'),

  // Build metadata a CI server injects; left empty on local runs.
  BUILD_NUMBER: optionalString,
  BUILD_URL: optionalUrl,
  GIT_BRANCH: optionalString,
  GIT_COMMIT: optionalString,

  DOCKER_REGISTRY: z.string().default('docker.io'),
  DOCKER_IMAGE_NAME: z.string().min(1).default('telco-churn-prediction'),
  REGISTRY_CREDENTIALS_ID: z.string().min(1).default('docker-hub-credentials'),
  CREDENTIALS_FILE: optionalString,
  CREDENTIALS_ENCRYPTION_KEY: optionalString,

  APP_CONTAINER_PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  STAGING_CONTAINER_NAME: z.string().min(1).default('telco-churn-staging'),
  STAGING_HOST: z.string().default('localhost'),
  STAGING_PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  TEST_CONTAINER_PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  HEALTHCHECK_PATH: z.string().startsWith('/').default('/health'),
  HEALTHCHECK_TIMEOUT_SECONDS: z.coerce.number().int().min(1).max(600).default(30),
  HEALTHCHECK_INTERVAL_MS: z.coerce.number().int().min(100).max(60_000).default(2000),
  HEALTHCHECK_EXPECT_BODY: booleanFromEnv.default(true),
  DEPLOY_SETTLE_MS: z.coerce.number().int().min(0).max(120_000).default(10_000),
  STAGE_TIMEOUT_SECONDS: z.coerce.number().int().min(1).max(24 * 3600).default(1800),

  SMTP_HOST: z.string().default(''),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  SMTP_SECURE: booleanFromEnv.optional(),
  SMTP_USER: z.string().default(''),
  SMTP_PASS: z.string().default(''),
  SMTP_FROM_EMAIL: optionalEmail,
  SMTP_FROM_NAME: optionalString.default('Telco Churn Pipeline'),
  NOTIFY_RECIPIENTS: emailList.default([]),

  REDIS_URL: optionalUrl,
  DEPLOY_LOCK_TTL_SECONDS: z.coerce.number().int().min(30).max(24 * 3600).default(30 * 60),
  PUSHGATEWAY_URL: optionalUrl,
});

export type PipelineEnv = ReturnType<typeof loadEnv>;

export const loadEnv = (source: NodeJS.ProcessEnv = process.env) => {
  const parsed = schema.parse(source);

  return {
    ...parsed,
    SMTP_SECURE: parsed.SMTP_SECURE ?? parsed.SMTP_PORT === 465,
  };
};

export const env = loadEnv();
