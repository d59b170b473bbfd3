/**
 * Configuration Module
 *
 * Environment-driven settings, parsed and validated with zod. Every invalid
 * key is reported in a single ConfigurationFailure.
 */

import { z } from 'zod';
import { ConfigurationFailure } from '../errors/index.js';

// ============================================================================
// Schema
// ============================================================================

/** Case-insensitive; an empty value counts as unset */
const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const normalized = value?.trim().toLowerCase();
      return normalized === '' ? undefined : normalized;
    })
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']).optional())
    .transform((value) => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const envSchema = z.object({
  APP_NAME: z.string().min(1).default('HR Document Studio'),
  APP_VERSION: z.string().min(1).default('1.0.0'),
  APP_ENV: z.enum(['development', 'staging', 'production']).default('development'),
  DEBUG: booleanFlag(false),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['json', 'text']).optional(),

  LOCAL_MODEL_BASE_URL: z.string().url().default('http://localhost:11434'),
  LOCAL_MODEL_NAME: z.string().min(1).default('deepseek-r1:8b'),
  LOCAL_MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LOCAL_MODEL_MAX_TOKENS: z.coerce.number().int().min(100).max(8000).default(2000),
  LOCAL_MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  CLOUD_API_KEY: optionalString,
  CLOUD_API_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  CLOUD_MODEL_NAME: z.string().min(1).default('llama-3.3-70b-versatile'),
  CLOUD_MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  CLOUD_MODEL_MAX_TOKENS: z.coerce.number().int().min(100).max(8000).default(2000),
  CLOUD_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),

  PROMPTS_DIR: z.string().min(1).default('./prompts'),
  TEMPLATES_DIR: z.string().min(1).default('./templates'),

  PDF_PRIMARY_ENABLED: booleanFlag(true),
  PDF_CHROMIUM_PATH: optionalString,

  STORAGE_DRIVER: z.enum(['memory', 's3']).default('memory'),
  S3_BUCKET: optionalString,
  S3_PREFIX: z.string().min(1).default('records'),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  S3_ENDPOINT: optionalString,
  S3_FORCE_PATH_STYLE: booleanFlag(false),
});

// ============================================================================
// Types
// ============================================================================

export interface LocalModelSettings {
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface CloudModelSettings {
  apiKey?: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export type StorageSettings =
  | { driver: 'memory' }
  | {
      driver: 's3';
      bucket: string;
      prefix: string;
      region: string;
      endpoint?: string;
      forcePathStyle: boolean;
    };

export interface AppConfig {
  appName: string;
  version: string;
  environment: 'development' | 'staging' | 'production';
  debug: boolean;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  logFormat: 'json' | 'text';
  local: LocalModelSettings;
  cloud: CloudModelSettings;
  retryMaxAttempts: number;
  promptsDir: string;
  templatesDir: string;
  pdf: {
    primaryEnabled: boolean;
    chromiumPath?: string;
  };
  storage: StorageSettings;
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Parse settings from an environment map (defaults to process.env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const keys = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationFailure(`Invalid configuration: ${keys.join('; ')}`, {
      code: 'INVALID_CONFIGURATION',
    });
  }

  const e = parsed.data;

  let storage: StorageSettings = { driver: 'memory' };
  if (e.STORAGE_DRIVER === 's3') {
    if (e.S3_BUCKET === undefined) {
      throw new ConfigurationFailure('Invalid configuration: S3_BUCKET is required when STORAGE_DRIVER=s3', {
        code: 'INVALID_CONFIGURATION',
      });
    }
    storage = {
      driver: 's3',
      bucket: e.S3_BUCKET,
      prefix: e.S3_PREFIX,
      region: e.AWS_REGION,
      endpoint: e.S3_ENDPOINT,
      forcePathStyle: e.S3_FORCE_PATH_STYLE,
    };
  }

  return {
    appName: e.APP_NAME,
    version: e.APP_VERSION,
    environment: e.APP_ENV,
    debug: e.DEBUG,
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT ?? (e.APP_ENV === 'development' ? 'text' : 'json'),
    local: {
      baseUrl: e.LOCAL_MODEL_BASE_URL,
      model: e.LOCAL_MODEL_NAME,
      temperature: e.LOCAL_MODEL_TEMPERATURE,
      maxTokens: e.LOCAL_MODEL_MAX_TOKENS,
      timeoutMs: e.LOCAL_MODEL_TIMEOUT_MS,
    },
    cloud: {
      apiKey: e.CLOUD_API_KEY,
      baseUrl: e.CLOUD_API_BASE_URL,
      model: e.CLOUD_MODEL_NAME,
      temperature: e.CLOUD_MODEL_TEMPERATURE,
      maxTokens: e.CLOUD_MODEL_MAX_TOKENS,
      timeoutMs: e.CLOUD_TIMEOUT_MS,
    },
    retryMaxAttempts: e.RETRY_MAX_ATTEMPTS,
    promptsDir: e.PROMPTS_DIR,
    templatesDir: e.TEMPLATES_DIR,
    pdf: {
      primaryEnabled: e.PDF_PRIMARY_ENABLED,
      chromiumPath: e.PDF_CHROMIUM_PATH,
    },
    storage,
  };
}
