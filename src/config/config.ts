/**
 * Application configuration.
 *
 * Values come from the environment (optionally seeded from a .env file) and
 * are validated with zod. `loadConfig` is pure over the env object it is
 * given so tests can pass a literal.
 */

import { tmpdir } from 'os';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, type PipelineStage } from '../shared/errors.js';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const numberFromEnv = (fallback: number) =>
  z.coerce.number().finite().nonnegative().default(fallback);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  DEEPGRAM_API_KEY: optionalString,
  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  GOOGLE_REDIRECT_URI: optionalString,

  PROCDOC_ANTHROPIC_MODEL: z.string().trim().min(1).default('claude-sonnet-4-5-20250929'),
  PROCDOC_ANTHROPIC_BASE_URL: optionalString,
  PROCDOC_MAX_TOKENS: numberFromEnv(4096),
  PROCDOC_DEEPGRAM_MODEL: z.string().trim().min(1).default('nova-3'),
  PROCDOC_LANGUAGE: optionalString,

  PROCDOC_TRANSCRIPTION_TIMEOUT_MS: numberFromEnv(300_000),
  PROCDOC_ANALYSIS_TIMEOUT_MS: numberFromEnv(120_000),
  PROCDOC_GENERATION_TIMEOUT_MS: numberFromEnv(120_000),
  PROCDOC_FRAME_TIMEOUT_MS: numberFromEnv(10_000),
  PROCDOC_FRAME_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(1),

  PROCDOC_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  PROCDOC_RETRY_BASE_MS: numberFromEnv(1000),

  PROCDOC_WORK_DIR: z.string().trim().min(1).optional(),
  PROCDOC_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug']).default('info'),
  PROCDOC_LOG_FILE: optionalString,
});

export interface DriveConfig {
  enabled: boolean;
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
}

export interface AppConfig {
  anthropic: {
    apiKey?: string;
    model: string;
    baseUrl?: string;
    maxTokens: number;
  };
  deepgram: {
    apiKey?: string;
    model: string;
  };
  language?: string;
  timeouts: {
    transcriptionMs: number;
    analysisMs: number;
    generationMs: number;
    frameMs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  frameConcurrency: number;
  workDir: string;
  drive: DriveConfig;
  logging: {
    level: 'error' | 'warn' | 'info' | 'verbose' | 'debug';
    file?: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const values = parsed.data;

  const driveEnabled = Boolean(
    values.GOOGLE_CLIENT_ID && values.GOOGLE_CLIENT_SECRET && values.GOOGLE_REDIRECT_URI
  );

  return {
    anthropic: {
      apiKey: values.ANTHROPIC_API_KEY,
      model: values.PROCDOC_ANTHROPIC_MODEL,
      baseUrl: values.PROCDOC_ANTHROPIC_BASE_URL,
      maxTokens: values.PROCDOC_MAX_TOKENS,
    },
    deepgram: {
      apiKey: values.DEEPGRAM_API_KEY,
      model: values.PROCDOC_DEEPGRAM_MODEL,
    },
    language: values.PROCDOC_LANGUAGE,
    timeouts: {
      transcriptionMs: values.PROCDOC_TRANSCRIPTION_TIMEOUT_MS,
      analysisMs: values.PROCDOC_ANALYSIS_TIMEOUT_MS,
      generationMs: values.PROCDOC_GENERATION_TIMEOUT_MS,
      frameMs: values.PROCDOC_FRAME_TIMEOUT_MS,
    },
    retry: {
      maxAttempts: values.PROCDOC_RETRY_ATTEMPTS,
      baseDelayMs: values.PROCDOC_RETRY_BASE_MS,
    },
    frameConcurrency: values.PROCDOC_FRAME_CONCURRENCY,
    workDir: values.PROCDOC_WORK_DIR ?? tmpdir(),
    drive: {
      enabled: driveEnabled,
      clientId: driveEnabled ? values.GOOGLE_CLIENT_ID : undefined,
      clientSecret: driveEnabled ? values.GOOGLE_CLIENT_SECRET : undefined,
      redirectUri: driveEnabled ? values.GOOGLE_REDIRECT_URI : undefined,
    },
    logging: {
      level: values.PROCDOC_LOG_LEVEL,
      file: values.PROCDOC_LOG_FILE,
    },
  };
}

/**
 * Load .env (if present) into process.env, then build the config.
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}

const KEY_STAGES: Record<'anthropic' | 'deepgram', { variable: string; stage: PipelineStage }> = {
  anthropic: { variable: 'ANTHROPIC_API_KEY', stage: 'moments' },
  deepgram: { variable: 'DEEPGRAM_API_KEY', stage: 'transcription' },
};

/**
 * Return the API key for a provider or raise a ConfigurationError naming
 * the missing variable.
 */
export function requireApiKey(
  config: AppConfig,
  provider: 'anthropic' | 'deepgram',
  stage: PipelineStage = KEY_STAGES[provider].stage
): string {
  const key = provider === 'anthropic' ? config.anthropic.apiKey : config.deepgram.apiKey;
  if (!key) {
    const { variable } = KEY_STAGES[provider];
    throw new ConfigurationError(
      `${variable} is not set`,
      stage,
      `Set ${variable} in your environment or .env file.`
    );
  }
  return key;
}
