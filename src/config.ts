/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(15),

  // API Keys (provider-specific)
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),

  // Database Configuration
  DATABASE_TYPE: z.enum(['sqlite3', 'pg', 'mysql2']).default('mysql2'),
  DATABASE_PATH: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  DB_NAME: z.string().optional().describe('Database name shown to the agent'),
  ALLOWED_TABLES: z
    .string()
    .optional()
    .describe('Comma separated list of tables the agent may see (default: all)'),

  // Tool Configuration
  DEFAULT_LIMIT: z.coerce.number().int().positive().default(10),
  MAX_LIMIT: z.coerce.number().int().positive().default(1000),
  MAX_QUESTION_LENGTH: z.coerce.number().int().positive().default(2000),
  DEFAULT_RATE_LIMIT: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_IDLE_WINDOWS: z.coerce.number().int().positive().default(5),
  REDIS_URL: z
    .string()
    .url()
    .optional()
    .describe('Connection string for the shared rate limit store (e.g. redis://localhost:6379)'),

  // Server Configuration
  APP_VERSION: z.string().default('v:1.0'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

export type LLMProvider = BaseConfig['LLM_PROVIDER'];

/**
 * Extended configuration with parsed KNEX_CONFIG and LLM_CONFIG.
 */
export interface Config extends Omit<BaseConfig,
  'DATABASE_TYPE' | 'DATABASE_PATH' | 'DATABASE_URL' | 'ALLOWED_TABLES' |
  'LLM_PROVIDER' | 'LLM_MODEL' | 'LLM_TEMPERATURE' | 'LLM_TIMEOUT_MS' | 'LLM_MAX_RETRIES' |
  'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'
> {
  KNEX_CONFIG: Knex.Config;
  DATABASE_LABEL: string;
  ALLOWED_TABLES: string[] | null;
  LLM_CONFIG: {
    provider: LLMProvider;
    model: string;
    apiKey: string;
    temperature: number;
    timeoutMs: number;
    maxRetries: number;
  };
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

/**
 * Parse and validate configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  let baseConfig: BaseConfig;

  try {
    baseConfig = ConfigSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }

  // Build Knex config based on database type
  let knexConfig: Knex.Config;

  switch (baseConfig.DATABASE_TYPE) {
    case 'sqlite3':
      if (!baseConfig.DATABASE_PATH) {
        fail('DATABASE_PATH is required when DATABASE_TYPE is sqlite3');
      }
      knexConfig = {
        client: 'better-sqlite3',
        connection: {
          filename: baseConfig.DATABASE_PATH,
        },
        useNullAsDefault: true,
      };
      break;

    case 'pg':
      if (!baseConfig.DATABASE_URL) {
        fail('DATABASE_URL is required when DATABASE_TYPE is pg');
      }
      knexConfig = {
        client: 'pg',
        connection: baseConfig.DATABASE_URL,
        pool: { min: 2, max: 10 },
      };
      break;

    case 'mysql2':
      if (!baseConfig.DATABASE_URL) {
        fail('DATABASE_URL is required when DATABASE_TYPE is mysql2');
      }
      knexConfig = {
        client: 'mysql2',
        connection: baseConfig.DATABASE_URL,
        pool: { min: 2, max: 10 },
      };
      break;
  }

  // Determine API key based on provider
  let llmApiKey: string;
  switch (baseConfig.LLM_PROVIDER) {
    case 'openai':
      if (!baseConfig.OPENAI_API_KEY) {
        fail('OPENAI_API_KEY is required when LLM_PROVIDER is openai');
      }
      llmApiKey = baseConfig.OPENAI_API_KEY;
      break;
    case 'anthropic':
      if (!baseConfig.ANTHROPIC_API_KEY) {
        fail('ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic');
      }
      llmApiKey = baseConfig.ANTHROPIC_API_KEY;
      break;
  }

  if (baseConfig.DEFAULT_LIMIT > baseConfig.MAX_LIMIT) {
    fail('DEFAULT_LIMIT must not exceed MAX_LIMIT');
  }

  const allowedTables = baseConfig.ALLOWED_TABLES
    ? baseConfig.ALLOWED_TABLES.split(',').map((t) => t.trim()).filter((t) => t.length > 0)
    : null;

  const {
    DATABASE_TYPE,
    DATABASE_PATH,
    DATABASE_URL,
    ALLOWED_TABLES,
    LLM_PROVIDER,
    LLM_MODEL,
    LLM_TEMPERATURE,
    LLM_TIMEOUT_MS,
    LLM_MAX_RETRIES,
    OPENAI_API_KEY,
    ANTHROPIC_API_KEY,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    KNEX_CONFIG: knexConfig,
    DATABASE_LABEL: rest.DB_NAME ?? DATABASE_TYPE,
    ALLOWED_TABLES: allowedTables && allowedTables.length > 0 ? allowedTables : null,
    LLM_CONFIG: {
      provider: LLM_PROVIDER,
      model: LLM_MODEL,
      apiKey: llmApiKey,
      temperature: LLM_TEMPERATURE,
      timeoutMs: LLM_TIMEOUT_MS,
      maxRetries: LLM_MAX_RETRIES,
    },
  };
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
