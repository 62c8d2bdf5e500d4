/**
 * Configuration from environment variables, validated with Zod.
 *
 * loadConfig() is pure: callers decide where the environment comes from
 * (the CLI loads .env through dotenv first).
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const ConfigSchema = z.object({
  // Language model
  LLM_API_KEY: z.string().min(1).optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(3).default(3),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(512),

  // Database
  DATABASE_PATH: z.string().min(1).default('customers.db'),
  SCHEMA_PATH: z.string().min(1).optional(),
  QUERY_MAX_ROWS: z.coerce.number().int().positive().default(5000),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // Input bounds
  MAX_SQL_LENGTH: z.coerce.number().int().positive().default(2000),
  MAX_QUESTION_LENGTH: z.coerce.number().int().positive().default(500),

  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

type RawConfig = z.infer<typeof ConfigSchema>;

export interface LlmConfig {
  apiKey?: string;
  baseURL?: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
  temperature: number;
  maxTokens: number;
}

export interface DatabaseConfig {
  path: string;
  maxRows: number;
  timeoutMs: number;
}

export interface Config {
  llm: LlmConfig;
  database: DatabaseConfig;
  schemaPath?: string;
  maxSqlLength: number;
  maxQuestionLength: number;
  logLevel: RawConfig['LOG_LEVEL'];
}

// Empty strings in .env files mean "unset".
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      out[key] = value;
    }
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const raw = parsed.data;
  return {
    llm: {
      apiKey: raw.LLM_API_KEY,
      baseURL: raw.LLM_BASE_URL,
      model: raw.LLM_MODEL,
      timeoutMs: raw.LLM_TIMEOUT_MS,
      maxAttempts: raw.LLM_MAX_ATTEMPTS,
      temperature: raw.LLM_TEMPERATURE,
      maxTokens: raw.LLM_MAX_TOKENS,
    },
    database: {
      path: raw.DATABASE_PATH,
      maxRows: raw.QUERY_MAX_ROWS,
      timeoutMs: raw.QUERY_TIMEOUT_MS,
    },
    schemaPath: raw.SCHEMA_PATH,
    maxSqlLength: raw.MAX_SQL_LENGTH,
    maxQuestionLength: raw.MAX_QUESTION_LENGTH,
    logLevel: raw.LOG_LEVEL,
  };
}
