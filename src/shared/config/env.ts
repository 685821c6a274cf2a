import dotenv from 'dotenv';
import { z } from 'zod';
import { AppError } from '../errors/app-error';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

const httpOrHttpsUrlSchema = z.string().trim().url().refine((value) => {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}, 'Must be an HTTP(S) URL.');

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'info',
  LLM_BASE_URL: 'https://llm.test.invalid/v1',
  LLM_API_KEY: 'test-llm-key',
  CHAT_MODEL: 'test-model',
  MODEL_TEMPERATURE: '0.7',
  MAX_TOKENS: '4096',
  TIMEOUT_CHAT_MS: '180000',
  LLM_MAX_RETRIES: '0',
  PARALLEL_API_KEY: 'test-parallel-key',
  PARALLEL_BASE_URL: 'https://search.test.invalid',
  PARALLEL_MAX_RESULTS: '10',
  PARALLEL_MAX_CHARS: '6000',
  PARALLEL_PROCESSOR: 'base',
  PARALLEL_TIMEOUT_MS: '60000',
  MIN_SUBAGENTS: '3',
  MAX_SUBAGENTS: '5',
  MAX_PARALLEL_WORKERS: '5',
  WORKER_MAX_ITERATIONS: '10',
  WORKER_MAX_CALLS_PER_ROUND: '3',
  TOOL_RESULT_MAX_CHARS: '12000',
  OUTPUT_DIR: 'outputs/reports',
};

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Generation service
    LLM_BASE_URL: httpOrHttpsUrlSchema.default('https://api.openai.com/v1'),
    LLM_API_KEY: z.string().optional(),
    CHAT_MODEL: z.string().min(1).default('gpt-4o'),
    MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    MAX_TOKENS: z.coerce.number().int().min(256).max(64000).default(4096),
    TIMEOUT_CHAT_MS: z.coerce.number().int().min(1000).max(900000).default(180000),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

    // Search
    PARALLEL_API_KEY: z.string().optional(),
    PARALLEL_BASE_URL: httpOrHttpsUrlSchema.default('https://api.parallel.ai'),
    PARALLEL_MAX_RESULTS: z.coerce.number().int().min(1).max(40).default(10),
    PARALLEL_MAX_CHARS: z.coerce.number().int().min(100).max(30000).default(6000),
    PARALLEL_PROCESSOR: z.enum(['base', 'pro']).default('base'),
    PARALLEL_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300000).default(60000),

    // Research pipeline
    MIN_SUBAGENTS: z.coerce.number().int().min(1).max(20).default(3),
    MAX_SUBAGENTS: z.coerce.number().int().min(1).max(20).default(5),
    MAX_PARALLEL_WORKERS: z.coerce.number().int().min(1).max(20).default(5),
    WORKER_MAX_ITERATIONS: z.coerce.number().int().min(1).max(50).default(10),
    WORKER_MAX_CALLS_PER_ROUND: z.coerce.number().int().min(1).max(10).default(3),
    TOOL_RESULT_MAX_CHARS: z.coerce.number().int().min(500).max(100000).default(12000),
    OUTPUT_DIR: z.string().min(1).default('outputs/reports'),
  })
  .refine((env) => env.MIN_SUBAGENTS <= env.MAX_SUBAGENTS, {
    message: 'MIN_SUBAGENTS must not exceed MAX_SUBAGENTS',
    path: ['MIN_SUBAGENTS'],
  });

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parse an environment map into validated settings.
 *
 * @throws AppError with code CONFIG_INVALID when any variable fails validation.
 */
export function parseEnv(source: Record<string, string | undefined>): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError('CONFIG_INVALID', `Invalid environment configuration: ${issues.join('; ')}`, parsed.error, {
      issues,
    });
  }
  return parsed.data;
}

const mergedEnv = {
  ...(process.env.NODE_ENV === 'test' ? testDefaults : {}),
  ...process.env,
};

export const config: AppEnv = parseEnv(mergedEnv);
