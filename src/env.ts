import { config } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_GENERIC_SOURCE_URLS, DEFAULT_LIMITS, DEFAULT_USER_AGENT, PATHS } from './shared/constants.js';
import { ConfigError } from './shared/errors.js';

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(defaultValue)
    .transform((v) => v === 'true');

/** Empty strings from a `.env` template count as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

/**
 * Schema for all environment variables consumed by the service.
 * Every variable has a default except the Discord credentials, whose
 * combination is checked when the notifier is built.
 */
const envSchema = z.object({
  // ---------- General ----------
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // ---------- Database ----------
  DATABASE_PATH: z.string().min(1).default(PATHS.DATABASE),

  // ---------- Scraping ----------
  SCRAPE_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, 'SCRAPE_INTERVAL_MINUTES must be at least 1')
    .default(DEFAULT_LIMITS.SCRAPE_INTERVAL_MINUTES),
  MAX_CONCURRENT_COLLECTORS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_LIMITS.MAX_CONCURRENT_COLLECTORS),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  /** Comma-separated list of deal pages for the generic collector */
  GENERIC_SOURCE_URLS: z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === '') {
        return [...DEFAULT_GENERIC_SOURCE_URLS];
      }
      const urls = v
        .split(',')
        .map((u) => u.trim())
        .filter((u) => u.length > 0);
      for (const url of urls) {
        if (!z.string().url().safeParse(url).success) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid URL: ${url}` });
        }
      }
      return urls;
    }),

  // ---------- Validation ----------
  VALIDATION_ENABLED: booleanFlag('true'),
  VALIDATION_TIMEOUT_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_LIMITS.VALIDATION_TIMEOUT_SECONDS),

  // ---------- Notifications ----------
  DISCORD_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  DISCORD_TOKEN: optionalString,
  DISCORD_CHANNEL_ID: optionalString.pipe(
    z.string().regex(/^\d+$/, 'DISCORD_CHANNEL_ID must be a numeric snowflake').optional(),
  ),

  // ---------- HTTP API ----------
  API_ENABLED: booleanFlag('true'),
  API_PORT: z.coerce.number().int().min(1024).max(65535).default(8080),
  /** Requests per minute per client */
  API_RATE_LIMIT: z.coerce.number().int().positive().default(60),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates an environment record. Throws a ConfigError naming the first
 * offending variable; the full list of issues is in the message.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    const firstKey = result.error.issues[0]?.path.join('.') ?? 'env';

    throw new ConfigError(`Invalid environment variables:\n${formatted}`, firstKey);
  }

  return result.data;
}

/**
 * Loads `.env` into process.env, then validates it.
 */
export function loadEnv(): Env {
  config();
  return parseEnv(process.env);
}

/** Values the pipeline core consumes, resolved from the environment. */
export interface PipelineConfig {
  scrapeIntervalMinutes: number;
  maxConcurrentCollectors: number;
  validationEnabled: boolean;
  validationTimeoutMs: number;
  userAgent: string;
  genericSourceUrls: string[];
}

export function toPipelineConfig(env: Env): PipelineConfig {
  return {
    scrapeIntervalMinutes: env.SCRAPE_INTERVAL_MINUTES,
    maxConcurrentCollectors: env.MAX_CONCURRENT_COLLECTORS,
    validationEnabled: env.VALIDATION_ENABLED,
    validationTimeoutMs: env.VALIDATION_TIMEOUT_SECONDS * 1000,
    userAgent: env.USER_AGENT,
    genericSourceUrls: env.GENERIC_SOURCE_URLS,
  };
}
