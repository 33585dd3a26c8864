import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_MAX_FETCH_ITERATIONS = 2;

const envSchema = z.object({
  DATA_DIR: z
    .string({ required_error: 'DATA_DIR environment variable not set or empty' })
    .trim()
    .min(1, 'DATA_DIR environment variable not set or empty'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  QUERY_API_URL: z.string().url().default('https://api.dune.com'),
  QUERY_API_KEY: z.string().min(1).optional(),
  QUERY_ID: z.coerce.number().int().positive().optional(),
  QUERY_ADDRESS_COLUMN: z.string().min(1).default('addresses'),
  QUERY_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  QUERY_EXECUTION_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  QUERY_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(2_000),
  MAX_FETCH_ITERATIONS: z.coerce.number().int().positive().default(DEFAULT_MAX_FETCH_ITERATIONS),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const message = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
    throw new ConfigurationError(message);
  }
  return parsed.data;
}

/** Settings the query client needs; only checked when a fetch is requested. */
export interface QueryConfig {
  apiUrl: string;
  apiKey: string;
  queryId: number;
  requestTimeoutMs: number;
  executionTimeoutMs: number;
  pollIntervalMs: number;
}

export function requireQueryConfig(config: Config): QueryConfig {
  if (!config.QUERY_API_KEY) {
    throw new ConfigurationError('QUERY_API_KEY is required with --force-update');
  }
  if (config.QUERY_ID === undefined) {
    throw new ConfigurationError('QUERY_ID is required with --force-update');
  }
  return {
    apiUrl: config.QUERY_API_URL,
    apiKey: config.QUERY_API_KEY,
    queryId: config.QUERY_ID,
    requestTimeoutMs: config.QUERY_REQUEST_TIMEOUT_MS,
    executionTimeoutMs: config.QUERY_EXECUTION_TIMEOUT_MS,
    pollIntervalMs: config.QUERY_POLL_INTERVAL_MS,
  };
}
