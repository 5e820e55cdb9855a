// This module loads process configuration once at startup from environment, optional .env file, and flags.

import { parseArgs } from 'node:util';
import { config as loadDotEnv } from 'dotenv';
import { z } from 'zod';
import type { AppConfig } from '../types/domain.js';

// This error carries every configuration problem at once so operators can fix them in one pass.
export class ConfigError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ADO_URL: z.string({ required_error: 'ADO_URL is required' }).trim().url('ADO_URL must be an absolute URL'),
  ADO_TOKEN: z.string({ required_error: 'ADO_TOKEN is required' }).trim().min(1, 'ADO_TOKEN is required'),
  ADO_ORG: optionalText,
  ADO_PROJECT: optionalText,
  ADO_RELEASE_URL: z.string().trim().url('ADO_RELEASE_URL must be an absolute URL').optional(),
  ADO_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).default(30_000),
  ADO_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  ADO_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),
  MCP_SESSION_QUEUE_CAPACITY: z.coerce.number().int().min(1).max(10_000).default(10),
  MCP_SSE_KEEPALIVE_MS: z.coerce.number().int().min(0).default(25_000)
});

// This helper drops empty strings so blank variables fall back to defaults instead of failing coercion.
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }

  return result;
}

// This helper reads the --port flag; unknown flags are ignored so wrappers can pass their own.
export function readPortFlag(argv: string[]): string | undefined {
  const { values } = parseArgs({
    args: argv,
    options: {
      port: { type: 'string', short: 'p' }
    },
    strict: false,
    allowPositionals: true
  });

  return typeof values.port === 'string' ? values.port : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = []): AppConfig {
  const source = withoutBlankValues(env);
  const portFlag = readPortFlag(argv);
  if (portFlag !== undefined) {
    source.PORT = portFlag;
  }

  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    azureDevOps: {
      baseUrl: values.ADO_URL,
      organization: values.ADO_ORG,
      project: values.ADO_PROJECT,
      releaseBaseUrl: values.ADO_RELEASE_URL,
      token: values.ADO_TOKEN,
      requestTimeoutMs: values.ADO_REQUEST_TIMEOUT_MS,
      maxRetries: values.ADO_MAX_RETRIES,
      retryBaseDelayMs: values.ADO_RETRY_BASE_DELAY_MS
    },
    transport: {
      sessionQueueCapacity: values.MCP_SESSION_QUEUE_CAPACITY,
      keepAliveMs: values.MCP_SSE_KEEPALIVE_MS
    }
  };
}

// This helper loads an optional .env file into process.env without overriding variables already set.
export function loadEnvFile(path?: string): void {
  loadDotEnv(path ? { path } : undefined);
}
