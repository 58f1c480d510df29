import { z } from 'zod';
import { ConfigurationError } from '../errors/categories.js';
import type { Logger } from '../resilience/hooks.js';

export interface TelemetryConfig {
  /** Endpoint that receives JSON telemetry events. */
  ingestUrl: string;
}

export interface AssistantsConfig {
  apiKey: string;
  baseUrl?: string;
  organizationId?: string;
  projectId?: string;
  /** Milliseconds. */
  timeout?: number;
  maxRetries?: number;
  /** Initial backoff in milliseconds; doubles on each retry. */
  retryDelay?: number;
  /** Check documented request limits locally before sending. */
  validateRequests?: boolean;
  /** Receives request, retry and failure lines when set. */
  logger?: Logger;
  telemetry?: TelemetryConfig;
}

export interface NormalizedConfig {
  apiKey: string;
  baseUrl: string;
  organizationId?: string;
  projectId?: string;
  timeout: number;
  maxRetries: number;
  retryDelay: number;
  validateRequests: boolean;
  logger?: Logger;
  telemetry?: TelemetryConfig;
}

export const DEFAULT_CONFIG: Omit<NormalizedConfig, 'apiKey'> = {
  baseUrl: 'https://api.openai.com',
  timeout: 60000,
  maxRetries: 3,
  retryDelay: 1000,
  validateRequests: false,
};

const loggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    ['debug', 'info', 'warn', 'error'].every((level) => level in value),
  { message: 'logger must provide debug, info, warn and error' }
);

const configSchema = z.object({
  apiKey: z.string({ required_error: 'API key is required' }).trim().min(1, 'API key cannot be empty'),
  baseUrl: z.string().url('Base URL must be a valid URL').optional(),
  organizationId: z.string().optional(),
  projectId: z.string().optional(),
  timeout: z.number().positive('Timeout must be positive').optional(),
  maxRetries: z.number().int().min(0, 'Max retries must be non-negative').optional(),
  retryDelay: z.number().min(0, 'Retry delay must be non-negative').optional(),
  validateRequests: z.boolean().optional(),
  logger: loggerSchema.optional(),
  telemetry: z
    .object({ ingestUrl: z.string().url('Telemetry ingest URL must be a valid URL') })
    .optional(),
});

export function validateConfig(config: unknown): asserts config is AssistantsConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(issue?.message ?? 'Invalid configuration', {
      param: issue?.path.join('.'),
    });
  }
}

export function normalizeConfig(config: AssistantsConfig): NormalizedConfig {
  return {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl ?? DEFAULT_CONFIG.baseUrl,
    organizationId: config.organizationId,
    projectId: config.projectId,
    timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
    retryDelay: config.retryDelay ?? DEFAULT_CONFIG.retryDelay,
    validateRequests: config.validateRequests ?? DEFAULT_CONFIG.validateRequests,
    logger: config.logger,
    telemetry: config.telemetry,
  };
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AssistantsConfig {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY environment variable is not set', { param: 'apiKey' });
  }
  const ingestUrl = env.TELEMETRY_INGEST_URL;
  return {
    apiKey,
    organizationId: env.OPENAI_ORG_ID,
    projectId: env.OPENAI_PROJECT_ID,
    baseUrl: env.OPENAI_BASE_URL,
    telemetry: ingestUrl ? { ingestUrl } : undefined,
  };
}
