/**
 * Configuration management for the brand evidence engine
 * Uses Zod for runtime validation of environment variables
 */

import { config as dotenvConfig } from 'dotenv';
import { EnvConfig, EnvConfigSchema } from './schemas.js';
import { getErrorMessage } from './errors.js';

// Load environment variables
dotenvConfig();

/**
 * Get environment variable with type safety
 */
export function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get number from environment
 */
export function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new Error(`Invalid number for ${key}: ${value}`);
  }
  return num;
}

/**
 * Get boolean from environment
 */
export function getEnvBoolean(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

/**
 * Validate environment variables with Zod
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(source);
  if (!result.success) {
    // Use console.error to avoid circular dependency with logger
    const detail = getErrorMessage(result.error);
    console.error('Environment validation failed:', detail);
    throw new Error(`Invalid environment configuration: ${detail}`);
  }
  return result.data;
}

/** Shape the validated environment into grouped settings */
export function buildConfig(env: EnvConfig) {
  return {
    // Registration probe
    probe: {
      concurrency: env.PROBE_CONCURRENCY,
      lookupTimeoutMs: env.LOOKUP_TIMEOUT_MS,
      deadlineMs: env.PROBE_DEADLINE_MS,
    },

    // RDAP registration lookups
    rdap: {
      baseUrl: env.RDAP_BASE_URL,
      retries: env.LOOKUP_RETRIES,
      timeoutMs: env.LOOKUP_TIMEOUT_MS,
      cacheTtlMs: env.RDAP_CACHE_TTL_MS,
    },

    // DNS lookups
    dns: {
      timeoutMs: env.DNS_TIMEOUT_MS,
    },

    // Report rendering
    reports: {
      analyst: env.REPORT_ANALYST,
    },

    // Server
    server: {
      port: env.PORT,
      environment: env.NODE_ENV,
      apiKey: env.API_KEY,
    },
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;

// Validate environment on module load
const env = validateEnvironment();

/**
 * Application configuration (validated with Zod)
 */
export const config: AppConfig = buildConfig(env);

/**
 * Check if running in production
 */
export function isProduction(): boolean {
  return config.server.environment === 'production';
}
