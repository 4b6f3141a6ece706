/**
 * Connector configuration: environment + explicit overrides, validated with zod
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { ConnectorOptions } from './types.js';

export const VERSION = '1.0.0';

export const DEFAULT_BASE_URL = 'https://zonecruncher.com/api/v1';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const connectorOptionsSchema = z.object({
  apiKey: z.string().trim().default(''),
  verify: z.boolean().default(true),
  timeout: z.number().int().positive().default(30000),
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ''))
    .default(DEFAULT_BASE_URL),
  userAgent: z.string().min(1).default(`zetalytics-connector/${VERSION}`),
});

const envSchema = z.object({
  ZETALYTICS_API_KEY: z.string().optional(),
  ZETALYTICS_VERIFY: booleanFromEnv.optional(),
  ZETALYTICS_TIMEOUT_MS: z.coerce.number().optional(),
  ZETALYTICS_BASE_URL: z.string().optional(),
});

export type ConnectorOverrides = Partial<ConnectorOptions>;

/**
 * Build the run's configuration. Explicit overrides win over the environment.
 * An empty API key is accepted here; the connector refuses to query without one.
 */
export function loadConfig(
  overrides: ConnectorOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Readonly<ConnectorOptions> {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError(formatIssues(parsedEnv.error));
  }

  const fromEnv = parsedEnv.data;
  const parsed = connectorOptionsSchema.safeParse({
    apiKey: overrides.apiKey ?? fromEnv.ZETALYTICS_API_KEY,
    verify: overrides.verify ?? fromEnv.ZETALYTICS_VERIFY,
    timeout: overrides.timeout ?? fromEnv.ZETALYTICS_TIMEOUT_MS,
    baseUrl: overrides.baseUrl ?? fromEnv.ZETALYTICS_BASE_URL,
    userAgent: overrides.userAgent,
  });
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  return Object.freeze(parsed.data);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
