/**
 * Configuration validation.
 * @module config/validation
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/types.js';
import type { SearchClientConfig } from './types.js';

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'must use http or https'),
  apiKey: z.string().min(1).optional(),
  timeout: z.number().int().positive(),
  dispatchMode: z.enum(['concurrent', 'sequential']),
  maxConcurrency: z.number().int().positive().optional(),
  defaultBatchSize: z.number().int().positive(),
  maxPayloadSize: z.number().int().positive(),
  taskPolling: z.object({
    intervalMs: z.number().nonnegative(),
    timeoutMs: z.number().positive().nullable(),
    backoffMultiplier: z.number().min(1),
    maxIntervalMs: z.number().positive(),
  }),
  pool: z.object({
    connections: z.number().int().positive(),
    keepAliveTimeoutMs: z.number().int().positive(),
  }),
  headers: z.record(z.string()),
  clientAgents: z.array(z.string().min(1)),
  logLevel: z.number().int().min(0).max(3).optional(),
});

/**
 * Validates a configuration.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function validateConfig(config: SearchClientConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }
}
