/**
 * Config Schema Validation
 *
 * Zod schemas for the poller configuration file. Every field has a
 * default, so an empty document is a valid config.
 */

import { z } from 'zod';
import { SUPPORTED_VENDORS } from './devices';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const redisUrlSchema = z.string().min(1).refine(
  (val) => /^rediss?:\/\//.test(val),
  { message: 'Stream URL must start with redis:// or rediss://' },
);

// --- Sections ---

const pollingSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: z.number().int().min(50).default(1000),
  statsEveryCycles: z.number().int().min(1).default(60),
}).default({});

const backoffSchema = z.object({
  baseMs: z.number().int().min(1).default(1000),
  maxMs: z.number().int().min(1).default(60000),
}).default({}).refine(
  (b) => b.maxMs >= b.baseMs,
  { message: 'backoff.maxMs must be >= backoff.baseMs' },
);

const devicesSchema = z.object({
  vendor: z.enum(SUPPORTED_VENDORS).default('mikrotik'),
  refreshIntervalMs: z.number().int().min(1000).default(60000),
  timeoutMs: z.number().int().min(100).default(2000),
  backoff: backoffSchema,
}).default({});

const inventorySchema = z.object({
  path: z.string().min(1).default('inventory.yml'),
}).default({});

const streamSchema = z.object({
  url: redisUrlSchema.default('redis://localhost:6379/0'),
  name: z.string().min(1).default('bandwidth:samples'),
  maxLength: z.number().int().min(1).default(100000),
}).default({});

const healthSchema = z.object({
  enabled: z.boolean().default(false),
  port: portSchema.default(8081),
}).default({});

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().optional(),
}).default({});

// --- Full Config Schema ---

export const pollerConfigSchema = z.object({
  polling: pollingSchema,
  devices: devicesSchema,
  inventory: inventorySchema,
  stream: streamSchema,
  health: healthSchema,
  logging: loggingSchema,
});

export type PollerFileConfig = z.output<typeof pollerConfigSchema>;

/**
 * Validate a parsed config document
 */
export function validatePollerConfig(data: unknown): PollerFileConfig {
  return pollerConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
