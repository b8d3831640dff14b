/**
 * Configuration loader
 *
 * Reads the YAML config file, layers environment overrides on top and
 * validates the result. A missing default config.yml means all defaults;
 * a missing file that was asked for explicitly is an error.
 *
 * Environment overrides:
 *   BANDWIDTH_POLLING_ENABLED    polling.enabled ("1", "true", "yes" = on)
 *   BANDWIDTH_POLL_INTERVAL_MS   polling.intervalMs
 *   BANDWIDTH_INVENTORY_PATH     inventory.path
 *   REDIS_URL                    stream.url
 *   BANDWIDTH_REDIS_STREAM       stream.name
 *   BANDWIDTH_STREAM_MAXLEN      stream.maxLength
 *   LOG_LEVEL                    logging.level
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { PollerFileConfig, formatZodError, validatePollerConfig } from './config-schema';

export type Config = PollerFileConfig;

type Env = Record<string, string | undefined>;
type Doc = Record<string, unknown>;

interface EnvOverride {
  variable: string;
  section: string;
  key: string;
  kind: 'string' | 'number' | 'flag';
}

const ENV_OVERRIDES: EnvOverride[] = [
  { variable: 'BANDWIDTH_POLLING_ENABLED', section: 'polling', key: 'enabled', kind: 'flag' },
  { variable: 'BANDWIDTH_POLL_INTERVAL_MS', section: 'polling', key: 'intervalMs', kind: 'number' },
  { variable: 'BANDWIDTH_INVENTORY_PATH', section: 'inventory', key: 'path', kind: 'string' },
  { variable: 'REDIS_URL', section: 'stream', key: 'url', kind: 'string' },
  { variable: 'BANDWIDTH_REDIS_STREAM', section: 'stream', key: 'name', kind: 'string' },
  { variable: 'BANDWIDTH_STREAM_MAXLEN', section: 'stream', key: 'maxLength', kind: 'number' },
  { variable: 'LOG_LEVEL', section: 'logging', key: 'level', kind: 'string' },
];

function isRecord(value: unknown): value is Doc {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convert(raw: string, kind: EnvOverride['kind']): unknown {
  switch (kind) {
    case 'flag':
      return ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
    case 'number': {
      const value = Number(raw);
      // Left as a string so validation reports it
      return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
    }
    default:
      return raw;
  }
}

/** Apply environment overrides onto a parsed config document. */
export function applyEnvOverrides(doc: Doc, env: Env): Doc {
  const result: Doc = { ...doc };
  for (const override of ENV_OVERRIDES) {
    const raw = env[override.variable];
    if (raw === undefined) continue;
    const current = result[override.section];
    const section: Doc = isRecord(current) ? { ...current } : {};
    section[override.key] = convert(raw, override.kind);
    result[override.section] = section;
  }
  return result;
}

/** Validate a raw document; throws one line per issue. */
export function resolveConfig(doc: unknown, env: Env = {}): Config {
  const base = doc === null || doc === undefined ? {} : doc;
  if (!isRecord(base)) {
    throw new Error('[Config] Invalid config: top level must be a mapping');
  }

  try {
    return validatePollerConfig(applyEnvOverrides(base, env));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

/**
 * Load config from YAML plus environment.
 */
export function loadConfig(configPath?: string, env: Env = process.env): Config {
  const resolvedPath = configPath ?? path.join(process.cwd(), 'config.yml');

  if (!fs.existsSync(resolvedPath)) {
    if (configPath) {
      throw new Error(`[Config] Config file not found: ${configPath}`);
    }
    return resolveConfig({}, env);
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  const parsed: unknown = parse(raw);
  return resolveConfig(parsed, env);
}
