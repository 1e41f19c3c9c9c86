/**
 * Configuration loader for settarr
 * Loads from YAML config file with environment variable expansion
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';
import { z } from 'zod';

import { ConfigValidationError } from './errors.js';
import type { SettarrConfig } from './types.js';
import { isRecord } from './validation.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_LOG_DIR = './data/settarr';

const configSchema = z.object({
  sonarr: z
    .object({
      url: z.string().optional(),
      apiKey: z.string().optional(),
      timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
      settings: z.unknown(),
    })
    .default({}),
  trash: z
    .object({
      dir: z.string().optional(),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      dir: z.string().default(DEFAULT_LOG_DIR),
    })
    .default({}),
});

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
export function expandEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
export function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (isRecord(obj)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

function firstExisting(candidates: Array<string | undefined>): string | null {
  for (const candidate of candidates) {
    if (candidate && fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Find config file from multiple candidate locations
 */
export function findConfigFile(baseDir: string): string | null {
  return firstExisting([
    process.env.SETTARR_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(baseDir, 'config.yaml'),
    path.join(process.cwd(), 'settarr.yaml'),
    path.join(process.cwd(), 'config/settarr.yaml'),
  ]);
}

/**
 * Find secrets file from multiple candidate locations
 */
export function findSecretsFile(baseDir: string): string | null {
  return firstExisting([
    process.env.SETTARR_SECRETS,
    path.join(baseDir, 'config/secrets.yaml'),
    path.join(baseDir, 'secrets.yaml'),
    path.join(process.cwd(), 'secrets.yaml'),
    path.join(process.cwd(), 'config/secrets.yaml'),
  ]);
}

/**
 * Deep merge two objects (secrets override config)
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null && sourceValue !== '') {
      result[key] = sourceValue;
    }
  }

  return result;
}

function readYamlFile(filePath: string): Record<string, unknown> {
  const content = fs.readFileSync(filePath, 'utf-8');
  const doc = deepExpand(parse(content));
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new Error(`${filePath}: expected a YAML mapping at the top level`);
  }
  return doc;
}

/**
 * Load and validate configuration.
 * The `sonarr.settings` subtree is left raw; it is validated by parseSonarrSettings.
 * Instance URL and API key may be left out here and supplied through SONARR_URL and
 * SONARR_API_KEY instead; SonarrClient checks for them when it is constructed.
 */
export function loadConfig(baseDir: string, overridePath?: string): SettarrConfig {
  const configPath = overridePath ?? findConfigFile(baseDir);

  if (!configPath) {
    throw new Error('No config file found. Create config/config.yaml or set SETTARR_CONFIG env var.');
  }
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let merged = readYamlFile(configPath);

  // Load secrets file if present and merge with config
  const secretsPath = findSecretsFile(baseDir);
  if (secretsPath) {
    merged = deepMerge(merged, readYamlFile(secretsPath));
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    );
  }
  const raw = parsed.data;

  return {
    configPath,
    sonarr: {
      url: raw.sonarr.url || undefined,
      apiKey: raw.sonarr.apiKey || undefined,
      timeoutMs: raw.sonarr.timeoutMs,
      settings: raw.sonarr.settings,
    },
    trash: { dir: raw.trash.dir },
    log: {
      level: raw.log.level,
      dir: path.resolve(raw.log.dir),
    },
  };
}
