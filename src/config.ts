/**
 * Configuration Management
 *
 * Resolves the bridge configuration from built-in defaults, an optional
 * JSON file and environment variables (highest precedence), then validates
 * the result with zod.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LogLevels } from './logger.js';
import { DEFAULT_PASSTHROUGH_PREFIXES } from './model-resolver.js';

const UpstreamSchema = z.object({
  baseUrl: z.string().url(),
  apiKeys: z.array(z.string().min(1)).min(1, 'at least one upstream API key is required'),
  models: z.array(z.string().min(1)).min(1, 'at least one upstream model is required'),
  /** Idle deadline per upstream call. */
  timeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().min(0),
  includeStreamUsage: z.boolean(),
});

const TokensSchema = z
  .object({
    min: z.number().int().positive(),
    max: z.number().int().positive(),
  })
  .refine((t) => t.min <= t.max, { message: 'tokens.min must not exceed tokens.max' });

export const BridgeConfigSchema = z.object({
  upstream: UpstreamSchema,
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  }),
  /** Shared secret inbound callers must present. Unset disables the check. */
  clientApiKey: z.string().min(1).optional(),
  tokens: TokensSchema,
  logLevel: z.enum(LogLevels),
  keyValidation: z.object({
    enabled: z.boolean(),
    keepInvalid: z.boolean(),
  }),
  passthroughModelPrefixes: z.array(z.string()),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

/**
 * Default configuration (everything except credentials)
 */
export const DEFAULT_CONFIG = {
  upstream: {
    baseUrl: 'https://api.openai.com/v1',
    apiKeys: [],
    models: ['gpt-4o'],
    timeoutMs: 90_000,
    maxRetries: 2,
    includeStreamUsage: true,
  },
  server: { host: '0.0.0.0', port: 8082 },
  tokens: { min: 100, max: 4096 },
  logLevel: 'info',
  keyValidation: { enabled: false, keepInvalid: true },
  passthroughModelPrefixes: [...DEFAULT_PASSTHROUGH_PREFIXES],
} satisfies Omit<BridgeConfig, 'clientApiKey'>;

export const CONFIG_PATH_ENV = 'BRIDGE_CONFIG_PATH';

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** JSON config file; falls back to `BRIDGE_CONFIG_PATH`. */
  filePath?: string;
  /** Applied last, e.g. CLI flags. */
  overrides?: Record<string, unknown>;
}

type Tree = Record<string, unknown>;

function isTree(value: unknown): value is Tree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function merge(base: Tree, patch: Tree): Tree {
  const out: Tree = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isTree(current) && isTree(value) ? merge(current, value) : value;
  }
  return out;
}

/**
 * Parse a list given either as a JSON array or as comma-separated values.
 */
export function parseList(raw: string): string[] {
  const text = raw.trim();
  if (text.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ConfigError('Invalid list value', [err instanceof Error ? err.message : String(err)]);
    }
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
      throw new ConfigError('Invalid list value', ['expected a JSON array of strings']);
    }
    return parsed.map((item) => item.trim()).filter(Boolean);
  }
  return text.split(',').map((item) => item.trim()).filter(Boolean);
}

function parseBool(raw: string): boolean | string {
  const v = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(v)) return true;
  if (['false', '0', 'no', 'off'].includes(v)) return false;
  // left as-is so validation reports it
  return raw;
}

function parseNumber(raw: string): number {
  return raw.trim() === '' ? Number.NaN : Number(raw);
}

function fromEnv(env: NodeJS.ProcessEnv): Tree {
  const get = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value;
  };
  const map = <T>(name: string, fn: (raw: string) => T): T | undefined => {
    const value = get(name);
    return value === undefined ? undefined : fn(value);
  };

  return {
    upstream: {
      baseUrl: get('OPENAI_BASE_URL'),
      apiKeys: map('OPENAI_API_KEY', parseList),
      models: map('BIG_MODEL', parseList),
      timeoutMs: map('REQUEST_TIMEOUT', (v) => parseNumber(v) * 1000),
      maxRetries: map('MAX_RETRIES', parseNumber),
      includeStreamUsage: map('INCLUDE_STREAM_USAGE', parseBool),
    },
    server: {
      host: get('HOST'),
      port: map('PORT', parseNumber),
    },
    clientApiKey: get('ANTHROPIC_API_KEY'),
    tokens: {
      min: map('MIN_TOKENS_LIMIT', parseNumber),
      max: map('MAX_TOKENS_LIMIT', parseNumber),
    },
    logLevel: map('LOG_LEVEL', (v) => v.trim().toLowerCase()),
    keyValidation: {
      enabled: map('ENABLE_API_VALIDATION', parseBool),
      keepInvalid: map('KEEP_INVALID_KEYS', parseBool),
    },
    passthroughModelPrefixes: map('PASSTHROUGH_MODEL_PREFIXES', parseList),
  };
}

function readConfigFile(filePath: string): Tree {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [err instanceof Error ? err.message : String(err)]);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config JSON parse error in ${filePath}`, [err instanceof Error ? err.message : String(err)]);
  }
  if (!isTree(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load and validate config.
 *
 * @throws ConfigError listing every validation issue
 */
export function loadConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? env[CONFIG_PATH_ENV];

  let resolved: Tree = merge({}, DEFAULT_CONFIG);
  if (filePath) resolved = merge(resolved, readConfigFile(filePath));
  resolved = merge(resolved, fromEnv(env));
  if (options.overrides) resolved = merge(resolved, options.overrides);

  const result = BridgeConfigSchema.safeParse(resolved);
  if (!result.success) {
    throw new ConfigError(
      'Invalid config',
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Config summary without secrets, for logs and the info endpoint.
 */
export function describeConfig(config: BridgeConfig): Record<string, unknown> {
  return {
    baseUrl: config.upstream.baseUrl,
    models: config.upstream.models,
    apiKeyCount: config.upstream.apiKeys.length,
    timeoutMs: config.upstream.timeoutMs,
    maxRetries: config.upstream.maxRetries,
    tokens: config.tokens,
    clientAuth: config.clientApiKey ? 'enabled' : 'disabled',
    keyValidation: config.keyValidation,
  };
}
