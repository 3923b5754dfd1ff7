import { cpus } from 'os';
import { z } from 'zod';
import type { CacheBackend } from './cache/types.js';
import type { HopperConfig } from './types.js';
import { isLogLevel } from './logger.js';

export const DEFAULT_CONCURRENCY = 10;

const ConcurrencySchema = z.union([
  z.number().int().positive(),
  z.string().regex(/^\s*\d+(\.\d+)?%?\s*$/, 'must be a number or a percentage such as "50%"'),
]);

const CacheBackendSchema = z.custom<CacheBackend>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'get' in value &&
    'put' in value &&
    typeof value.get === 'function' &&
    typeof value.put === 'function',
  'backend must implement get() and put()'
);

export const HopperConfigSchema = z
  .object({
    rootDir: z.string().min(1),
    concurrency: ConcurrencySchema.optional(),
    killPolicy: z.enum(['graceful', 'immediate', 'wait']).optional(),
    gracePeriodMs: z.number().int().nonnegative().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    cache: z
      .object({
        type: z.enum(['local', 'memory', 'custom']),
        dir: z.string().optional(),
        backend: CacheBackendSchema.optional(),
        read: z.boolean().optional(),
        write: z.boolean().optional(),
      })
      .refine((cache) => cache.type !== 'custom' || cache.backend !== undefined, {
        message: 'Custom cache type requires backend',
        path: ['backend'],
      })
      .optional(),
  })
  .passthrough();

/**
 * Custom error for invalid configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
  }
}

/**
 * @throws ConfigError listing every invalid field
 */
export function validateConfig(config: HopperConfig): void {
  const result = HopperConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError('Invalid Hopper configuration', result.error);
  }
}

/**
 * Turn a concurrency setting into a worker count
 *
 * `4` and `'4'` mean four workers; `'50%'` means half the CPUs, at least one.
 */
export function resolveConcurrency(
  value: number | string | undefined,
  cpuCount: number = cpus().length
): number {
  if (value === undefined) return DEFAULT_CONCURRENCY;

  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`Invalid concurrency ${value}: must be a positive integer`);
    }
    return value;
  }

  const text = value.trim();
  if (text.endsWith('%')) {
    const percent = Number(text.slice(0, -1));
    if (!Number.isFinite(percent) || percent <= 0) {
      throw new ConfigError(`Invalid concurrency '${value}': percentage must be positive`);
    }
    return Math.max(1, Math.floor((cpuCount * percent) / 100));
  }

  const count = Number(text);
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigError(`Invalid concurrency '${value}': must be a positive integer or a percentage`);
  }
  return count;
}

/**
 * Settings taken from HOPPER_* environment variables
 */
export function loadConfigFromEnv(env: Record<string, string | undefined>): Partial<HopperConfig> {
  const config: Partial<HopperConfig> = {};

  if (env.HOPPER_CONCURRENCY) {
    config.concurrency = env.HOPPER_CONCURRENCY;
  }

  const logLevel = env.HOPPER_LOG_LEVEL;
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(`Invalid HOPPER_LOG_LEVEL '${logLevel}'`);
    }
    config.logLevel = logLevel;
  }

  const force = env.HOPPER_FORCE === '1' || env.HOPPER_FORCE === 'true';
  if (env.HOPPER_CACHE_DIR || force) {
    config.cache = {
      type: 'local',
      ...(env.HOPPER_CACHE_DIR ? { dir: env.HOPPER_CACHE_DIR } : {}),
      ...(force ? { read: false } : {}),
    };
  }

  return config;
}
