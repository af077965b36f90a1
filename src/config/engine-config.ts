/**
 * Engine Configuration
 *
 * Merges explicit EngineProcess options over environment variables and
 * validates the result. Explicit options always win.
 */

import { z } from 'zod';
import { LaunchError } from '../shared/errors/index.js';

/**
 * Default control port range scanned when no port is fixed
 */
export const DEFAULT_PORT_RANGE = { min: 20202, max: 20301 } as const;

export const DEFAULT_STARTUP_TIMEOUT_MS = 30_000;

export const DEFAULT_STOP_TIMEOUT_MS = 5_000;

/**
 * Options accepted by EngineProcess
 */
export interface EngineOptions {
  /** Engine executable; falls back to PHANTOMJS_BIN, then PATH */
  binPath?: string;
  /** Working directory holding the control script; a temp dir is created when unset */
  path?: string;
  /** Fixed control port; falls back to PHANTOMJS_PORT, then the first free port in portRange */
  port?: number;
  portRange?: { min: number; max: number };
  offlineStoragePath?: string;
  /** Offline storage quota in bytes */
  offlineStorageQuota?: number;
  localStoragePath?: string;
  /** Extra engine command-line flags, placed before the control script */
  args?: string[];
  startupTimeoutMs?: number;
  /** Grace period between SIGTERM and SIGKILL on close */
  stopTimeoutMs?: number;
}

const portSchema = z.coerce.number().int().min(1).max(65535);

const positiveMsSchema = z.coerce.number().int().positive();

/** Paths are passed to the engine verbatim, so blank is rejected but nothing is trimmed */
const nonEmptySchema = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'must not be blank' });

const engineConfigSchema = z
  .object({
    binPath: nonEmptySchema.optional(),
    path: nonEmptySchema.optional(),
    port: portSchema.optional(),
    portRange: z
      .object({ min: portSchema, max: portSchema })
      .refine((range) => range.min <= range.max, { message: 'min must not exceed max' })
      .default({ ...DEFAULT_PORT_RANGE }),
    offlineStoragePath: nonEmptySchema.optional(),
    offlineStorageQuota: z.coerce.number().int().nonnegative().optional(),
    localStoragePath: nonEmptySchema.optional(),
    args: z.array(z.string()).default([]),
    startupTimeoutMs: positiveMsSchema.default(DEFAULT_STARTUP_TIMEOUT_MS),
    stopTimeoutMs: positiveMsSchema.default(DEFAULT_STOP_TIMEOUT_MS),
  })
  .strict();

/**
 * Fully resolved configuration of one engine process
 */
export type EngineConfig = z.output<typeof engineConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Environment value, treating empty strings as unset
 */
function fromEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value?.trim() ? value : undefined;
}

/**
 * Resolve engine configuration.
 *
 * @param options - Explicit options; these take precedence over the environment
 * @param env - Environment to read; defaults to process.env
 * @throws LaunchError with INVALID_CONFIG when a value is out of range or malformed
 */
export function resolveEngineConfig(options: EngineOptions = {}, env: Env = process.env): EngineConfig {
  const merged = {
    ...options,
    binPath: options.binPath ?? fromEnv(env, 'PHANTOMJS_BIN'),
    port: options.port ?? fromEnv(env, 'PHANTOMJS_PORT'),
    startupTimeoutMs: options.startupTimeoutMs ?? fromEnv(env, 'PHANTOMJS_STARTUP_TIMEOUT_MS'),
    offlineStoragePath: options.offlineStoragePath ?? fromEnv(env, 'PHANTOMJS_OFFLINE_STORAGE_PATH'),
  };

  const result = engineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw LaunchError.invalidConfig(
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
}
