/**
 * Configuration validation
 */

import { z } from 'zod';
import { CollabError } from './errors.js';
import type { CollaborationServerConfig, ResolvedCollaborationConfig } from './types.js';
import { DEFAULT_COLLABORATION_CONFIG } from './types.js';

const delaySchema = z.number().nonnegative().nullable();

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Schema of the serializable part of the configuration
 */
export const collaborationConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).optional(),
  host: z.string().min(1).optional(),
  basePath: z
    .string()
    .regex(/^\/.*[^/]$|^\/$/, 'must start with "/" and not end with "/"')
    .optional(),
  documentCleanupDelay: delaySchema.optional(),
  documentSaveDelay: delaySchema.optional(),
  filePollInterval: z.number().positive().nullable().optional(),
  maxMessageSize: z.number().int().positive().optional(),
  requireAuth: z.boolean().optional(),
  logging: z.union([z.boolean(), logLevelSchema]).optional(),
});

/**
 * Validate a configuration and merge it over the defaults
 */
export function resolveConfig(config: CollaborationServerConfig = {}): ResolvedCollaborationConfig {
  const { validateAuth, ...rest } = config;
  const result = collaborationConfigSchema.safeParse(rest);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CollabError({
      code: 'CONFIG_INVALID',
      message: `Invalid configuration: ${issues.join('; ')}`,
      context: { issues },
    });
  }

  const data = result.data;
  const defaults = DEFAULT_COLLABORATION_CONFIG;

  return {
    port: orDefault(data.port, defaults.port),
    host: orDefault(data.host, defaults.host),
    basePath: orDefault(data.basePath, defaults.basePath),
    documentCleanupDelay: orDefault(data.documentCleanupDelay, defaults.documentCleanupDelay),
    documentSaveDelay: orDefault(data.documentSaveDelay, defaults.documentSaveDelay),
    filePollInterval: orDefault(data.filePollInterval, defaults.filePollInterval),
    maxMessageSize: orDefault(data.maxMessageSize, defaults.maxMessageSize),
    requireAuth: orDefault(data.requireAuth, defaults.requireAuth),
    logging: orDefault(data.logging, defaults.logging),
    validateAuth,
  };
}

/** `null` is a meaningful value for delays, so only `undefined` falls back */
function orDefault<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

const delayString = z
  .string()
  .transform((value, ctx) => {
    if (value === 'off' || value === 'none') return null;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

const envDelay = delayString.optional();

/**
 * Parse a delay given on the command line or in the environment: seconds,
 * or `off`/`none` to disable
 */
export function parseDelay(value: string, name: string): number | null {
  const result = delayString.safeParse(value);
  if (!result.success) {
    throw new CollabError({ code: 'CONFIG_INVALID', message: `Invalid ${name}: ${value}` });
  }
  return result.data;
}

const envSchema = z.object({
  DOCROOM_PORT: z.coerce.number().int().optional(),
  DOCROOM_HOST: z.string().optional(),
  DOCROOM_ROOT: z.string().optional(),
  DOCROOM_TOKEN: z.string().optional(),
  DOCROOM_CLEANUP_DELAY: envDelay,
  DOCROOM_SAVE_DELAY: envDelay,
  DOCROOM_POLL_INTERVAL: envDelay,
});

/**
 * Settings read from the environment
 */
export interface EnvConfig {
  config: CollaborationServerConfig;
  rootDir?: string;
  token?: string;
}

/**
 * Read `DOCROOM_*` environment variables
 */
export function configFromEnv(env: Record<string, string | undefined>): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new CollabError({
      code: 'CONFIG_INVALID',
      message: `Invalid environment: ${result.error.issues.map((i) => i.path.join('.')).join(', ')}`,
    });
  }

  const vars = result.data;
  const config: CollaborationServerConfig = {};
  if (vars.DOCROOM_PORT !== undefined) config.port = vars.DOCROOM_PORT;
  if (vars.DOCROOM_HOST !== undefined) config.host = vars.DOCROOM_HOST;
  if (vars.DOCROOM_CLEANUP_DELAY !== undefined) config.documentCleanupDelay = vars.DOCROOM_CLEANUP_DELAY;
  if (vars.DOCROOM_SAVE_DELAY !== undefined) config.documentSaveDelay = vars.DOCROOM_SAVE_DELAY;
  if (vars.DOCROOM_POLL_INTERVAL !== undefined) config.filePollInterval = vars.DOCROOM_POLL_INTERVAL;

  return { config, rootDir: vars.DOCROOM_ROOT, token: vars.DOCROOM_TOKEN };
}
