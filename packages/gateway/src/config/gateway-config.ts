/**
 * Gateway configuration loader
 *
 * Reads the HTTP, auth and CORS settings from environment variables.
 * Database settings live in db/adapters/types.ts and key settings in paths/.
 */

import { z } from 'zod';
import { ValidationError } from '@memvault/core';
import type { AuthConfig, GatewayConfig } from '../types/index.js';
import { DEFAULT_BODY_LIMIT_BYTES, DEFAULT_HOST, DEFAULT_PORT } from './defaults.js';

type Env = Record<string, string | undefined>;

const portSchema = z.coerce.number().int().min(1).max(65535);
const bodyLimitSchema = z.coerce.number().int().positive();
const authTypeSchema = z.enum(['api-key', 'none']);

function readEnv<T>(env: Env, name: string, schema: z.ZodType<T>, fallback: T): T {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${name}: ${raw}`, { field: name });
  }
  return parsed.data;
}

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Accepted API keys: API_KEYS (comma-separated) plus MEMVAULT_API_KEY.
 */
export function loadApiKeys(env: Env = process.env): string[] {
  const keys = splitList(env.API_KEYS);
  const single = env.MEMVAULT_API_KEY?.trim();
  if (single && !keys.includes(single)) {
    keys.push(single);
  }
  return keys;
}

/**
 * Build the gateway configuration. Throws ValidationError on a malformed value.
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const auth: AuthConfig = {
    type: readEnv(env, 'AUTH_TYPE', authTypeSchema, 'api-key'),
    apiKeys: loadApiKeys(env),
  };

  const corsOrigins = splitList(env.CORS_ORIGINS);

  return {
    port: readEnv(env, 'PORT', portSchema, DEFAULT_PORT),
    host: env.HOST?.trim() || DEFAULT_HOST,
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : undefined,
    auth,
    bodyLimit: readEnv(env, 'BODY_SIZE_LIMIT', bodyLimitSchema, DEFAULT_BODY_LIMIT_BYTES),
  };
}
