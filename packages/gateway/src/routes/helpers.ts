/**
 * Route Helpers
 *
 * Shared utilities for Hono route handlers.
 */

import { timingSafeEqual } from 'node:crypto';
import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ValidationError } from '@memvault/core';
import type { ErrorBody, OkResponse } from '../types/index.js';

/**
 * Public error details, one per HTTP status the API emits
 */
export const ERROR_DETAILS = {
  UNAUTHORIZED: 'Invalid API key',
  NOT_FOUND: 'Not found',
  ROUTE_NOT_FOUND: 'Not Found',
  STORE_UNAVAILABLE: 'Storage unavailable',
  INTERNAL: 'Internal server error',
} as const;

/**
 * Timing-safe comparison of two strings (API keys).
 * Returns false if either value is empty or lengths differ.
 */
export function safeKeyCompare(a: string | undefined, b: string | undefined): boolean {
  if (!a || !b) return false;
  const aBuf = Buffer.from(a);
  const bBuf = Buffer.from(b);
  if (aBuf.length !== bBuf.length) return false;
  return timingSafeEqual(aBuf, bBuf);
}

/**
 * Return `{ status: "ok", ...payload }`.
 */
export function okResponse<T extends object>(c: Context, payload: T, status?: ContentfulStatusCode) {
  const body: OkResponse<T> = { status: 'ok', ...payload };
  return status ? c.json(body, status) : c.json(body);
}

/**
 * Return `{ detail }` with the given status.
 */
export function errorResponse(c: Context, detail: string, status: ContentfulStatusCode) {
  const body: ErrorBody = { detail };
  return c.json(body, status);
}

/**
 * Read a JSON request body. Malformed JSON is a ValidationError; an empty
 * body becomes `{}` when `allowEmpty` is set.
 */
export async function readJsonBody(c: Context, options: { allowEmpty?: boolean } = {}): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim()) {
    if (options.allowEmpty) return {};
    throw new ValidationError('Validation failed: request body is required');
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ValidationError('Validation failed: request body must be valid JSON', { cause: error });
  }
}

/**
 * Extract error message from an unknown catch value.
 * Accepts an optional fallback for context-specific defaults.
 */
export function getErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  return error instanceof Error ? error.message : fallback;
}
