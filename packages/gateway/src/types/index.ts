/**
 * Gateway types
 */

/**
 * Success envelope shared by every /v1 response
 */
export type OkResponse<T extends object = Record<string, never>> = { status: 'ok' } & T;

/**
 * Error body returned for every failed request
 */
export interface ErrorBody {
  detail: string;
}

/**
 * Authentication configuration
 */
export interface AuthConfig {
  type: 'api-key' | 'none';
  apiKeys?: string[];
}

/**
 * Gateway configuration
 */
export interface GatewayConfig {
  port: number;
  host: string;
  corsOrigins?: string[];
  auth: AuthConfig;
  /** Request body limit in bytes */
  bodyLimit?: number;
}

/**
 * Memory as serialized on the wire (snake_case, no ciphertext)
 */
export interface MemoryItemBody {
  id: string;
  key: string;
  tags: string[];
  created_at: string;
  updated_at: string;
  version: number;
}

/**
 * Decrypted query hit as serialized on the wire
 */
export interface MemoryMatchBody {
  id: string;
  key: string;
  tags: string[];
  created_at: string;
  text: string;
}
