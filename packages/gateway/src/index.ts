/**
 * @memvault/gateway
 *
 * HTTP API for the encrypted memory store
 *
 * @packageDocumentation
 */

// App
export { createApp } from './app.js';
export { startServer, runServer, loadEnvFile, type RunningServer } from './server.js';

// Types
export type {
  AuthConfig,
  ErrorBody,
  GatewayConfig,
  MemoryItemBody,
  MemoryMatchBody,
  OkResponse,
} from './types/index.js';

// Config
export { loadGatewayConfig, loadApiKeys } from './config/gateway-config.js';

// Middleware
export {
  requestId,
  timing,
  createAuthMiddleware,
  errorHandler,
  notFoundHandler,
} from './middleware/index.js';

// Routes
export { healthRoutes, memoriesRoutes, rootRoutes } from './routes/index.js';

// Services
export { MemoryService, createMemoryService, type MemoryServiceDeps } from './services/memory-service.js';
export { LogService, createLogService, type LogServiceOptions } from './services/log-service-impl.js';

// Database
export {
  initializeAdapter,
  closeAdapter,
  getDatabaseConfig,
  type DatabaseAdapter,
  type DatabaseConfig,
} from './db/adapters/index.js';
export {
  MemoriesRepository,
  createMemoriesRepository,
  type MemoryRepository,
} from './db/repositories/memories.js';

// Paths
export { getDataDir, getKeyFilePath, initializeDataDirectory } from './paths/index.js';
