/**
 * Services exports
 */

// Service Registry (typed DI container)
export {
  ServiceToken,
  ServiceRegistry,
  initServiceRegistry,
  getServiceRegistry,
  hasServiceRegistry,
  resetServiceRegistry,
  type Disposable,
} from './registry.js';

// Service Tokens
export { Services } from './tokens.js';

// Logging
export { type ILogService, type LogLevel, LOG_LEVELS, isLogLevel } from './log-service.js';
export { getLog } from './get-log.js';

// Memory
export type { IMemoryService } from './memory-service-interface.js';
