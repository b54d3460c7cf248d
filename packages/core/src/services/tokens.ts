/**
 * Service Tokens - Typed keys for ServiceRegistry
 *
 * Usage:
 *   import { Services } from '@memvault/core';
 *   const log = registry.get(Services.Log);         // typed as ILogService
 *   const memories = registry.get(Services.Memory); // typed as IMemoryService
 */

import { ServiceToken } from './registry.js';
import type { ILogService } from './log-service.js';
import type { IMemoryService } from './memory-service-interface.js';

export const Services = {
  /** Structured logging */
  Log: new ServiceToken<ILogService>('log'),

  /** Encrypted memory store */
  Memory: new ServiceToken<IMemoryService>('memory'),
} as const;
