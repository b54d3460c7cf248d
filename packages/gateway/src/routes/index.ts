/**
 * Route exports
 */

export { healthRoutes, checkDatabase } from './health.js';
export { memoriesRoutes, SKIPPED_RECORDS_HEADER } from './memories.js';
export { rootRoutes } from './root.js';
