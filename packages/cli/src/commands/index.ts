/**
 * CLI commands
 */

export { startServer, type ServerOptions } from './server.js';
export { keygen, type KeygenOptions } from './keygen.js';
