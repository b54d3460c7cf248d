/**
 * Command definitions
 */

import { Command } from 'commander';
import { VERSION } from '@memvault/core';
import { keygen, startServer } from './commands/index.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('memvault')
    .description('Encrypted memory store')
    .version(VERSION);

  program
    .command('server')
    .description('Start the HTTP API server')
    .option('-p, --port <port>', 'Port to listen on (default: PORT or 8080)')
    .option('-H, --host <host>', 'Host to bind to (default: HOST or 127.0.0.1)')
    .option('--no-auth', 'Disable API key authentication')
    .action(startServer);

  program
    .command('keygen')
    .description('Generate a new encryption key file')
    .option('-o, --out <file>', 'Key file path (default: MEMVAULT_KEY_FILE or <data dir>/secret.key)')
    .option('-f, --force', 'Overwrite an existing key file')
    .action(keygen);

  return program;
}
