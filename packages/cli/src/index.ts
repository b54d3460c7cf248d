#!/usr/bin/env node
/**
 * MemVault CLI
 */

import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
