/**
 * Data Paths Module
 *
 * Locates the application data directory, kept outside the codebase.
 * It holds the generated cipher key file (secret.key).
 *
 * Windows: %LOCALAPPDATA%\MemVault
 * macOS:   ~/Library/Application Support/MemVault
 * Linux:   $XDG_DATA_HOME/memvault, or ~/.memvault without ~/.local
 */

import { existsSync, mkdirSync, chmodSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir, platform } from 'node:os';
import { getLog } from '../services/log.js';

const log = getLog('Paths');

const APP_NAME = 'MemVault';
const APP_NAME_UNIX = '.memvault';
const KEY_FILE_NAME = 'secret.key';

type Env = Record<string, string | undefined>;

/**
 * Platform-specific application data directory.
 * MEMVAULT_DATA_DIR overrides it.
 */
export function getDataDir(env: Env = process.env): string {
  if (env.MEMVAULT_DATA_DIR) {
    return resolve(env.MEMVAULT_DATA_DIR);
  }

  switch (platform()) {
    case 'win32': {
      const localAppData = env.LOCALAPPDATA ?? join(homedir(), 'AppData', 'Local');
      return join(localAppData, APP_NAME);
    }
    case 'darwin':
      return join(homedir(), 'Library', 'Application Support', APP_NAME);
    default: {
      if (env.XDG_DATA_HOME) {
        return join(env.XDG_DATA_HOME, 'memvault');
      }
      if (existsSync(join(homedir(), '.local'))) {
        return join(homedir(), '.local', 'share', 'memvault');
      }
      return join(homedir(), APP_NAME_UNIX);
    }
  }
}

/**
 * Cipher key file path. MEMVAULT_KEY_FILE overrides `<data dir>/secret.key`.
 */
export function getKeyFilePath(env: Env = process.env): string {
  if (env.MEMVAULT_KEY_FILE) {
    return resolve(env.MEMVAULT_KEY_FILE);
  }
  return join(getDataDir(env), KEY_FILE_NAME);
}

/**
 * Create the data directory with owner-only permissions (Unix).
 */
export function initializeDataDirectory(env: Env = process.env): string {
  const dir = getDataDir(env);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
    log.info(`Created data directory: ${dir}`);

    if (platform() !== 'win32') {
      chmodSync(dir, 0o700);
    }
  }
  return dir;
}
