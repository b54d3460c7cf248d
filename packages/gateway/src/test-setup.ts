/**
 * Global test setup, run before every test file in gateway.
 *
 * Silences getLog so individual test files need not repeat the mock.
 * Tests that assert on log calls declare their own `vi.mock` for the
 * log module; the local mock overrides this one for that file.
 */

import { vi } from 'vitest';

vi.mock('./services/log.js', () => {
  const log = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => log),
  };
  return { getLog: () => log };
});
