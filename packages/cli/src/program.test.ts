import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockStartServer = vi.hoisted(() => vi.fn());
const mockKeygen = vi.hoisted(() => vi.fn());

vi.mock('./commands/index.js', () => ({
  startServer: mockStartServer,
  keygen: mockKeygen,
}));

import { VERSION } from '@memvault/core';
import { createProgram } from './program.js';

function run(...args: string[]) {
  return createProgram().exitOverride().parseAsync(args, { from: 'user' });
}

describe('CLI program', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('is named memvault and reports the core version', () => {
    const program = createProgram();
    expect(program.name()).toBe('memvault');
    expect(program.version()).toBe(VERSION);
  });

  it('parses server flags', async () => {
    await run('server', '--port', '9090', '-H', '0.0.0.0', '--no-auth');

    expect(mockStartServer).toHaveBeenCalledOnce();
    expect(mockStartServer.mock.calls[0]?.[0]).toEqual({ port: '9090', host: '0.0.0.0', auth: false });
  });

  it('defaults server auth to on', async () => {
    await run('server');
    expect(mockStartServer.mock.calls[0]?.[0]).toEqual({ auth: true });
  });

  it('parses keygen flags', async () => {
    await run('keygen', '--out', '/tmp/test.key', '--force');
    expect(mockKeygen.mock.calls[0]?.[0]).toEqual({ out: '/tmp/test.key', force: true });
  });

  it('runs keygen without flags', async () => {
    await run('keygen');
    expect(mockKeygen.mock.calls[0]?.[0]).toEqual({});
  });
});
