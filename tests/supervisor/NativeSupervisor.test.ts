import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';
import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

vi.mock('global-logger-factory', () => ({
  getLoggerFor: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

vi.mock('tree-kill', () => ({
  default: vi.fn((_pid: number, _signal: string, callback?: (err?: Error) => void) => callback?.()),
}));

import kill from 'tree-kill';
import { SessionCreationError } from '../../src/errors';
import { NativeSupervisor } from '../../src/supervisor/NativeSupervisor';
import type { WindowSpec } from '../../src/supervisor/types';

class MockChildProcess extends EventEmitter {
  public stdout = new PassThrough();
  public stderr = new PassThrough();

  public constructor(public pid: number) {
    super();
  }
}

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const window = (label: string): WindowSpec => ({
  label,
  command: [ 'python', `server/${label}.py` ],
  cwd: '/srv/game',
  env: { DB_PORT: '8890' },
});

describe('NativeSupervisor', () => {
  let children: MockChildProcess[];
  let factory: Mock<[string, string[], SpawnOptions], MockChildProcess>;
  let supervisor: NativeSupervisor;

  beforeEach(() => {
    vi.mocked(kill).mockClear();
    children = [];
    factory = vi.fn((_command: string, _args: string[], _options: SpawnOptions) => {
      const child = new MockChildProcess(1000 + children.length);
      children.push(child);
      return child;
    });
    supervisor = new NativeSupervisor({ processFactory: factory, forwardOutput: false });
  });

  it('spawns each window as a child process with the merged environment', async () => {
    await supervisor.createSession('game_system', window('database'));
    await supervisor.addWindow('game_system', window('player'));

    expect(factory).toHaveBeenCalledTimes(2);
    const [ command, args, options ] = factory.mock.calls[0];
    expect(command).toBe('python');
    expect(args).toEqual([ 'server/database.py' ]);
    expect(options.cwd).toBe('/srv/game');
    expect(options.env?.DB_PORT).toBe('8890');
    await expect(supervisor.listWindows('game_system')).resolves.toEqual([
      { index: 0, label: 'database', state: 'running' },
      { index: 1, label: 'player', state: 'running' },
    ]);
  });

  it('keeps a window that exited, marked as exited', async () => {
    await supervisor.createSession('game_system', window('database'));
    children[0].emit('exit', 1, null);

    await expect(supervisor.hasSession('game_system')).resolves.toBe(true);
    await expect(supervisor.listWindows('game_system')).resolves.toEqual([
      { index: 0, label: 'database', state: 'exited' },
    ]);
    expect(supervisor.getLogs({ source: 'database' }).map((entry) => entry.message)).toEqual([
      'Exited with code 1 signal null',
    ]);
  });

  it('captures window output line by line', async () => {
    await supervisor.createSession('game_system', window('database'));
    children[0].stdout.write('listening on 8890\n\n');
    children[0].stderr.write('warning: slow disk\n');
    await flush();

    expect(supervisor.getLogs({ source: 'database' }).map((entry) => [ entry.level, entry.message ])).toEqual([
      [ 'info', 'listening on 8890' ],
      [ 'error', 'warning: slow disk' ],
    ]);
    expect(supervisor.getLogs({ limit: 1 }).map((entry) => entry.message)).toEqual([ 'warning: slow disk' ]);
  });

  it('refuses a second session with the same name', async () => {
    await supervisor.createSession('game_system', window('database'));

    await expect(supervisor.createSession('game_system', window('database'))).rejects.toBeInstanceOf(SessionCreationError);
  });

  it('kills the process tree of running windows only', async () => {
    await supervisor.createSession('game_system', window('database'));
    await supervisor.addWindow('game_system', window('player'));
    children[1].emit('exit', 0, null);

    await supervisor.killSession('game_system');

    expect(vi.mocked(kill)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(kill).mock.calls[0][0]).toBe(1000);
    expect(vi.mocked(kill).mock.calls[0][1]).toBe('SIGTERM');
    await expect(supervisor.hasSession('game_system')).resolves.toBe(false);
  });
});
