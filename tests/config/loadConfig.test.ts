import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('global-logger-factory', () => ({
  getLoggerFor: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { loadEnvFile, loadOrchestrationConfig, parseConfig } from '../../src/config/loadConfig';
import { ConfigError } from '../../src/errors';

const REPO_ROOT = path.resolve(__dirname, '../..');

describe('loadOrchestrationConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('falls back to the stock services when no config file exists', () => {
    const config = loadOrchestrationConfig({ workingRoot: tmpDir, env: {} });

    expect(config.sessionName).toBe('game_system');
    expect(config.backend).toBe('screen');
    expect(config.workingRoot).toBe(tmpDir);
    expect(config.settle).toEqual({ mode: 'fixed' });
    expect(config.services.map((service) => [ service.name, service.windowIndex, service.settleDelay ])).toEqual([
      [ 'database', 0, 2000 ],
      [ 'developer', 1, 1000 ],
      [ 'player', 2, 0 ],
    ]);
  });

  it('loads the shipped config file', () => {
    const config = loadOrchestrationConfig({ workingRoot: REPO_ROOT, env: {} });

    expect(config.services.map((service) => service.name)).toEqual([ 'database', 'developer', 'player' ]);
    expect(config.services[0].command).toEqual([ 'python', 'server/db.py' ]);
    expect(config.services[1].dependsOn).toBe('database');
    expect(config.services[0].readiness).toEqual({ type: 'tcp', host: '${DB_HOST}', port: '${DB_PORT}' });
  });

  it('rejects an explicit path that does not exist', () => {
    expect(() => loadOrchestrationConfig({ workingRoot: tmpDir, configPath: 'nope.json', env: {} }))
      .toThrow(`Config file not found: ${path.join(tmpDir, 'nope.json')}`);
  });

  it('rejects malformed JSON', async () => {
    await fs.writeFile(path.join(tmpDir, 'stack.json'), '{ "sessionName": ', 'utf8');

    expect(() => loadOrchestrationConfig({ workingRoot: tmpDir, configPath: 'stack.json', env: {} }))
      .toThrow(ConfigError);
  });

  it('lets command-line overrides win over GAME_STACK_* variables', () => {
    const env = { GAME_STACK_BACKEND: 'tmux', GAME_STACK_SESSION: 'from_env' };

    const fromEnv = loadOrchestrationConfig({ workingRoot: tmpDir, env });
    expect(fromEnv.backend).toBe('tmux');
    expect(fromEnv.sessionName).toBe('from_env');

    const fromFlags = loadOrchestrationConfig({
      workingRoot: tmpDir,
      env,
      overrides: { backend: 'native', sessionName: 'from_flag', settle: 'probe' },
    });
    expect(fromFlags.backend).toBe('native');
    expect(fromFlags.sessionName).toBe('from_flag');
    expect(fromFlags.settle).toEqual({ mode: 'probe' });
  });

  it('rejects an unknown backend override', () => {
    expect(() => loadOrchestrationConfig({ workingRoot: tmpDir, env: {}, overrides: { backend: 'docker' } }))
      .toThrow('backend must be one of screen, tmux, native, auto, got "docker"');
  });

  it('loads the env file into the process environment', async () => {
    await fs.writeFile(path.join(tmpDir, '.env'), 'GAME_STACK_TEST_PORT=8890\n', 'utf8');
    const config = loadOrchestrationConfig({ workingRoot: tmpDir, env: {} });

    expect(loadEnvFile(config)).toEqual([ 'GAME_STACK_TEST_PORT' ]);
    expect(process.env.GAME_STACK_TEST_PORT).toBe('8890');
    delete process.env.GAME_STACK_TEST_PORT;
  });

  it('returns undefined when the env file is missing', () => {
    const config = loadOrchestrationConfig({ workingRoot: tmpDir, env: {} });
    expect(loadEnvFile(config)).toBeUndefined();
  });
});

describe('parseConfig', () => {
  const service = (name: string, extra: Record<string, unknown> = {}): Record<string, unknown> => ({
    name,
    command: [ 'python', `${name}.py` ],
    ...extra,
  });

  it('assigns window indices from declaration order and defaults the settle delay', () => {
    const config = parseConfig({ services: [ service('database'), service('player', { dependsOn: 'database' }) ] }, '/srv');

    expect(config.services).toEqual([
      { name: 'database', command: [ 'python', 'database.py' ], windowIndex: 0, settleDelay: 0 },
      { name: 'player', command: [ 'python', 'player.py' ], windowIndex: 1, settleDelay: 0, dependsOn: 'database' },
    ]);
  });

  it('rejects duplicate service names', () => {
    expect(() => parseConfig({ services: [ service('database'), service('database') ] }, '/srv'))
      .toThrow('services[1]: duplicate service name "database"');
  });

  it('rejects a dependency on a later service', () => {
    expect(() => parseConfig({ services: [ service('player', { dependsOn: 'database' }), service('database') ] }, '/srv'))
      .toThrow('services[0].dependsOn "database" must name a service declared before "player"');
  });

  it('rejects a window index that does not match the position', () => {
    expect(() => parseConfig({ services: [ service('database', { windowIndex: 2 }) ] }, '/srv'))
      .toThrow('services[0].windowIndex must equal its position (0), got 2');
  });

  it('rejects an empty command', () => {
    expect(() => parseConfig({ services: [ { name: 'database', command: [] } ] }, '/srv'))
      .toThrow('services[0].command must be a non-empty array of strings');
  });

  it('validates service environment variables and readiness probes', () => {
    const config = parseConfig({
      services: [
        service('database', {
          env: { DB_PORT: 8890 },
          readiness: { type: 'http', url: 'http://127.0.0.1:8890/health', retries: 3 },
        }),
      ],
    }, '/srv');

    expect(config.services[0].env).toEqual({ DB_PORT: '8890' });
    expect(config.services[0].readiness).toEqual({
      type: 'http',
      url: 'http://127.0.0.1:8890/health',
      retries: 3,
      initialDelay: undefined,
      maxDelay: undefined,
    });

    expect(() => parseConfig({ services: [ service('database', { env: { 'BAD-NAME': 'x' } }) ] }, '/srv'))
      .toThrow('services[0].env: "BAD-NAME" is not a valid variable name');
    expect(() => parseConfig({ services: [ service('database', { readiness: { type: 'udp' } }) ] }, '/srv'))
      .toThrow('services[0].readiness.type must be "tcp" or "http"');
  });

  it('rejects session names a backend cannot address', () => {
    expect(() => parseConfig({ sessionName: 'game system' }, '/srv'))
      .toThrow('config.sessionName may only contain letters, digits, "_", "." and "-"');
  });
});
