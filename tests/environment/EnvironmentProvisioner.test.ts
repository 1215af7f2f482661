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

import { EnvironmentProvisioner, describeEnvironment } from '../../src/environment/EnvironmentProvisioner';
import { ProvisioningError } from '../../src/errors';
import { createFakeRunner } from '../helpers/FakeCommandRunner';

describe('EnvironmentProvisioner', () => {
  let tmpDir: string;
  let rootPath: string;
  let manifestPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'provision-test-'));
    rootPath = path.join(tmpDir, '.venv');
    manifestPath = path.join(tmpDir, 'requirements.txt');
    await fs.writeFile(manifestPath, 'python-dotenv\n', 'utf8');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates a missing environment, then installs the manifest', async () => {
    const { runner, calls } = createFakeRunner();
    const provisioner = new EnvironmentProvisioner({ runner, basePath: '/usr/bin' });

    const environment = await provisioner.ensure(describeEnvironment(rootPath, manifestPath));

    expect(calls.map((call) => [ call.command, ...call.args ])).toEqual([
      [ 'python3', '-m', 'venv', rootPath ],
      [ path.join(rootPath, 'bin', 'pip'), 'install', '-r', manifestPath ],
    ]);
    expect(environment.binDir).toBe(path.join(rootPath, 'bin'));
    expect(environment.activateScript).toBe(path.join(rootPath, 'bin', 'activate'));
    expect(environment.env).toEqual({
      VIRTUAL_ENV: rootPath,
      PATH: `${path.join(rootPath, 'bin')}:/usr/bin`,
    });
    expect(environment.descriptor.isProvisioned).toBe(true);
  });

  it('reuses an existing root but re-applies the manifest on every run', async () => {
    await fs.mkdir(rootPath);
    const { runner, calls } = createFakeRunner();
    const provisioner = new EnvironmentProvisioner({ runner, interpreter: 'python3.12' });

    await provisioner.ensure(describeEnvironment(rootPath, manifestPath));
    await provisioner.ensure(describeEnvironment(rootPath, manifestPath));

    expect(calls.map((call) => call.command)).toEqual([
      path.join(rootPath, 'bin', 'pip'),
      path.join(rootPath, 'bin', 'pip'),
    ]);
  });

  it('reports the marker interpreter as provisioned', async () => {
    await fs.mkdir(path.join(rootPath, 'bin'), { recursive: true });
    expect(describeEnvironment(rootPath, manifestPath).isProvisioned).toBe(false);

    await fs.writeFile(path.join(rootPath, 'bin', 'python'), '', 'utf8');
    expect(describeEnvironment(rootPath, manifestPath).isProvisioned).toBe(true);
  });

  it('fails when dependency installation exits non-zero', async () => {
    await fs.mkdir(rootPath);
    const { runner } = createFakeRunner(() => ({ code: 1, stderr: 'Collecting x\nERROR: no matching distribution\n' }));
    const provisioner = new EnvironmentProvisioner({ runner });

    const pending = provisioner.ensure(describeEnvironment(rootPath, manifestPath));

    await expect(pending).rejects.toBeInstanceOf(ProvisioningError);
    await expect(pending).rejects.toMatchObject({
      exitCode: 1,
      message: 'Dependency installation failed (exit code 1): Collecting x\nERROR: no matching distribution',
    });
  });

  it('fails when the interpreter cannot be spawned', async () => {
    const { runner, calls } = createFakeRunner(() => new Error('spawn python3 ENOENT'));
    const provisioner = new EnvironmentProvisioner({ runner });

    await expect(provisioner.ensure(describeEnvironment(rootPath, manifestPath)))
      .rejects.toThrow('Environment creation failed: spawn python3 ENOENT');
    expect(calls).toHaveLength(1);
  });

  it('fails before installing when the manifest is missing', async () => {
    await fs.mkdir(rootPath);
    const { runner, calls } = createFakeRunner();
    const provisioner = new EnvironmentProvisioner({ runner });
    const missing = path.join(tmpDir, 'missing.txt');

    await expect(provisioner.ensure(describeEnvironment(rootPath, missing)))
      .rejects.toThrow(`Dependency manifest not found: ${missing}`);
    expect(calls).toHaveLength(0);
  });
});
