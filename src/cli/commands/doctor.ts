import { existsSync } from 'node:fs';
import path from 'node:path';
import type { CommandModule } from 'yargs';
import { loadEnvFile } from '../../config/loadConfig';
import { SERVICE_ENV_KEYS, type OrchestrationConfig } from '../../config/OrchestrationConfig';
import { describeEnvironment } from '../../environment/EnvironmentProvisioner';
import { instantiateSupervisor } from '../../supervisor';
import { isCommandAvailable } from '../../util/CommandRunner';
import { loadCliConfig, runCli } from '../runtime';

interface DoctorArgs {
  config?: string;
}

interface CheckResult {
  ok: boolean;
  label: string;
}

function check(ok: boolean, label: string): CheckResult {
  const icon = ok ? '✓' : '✗';
  console.log(`${icon} ${label}`);
  return { ok, label };
}

function checkNodeVersion(): CheckResult {
  const major = parseInt(process.versions.node.split('.')[0], 10);
  return check(major >= 20, `Node.js v${process.versions.node} (≥ 20)`);
}

async function checkBackend(config: OrchestrationConfig): Promise<CheckResult> {
  if (config.backend === 'auto') {
    const screen = await instantiateSupervisor('screen').isAvailable();
    const tmux = await instantiateSupervisor('tmux').isAvailable();
    const picked = screen ? 'screen' : tmux ? 'tmux' : 'native';
    return check(true, `Backend auto -> ${picked}`);
  }
  const available = await instantiateSupervisor(config.backend).isAvailable();
  return check(available, available ? `Backend ${config.backend} installed` : `Backend ${config.backend} not installed`);
}

function checkEnvironment(config: OrchestrationConfig): CheckResult {
  const descriptor = describeEnvironment(
    path.resolve(config.workingRoot, config.environment.rootPath),
    path.resolve(config.workingRoot, config.environment.manifestPath),
  );
  // Not a failure: `start` creates it
  return check(true, descriptor.isProvisioned
    ? `Environment provisioned at ${config.environment.rootPath}`
    : `Environment not created yet (${config.environment.rootPath}); start or setup will create it`);
}

function checkEnvKeys(config: OrchestrationConfig): CheckResult[] {
  const loaded = loadEnvFile(config);
  const results = [ check(loaded !== undefined, `${config.envFile} found`) ];
  const missing = SERVICE_ENV_KEYS.filter((key) => !process.env[key]);
  results.push(check(missing.length === 0, missing.length === 0
    ? 'Service variables defined'
    : `Service variables missing: ${missing.join(', ')}`));
  return results;
}

function checkServiceDirectories(config: OrchestrationConfig): CheckResult[] {
  return config.services.map((service) => {
    const cwd = path.resolve(config.workingRoot, service.cwd ?? '.');
    return check(existsSync(cwd), `${service.name}: working directory ${path.relative(config.workingRoot, cwd) || '.'}`);
  });
}

export const doctorCommand: CommandModule<object, DoctorArgs> = {
  command: 'doctor',
  describe: 'Check the host and the launcher configuration',
  builder: (yargs) =>
    yargs
      .option('config', {
        alias: 'c',
        type: 'string',
        description: 'Path to the launcher config (default: config/game-stack.json)',
      }),
  handler: (argv) => runCli(async () => {
    console.log('Running diagnostics...\n');
    const config = loadCliConfig(argv);
    const results: CheckResult[] = [];

    results.push(checkNodeVersion());
    results.push(await checkBackend(config));
    results.push(check(await isCommandAvailable(config.environment.interpreter), `Interpreter ${config.environment.interpreter} found`));
    results.push(check(existsSync(path.resolve(config.workingRoot, config.environment.manifestPath)), `${config.environment.manifestPath} found`));
    results.push(checkEnvironment(config));
    results.push(...checkEnvKeys(config));
    results.push(...checkServiceDirectories(config));

    const failed = results.filter((r) => !r.ok);
    console.log('');
    if (failed.length === 0) {
      console.log('All checks passed.');
    } else {
      console.log(`${failed.length} issue(s) found.`);
    }
    return undefined;
  }),
};
