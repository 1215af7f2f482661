import fs from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import { ProvisioningError, errorMessage } from '../errors';
import { runCommand, tail, type CommandResult, type CommandRunner } from '../util/CommandRunner';

export interface EnvironmentDescriptor {
  /** Absolute path of the environment root. */
  rootPath: string;
  /** Absolute path of the dependency manifest. */
  dependencyManifestPath: string;
  isProvisioned: boolean;
}

export interface ProvisionedEnvironment {
  descriptor: EnvironmentDescriptor;
  /** Directory whose executables take precedence inside the environment. */
  binDir: string;
  activateScript: string;
  /** Variables a process needs to run inside the environment. */
  env: Record<string, string>;
}

export interface EnvironmentProvisionerOptions {
  /** Interpreter used to create the environment. */
  interpreter?: string;
  runner?: CommandRunner;
  /** PATH the activation prefix is prepended to. */
  basePath?: string;
}

function binDirOf(rootPath: string): string {
  return path.join(rootPath, process.platform === 'win32' ? 'Scripts' : 'bin');
}

/**
 * Marker whose presence means the environment was already created.
 */
function markerOf(rootPath: string): string {
  return path.join(binDirOf(rootPath), process.platform === 'win32' ? 'python.exe' : 'python');
}

export function describeEnvironment(rootPath: string, dependencyManifestPath: string): EnvironmentDescriptor {
  return {
    rootPath,
    dependencyManifestPath,
    isProvisioned: fs.existsSync(markerOf(rootPath)),
  };
}

/**
 * Creates the isolated dependency environment once and re-syncs its dependencies on every call.
 */
export class EnvironmentProvisioner {
  protected readonly logger = getLoggerFor(this);
  private readonly interpreter: string;
  private readonly runner: CommandRunner;
  private readonly basePath: string;

  public constructor(options: EnvironmentProvisionerOptions = {}) {
    this.interpreter = options.interpreter ?? 'python3';
    this.runner = options.runner ?? runCommand;
    this.basePath = options.basePath ?? process.env.PATH ?? '';
  }

  public async ensure(descriptor: EnvironmentDescriptor): Promise<ProvisionedEnvironment> {
    const binDir = binDirOf(descriptor.rootPath);

    if (descriptor.isProvisioned || fs.existsSync(descriptor.rootPath)) {
      this.logger.info(`Reusing environment at ${descriptor.rootPath}`);
    } else {
      this.logger.info(`Creating environment at ${descriptor.rootPath}`);
      await this.exec([ this.interpreter, '-m', 'venv', descriptor.rootPath ], 'Environment creation failed');
    }

    if (!fs.existsSync(descriptor.dependencyManifestPath)) {
      throw new ProvisioningError(
        `Dependency manifest not found: ${descriptor.dependencyManifestPath}`,
        [],
        null,
      );
    }

    this.logger.info(`Syncing dependencies from ${descriptor.dependencyManifestPath}`);
    await this.exec(
      [ path.join(binDir, 'pip'), 'install', '-r', descriptor.dependencyManifestPath ],
      'Dependency installation failed',
    );

    return {
      descriptor: { ...descriptor, isProvisioned: true },
      binDir,
      activateScript: path.join(binDir, 'activate'),
      env: {
        VIRTUAL_ENV: descriptor.rootPath,
        PATH: this.basePath ? `${binDir}${path.delimiter}${this.basePath}` : binDir,
      },
    };
  }

  private async exec(command: string[], failure: string): Promise<void> {
    const [ executable, ...args ] = command;
    let result: CommandResult;
    try {
      result = await this.runner(executable, args);
    } catch (error: unknown) {
      throw new ProvisioningError(`${failure}: ${errorMessage(error)}`, command, null);
    }
    if (result.code !== 0) {
      const detail = tail(result.stderr || result.stdout);
      this.logger.error(`${command.join(' ')} exited with code ${result.code ?? 'null'}`);
      throw new ProvisioningError(
        `${failure} (exit code ${result.code ?? 'null'})${detail ? `: ${detail}` : ''}`,
        command,
        result.code,
        result.stderr,
      );
    }
  }
}
