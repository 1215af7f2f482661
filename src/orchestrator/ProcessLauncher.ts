import fs from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import type { ServiceSpec } from '../config/OrchestrationConfig';
import type { ProvisionedEnvironment } from '../environment/EnvironmentProvisioner';
import { LaunchFailure, errorMessage } from '../errors';
import type { WindowSpec } from '../supervisor/types';
import type { SessionHandle, SessionRegistry, WindowHandle } from './SessionRegistry';

export interface LaunchResult {
  service: string;
  session: SessionHandle;
  window?: WindowHandle;
  /** Set when the window could not be opened. */
  error?: LaunchFailure;
}

export interface ProcessLauncherOptions {
  sessionName: string;
  /** Absolute root that service working directories are relative to. */
  workingRoot: string;
  environment: ProvisionedEnvironment;
}

/**
 * Turns a service declaration into a session window running inside the provisioned environment.
 */
export class ProcessLauncher {
  protected readonly logger = getLoggerFor(this);

  public constructor(
    private readonly registry: SessionRegistry,
    private readonly options: ProcessLauncherOptions,
  ) {}

  /**
   * Opens the service's window and returns as soon as the backend has accepted it.
   * Without a session the window becomes window 0 of a new one; `SessionCreationError`
   * propagates. A failure to add a later window is returned in the result instead.
   */
  public async launch(session: SessionHandle | undefined, spec: ServiceSpec): Promise<LaunchResult> {
    if (!session) {
      this.logger.info(`Starting ${spec.name} in window 0 of new session ${this.options.sessionName}`);
      const created = await this.registry.createSession(this.options.sessionName, this.toWindowSpec(spec));
      return { service: spec.name, session: created, window: created.windows[0] };
    }

    this.logger.info(`Starting ${spec.name} in window ${session.windows.length}`);
    try {
      const handle = await this.registry.addWindow(session, this.toWindowSpec(spec));
      return { service: spec.name, session, window: handle };
    } catch (error: unknown) {
      const failure = error instanceof LaunchFailure ? error : new LaunchFailure(spec.name, errorMessage(error));
      this.logger.error(failure.message);
      return { service: spec.name, session, error: failure };
    }
  }

  /**
   * Throws `LaunchFailure` for a service without a command.
   */
  public toWindowSpec(spec: ServiceSpec): WindowSpec {
    if (spec.command.length === 0) {
      throw new LaunchFailure(spec.name, 'command is empty');
    }
    return {
      label: spec.name,
      command: this.resolveCommand(spec.command),
      cwd: this.resolveCwd(spec),
      env: { ...this.options.environment.env, ...spec.env },
      activateScript: this.options.environment.activateScript,
    };
  }

  public resolveCwd(spec: ServiceSpec): string {
    return path.resolve(this.options.workingRoot, spec.cwd ?? '.');
  }

  /**
   * Bare executable names found in the environment's bin directory are pinned to it.
   */
  public resolveCommand(command: string[]): string[] {
    if (command.length === 0) {
      return [];
    }
    const [ executable, ...args ] = command;
    if (executable.includes('/') || executable.includes(path.sep)) {
      return [ ...command ];
    }
    const candidate = path.join(this.options.environment.binDir, executable);
    return fs.existsSync(candidate) ? [ candidate, ...args ] : [ ...command ];
  }
}
