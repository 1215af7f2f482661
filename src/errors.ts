/**
 * Configuration file missing, unreadable or invalid.
 */
export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Environment creation or dependency sync failed. Fatal: nothing is launched.
 */
export class ProvisioningError extends Error {
  public constructor(
    message: string,
    public readonly command: string[],
    public readonly exitCode: number | null,
    public readonly stderr = '',
  ) {
    super(message);
    this.name = 'ProvisioningError';
  }
}

/**
 * A session with the same name is still alive after it was asked to quit.
 */
export class SessionConflictError extends Error {
  public constructor(public readonly sessionName: string) {
    super(`Session "${sessionName}" is still running after kill; refusing to launch into it`);
    this.name = 'SessionConflictError';
  }
}

export class SessionCreationError extends Error {
  public constructor(
    public readonly sessionName: string,
    reason: string,
  ) {
    super(`Failed to create session "${sessionName}": ${reason}`);
    this.name = 'SessionCreationError';
  }
}

/**
 * One service window could not be opened. Recorded in the run report; later services still launch.
 */
export class LaunchFailure extends Error {
  public constructor(
    public readonly service: string,
    reason: string,
  ) {
    super(`Failed to launch ${service}: ${reason}`);
    this.name = 'LaunchFailure';
  }
}

export class DependencyNotReadyError extends Error {
  public constructor(
    public readonly service: string,
    public readonly attempts: number,
  ) {
    super(`${service} did not become ready after ${attempts} attempt(s)`);
    this.name = 'DependencyNotReadyError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
