/**
 * Supervisor backend factory.
 *
 * `auto` picks the first available backend in this order:
 * - screen (named sessions, windows survive the launcher)
 * - tmux
 * - native (child processes of the launcher; fallback)
 */
import { getLoggerFor } from 'global-logger-factory';
import type { BackendChoice, SupervisorBackend } from '../config/OrchestrationConfig';
import { ConfigError } from '../errors';
import type { CommandRunner } from '../util/CommandRunner';
import { NativeSupervisor } from './NativeSupervisor';
import { ScreenSupervisor } from './ScreenSupervisor';
import { TmuxSupervisor } from './TmuxSupervisor';
import type { ProcessSupervisor } from './types';

export * from './types';
export { NativeSupervisor } from './NativeSupervisor';
export { ScreenSupervisor } from './ScreenSupervisor';
export { TmuxSupervisor } from './TmuxSupervisor';

const logger = getLoggerFor('SupervisorFactory');

const AUTO_ORDER: SupervisorBackend[] = [ 'screen', 'tmux', 'native' ];

export interface SupervisorFactoryOptions {
  runner?: CommandRunner;
}

export function instantiateSupervisor(backend: SupervisorBackend, options: SupervisorFactoryOptions = {}): ProcessSupervisor {
  switch (backend) {
    case 'screen':
      return new ScreenSupervisor({ runner: options.runner });
    case 'tmux':
      return new TmuxSupervisor({ runner: options.runner });
    case 'native':
      return new NativeSupervisor();
  }
}

/**
 * Returns a ready-to-use supervisor for the requested backend. An explicitly requested
 * backend that is not installed is a configuration error.
 */
export async function createSupervisor(
  choice: BackendChoice,
  options: SupervisorFactoryOptions = {},
): Promise<ProcessSupervisor> {
  if (choice !== 'auto') {
    const supervisor = instantiateSupervisor(choice, options);
    if (!await supervisor.isAvailable()) {
      throw new ConfigError(`Backend "${choice}" is not available on this host (is it installed?)`);
    }
    return supervisor;
  }

  for (const backend of AUTO_ORDER) {
    const supervisor = instantiateSupervisor(backend, options);
    if (await supervisor.isAvailable()) {
      if (backend === 'native') {
        logger.warn('Neither screen nor tmux found, running services as child processes');
      }
      return supervisor;
    }
  }
  return new NativeSupervisor();
}
