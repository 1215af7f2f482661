import path from 'node:path';
import { setGlobalLoggerFactory } from 'global-logger-factory';
import { loadOrchestrationConfig, type ConfigOverrides } from '../config/loadConfig';
import type { OrchestrationConfig } from '../config/OrchestrationConfig';
import { ConfigError } from '../errors';
import { ConfigurableLoggerFactory } from '../logging/ConfigurableLoggerFactory';
import type { OrchestrationReport } from '../orchestrator/Orchestrator';

export const EXIT_OK = 0;
export const EXIT_NOT_RUNNING = 10;
export const EXIT_CONFIG_ERROR = 20;
export const EXIT_PARTIAL = 30;
export const EXIT_ABORTED = 40;
export const EXIT_INTERNAL_ERROR = 50;

export interface CommonArgs {
  config?: string;
  session?: string;
  backend?: string;
}

let loggerReady = false;

export function initLogger(workingRoot: string): void {
  if (loggerReady) {
    return;
  }
  const loggerFactory = new ConfigurableLoggerFactory(process.env.GAME_STACK_LOG_LEVEL || 'info', {
    fileName: path.join(workingRoot, 'logs/game-stack-%DATE%.log'),
  });
  setGlobalLoggerFactory(loggerFactory);
  loggerReady = true;
}

export function loadCliConfig(argv: CommonArgs, extra: ConfigOverrides = {}): OrchestrationConfig {
  const workingRoot = process.cwd();
  initLogger(workingRoot);
  return loadOrchestrationConfig({
    workingRoot,
    configPath: argv.config,
    overrides: { backend: argv.backend, sessionName: argv.session, ...extra },
  });
}

/**
 * 0 when every service is up, 30 when the run completed with failed or exited services, 40 when aborted.
 */
export function exitCodeFor(report: OrchestrationReport): number {
  if (report.state === 'aborted') {
    return EXIT_ABORTED;
  }
  const unhealthy = report.services.some((service) => service.outcome === 'failed' || service.outcome === 'exited-early');
  return unhealthy ? EXIT_PARTIAL : EXIT_OK;
}

/**
 * Runs a command body and turns escaped errors into the documented exit codes.
 */
export async function runCli(body: () => Promise<number | void>): Promise<void> {
  try {
    const code = await body();
    if (typeof code === 'number' && code !== EXIT_OK) {
      process.exitCode = code;
    }
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`Config error: ${error.message}`);
      process.exitCode = EXIT_CONFIG_ERROR;
      return;
    }
    console.error(error instanceof Error ? error.stack ?? error.message : String(error));
    process.exitCode = EXIT_INTERNAL_ERROR;
  }
}
