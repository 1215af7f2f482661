import type { CommandModule } from 'yargs';
import { loadEnvFile } from '../../config/loadConfig';
import { EnvironmentProvisioner } from '../../environment/EnvironmentProvisioner';
import { errorMessage } from '../../errors';
import { Orchestrator } from '../../orchestrator/Orchestrator';
import { NetworkReadinessProbe } from '../../orchestrator/ReadinessProbe';
import { createSupervisor, type ProcessSupervisor } from '../../supervisor';
import { exitCodeFor, loadCliConfig, runCli } from '../runtime';

interface StartArgs {
  config?: string;
  session?: string;
  backend?: string;
  settle?: string;
  json: boolean;
}

/**
 * Native windows are children of this process: keep it in the foreground until interrupted.
 */
function holdForeground(supervisor: ProcessSupervisor, sessionName: string): Promise<void> {
  return new Promise((resolve) => {
    const shutdown = (signal: string): void => {
      console.log(`\nReceived ${signal}, stopping session ${sessionName}...`);
      supervisor.killSession(sessionName).then(resolve, (error: unknown) => {
        console.error(`Failed to stop session ${sessionName}: ${errorMessage(error)}`);
        resolve();
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });
}

export const startCommand: CommandModule<object, StartArgs> = {
  command: [ 'start', '$0' ],
  describe: 'Provision the environment and launch every service into the session',
  builder: (yargs) =>
    yargs
      .option('config', {
        alias: 'c',
        type: 'string',
        description: 'Path to the launcher config (default: config/game-stack.json)',
      })
      .option('session', {
        alias: 's',
        type: 'string',
        description: 'Session name',
      })
      .option('backend', {
        alias: 'b',
        type: 'string',
        choices: [ 'screen', 'tmux', 'native', 'auto' ],
        description: 'Session backend',
      })
      .option('settle', {
        type: 'string',
        choices: [ 'fixed', 'probe' ],
        description: 'How to wait between service launches',
      })
      .option('json', {
        type: 'boolean',
        description: 'Print the run report as JSON',
        default: false,
      }),
  handler: (argv) => runCli(async () => {
    const config = loadCliConfig(argv, { settle: argv.settle });
    loadEnvFile(config);

    const supervisor = await createSupervisor(config.backend);
    const orchestrator = new Orchestrator(config, {
      provisioner: new EnvironmentProvisioner({ interpreter: config.environment.interpreter }),
      supervisor,
      probe: config.settle.mode === 'probe' ? new NetworkReadinessProbe() : undefined,
      output: argv.json ? (): void => undefined : undefined,
    });

    const report = await orchestrator.run();
    if (argv.json) {
      console.log(JSON.stringify(report, null, 2));
    }

    if (supervisor.backend === 'native' && report.state === 'complete') {
      console.log('Streaming service output; press Ctrl+C to stop all services.');
      await holdForeground(supervisor, config.sessionName);
    }
    return exitCodeFor(report);
  }),
};
