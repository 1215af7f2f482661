import type { CommandModule } from 'yargs';
import { SessionRegistry } from '../../orchestrator/SessionRegistry';
import { createSupervisor } from '../../supervisor';
import { EXIT_NOT_RUNNING, loadCliConfig, runCli } from '../runtime';

interface StopArgs {
  config?: string;
  session?: string;
  backend?: string;
}

export const stopCommand: CommandModule<object, StopArgs> = {
  command: 'stop',
  describe: 'Kill the session and every service window in it',
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
        choices: [ 'screen', 'tmux', 'auto' ],
        description: 'Session backend',
      }),
  handler: (argv) => runCli(async () => {
    const config = loadCliConfig(argv);
    const registry = new SessionRegistry(await createSupervisor(config.backend));

    console.log(`Stopping session ${config.sessionName}...`);
    if (!await registry.kill(config.sessionName)) {
      console.log('No running session found.');
      return EXIT_NOT_RUNNING;
    }
    console.log('Session stopped.');
    return undefined;
  }),
};
