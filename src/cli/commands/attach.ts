import type { CommandModule } from 'yargs';
import { SessionRegistry } from '../../orchestrator/SessionRegistry';
import { createSupervisor } from '../../supervisor';
import { EXIT_NOT_RUNNING, loadCliConfig, runCli } from '../runtime';

interface AttachArgs {
  config?: string;
  session?: string;
  backend?: string;
}

export const attachCommand: CommandModule<object, AttachArgs> = {
  command: 'attach',
  describe: 'Attach this terminal to the running session',
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
    const supervisor = await createSupervisor(config.backend);
    const registry = new SessionRegistry(supervisor);

    if (!await registry.describe(config.sessionName)) {
      console.error(`Session ${config.sessionName} is not running.`);
      return EXIT_NOT_RUNNING;
    }
    const commands = registry.operatorCommands(config.sessionName);
    console.log(`Attaching to ${config.sessionName}; detach with ${commands.detach}.`);
    return registry.attach(config.sessionName);
  }),
};
