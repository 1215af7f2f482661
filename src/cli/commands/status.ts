import type { CommandModule } from 'yargs';
import { SessionRegistry } from '../../orchestrator/SessionRegistry';
import { createSupervisor } from '../../supervisor';
import type { WindowState } from '../../supervisor/types';
import { EXIT_NOT_RUNNING, loadCliConfig, runCli } from '../runtime';

interface StatusArgs {
  config?: string;
  session?: string;
  backend?: string;
  json: boolean;
}

function stateIcon(state: WindowState): string {
  switch (state) {
    case 'running': return '●';
    case 'exited': return '✗';
    default: return '?';
  }
}

export const statusCommand: CommandModule<object, StatusArgs> = {
  command: 'status',
  describe: 'List the windows of the running session',
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
      })
      .option('json', {
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      }),
  handler: (argv) => runCli(async () => {
    const config = loadCliConfig(argv);
    const registry = new SessionRegistry(await createSupervisor(config.backend));
    const windows = await registry.describe(config.sessionName);

    if (!windows) {
      if (argv.json) {
        console.log(JSON.stringify({ session: config.sessionName, running: false, windows: [] }, null, 2));
      } else {
        console.log(`Session ${config.sessionName} is not running.`);
      }
      return EXIT_NOT_RUNNING;
    }

    if (argv.json) {
      console.log(JSON.stringify({ session: config.sessionName, running: true, windows }, null, 2));
      return undefined;
    }

    console.log(`Session ${config.sessionName}:`);
    for (const window of windows) {
      console.log(`${stateIcon(window.state)} [${window.index}] ${window.label.padEnd(10)} ${window.state}`);
    }
    return undefined;
  }),
};
