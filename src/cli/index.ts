#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { startCommand } from './commands/start';
import { setupCommand } from './commands/setup';
import { statusCommand } from './commands/status';
import { attachCommand } from './commands/attach';
import { stopCommand } from './commands/stop';
import { doctorCommand } from './commands/doctor';
import { EXIT_INTERNAL_ERROR } from './runtime';

yargs(hideBin(process.argv))
  .scriptName('game-stack')
  .usage('$0 <command> [options]')
  .command(startCommand)
  .command(setupCommand)
  .command(statusCommand)
  .command(attachCommand)
  .command(stopCommand)
  .command(doctorCommand)
  .strict()
  .help()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = EXIT_INTERNAL_ERROR;
  });
