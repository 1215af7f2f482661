import path from 'node:path';
import type { CommandModule } from 'yargs';
import { describeEnvironment, EnvironmentProvisioner } from '../../environment/EnvironmentProvisioner';
import { ProvisioningError } from '../../errors';
import { EXIT_ABORTED, loadCliConfig, runCli } from '../runtime';

interface SetupArgs {
  config?: string;
}

export const setupCommand: CommandModule<object, SetupArgs> = {
  command: 'setup',
  describe: 'Create the dependency environment and install the manifest, without launching anything',
  builder: (yargs) =>
    yargs
      .option('config', {
        alias: 'c',
        type: 'string',
        description: 'Path to the launcher config (default: config/game-stack.json)',
      }),
  handler: (argv) => runCli(async () => {
    const config = loadCliConfig(argv);
    const { rootPath, manifestPath, interpreter } = config.environment;
    const provisioner = new EnvironmentProvisioner({ interpreter });

    try {
      const environment = await provisioner.ensure(describeEnvironment(
        path.resolve(config.workingRoot, rootPath),
        path.resolve(config.workingRoot, manifestPath),
      ));
      console.log(`Environment ready at ${environment.descriptor.rootPath}`);
      return undefined;
    } catch (error: unknown) {
      if (error instanceof ProvisioningError) {
        console.error(`Setup failed: ${error.message}`);
        return EXIT_ABORTED;
      }
      throw error;
    }
  }),
};
