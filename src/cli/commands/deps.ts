/**
 * Deps command - report the project's language, framework and
 * dependencies.
 */
import { Command } from 'commander';
import { scanDependencies } from '../../core/dependencies/profile.js';
import { toDependencyPayload } from '../../core/dependencies/payload.js';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { projectRootFor } from '../options.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface DepsOptions {
  config: string;
}

/**
 * Create the deps command.
 */
export function createDepsCommand(): Command {
  return new Command('deps')
    .description('Detect language, framework, external dependencies and cross-module imports')
    .option('-c, --config <path>', 'Invariant configuration file (settings only)', DEFAULT_CONFIG_PATH)
    .action(async (options: DepsOptions, command: Command) => {
      try {
        const profile = await scanDependencies(projectRootFor(command), {
          configPath: options.config,
          logger: logger.child('deps'),
        });
        console.log(JSON.stringify(toDependencyPayload(profile), null, 2));
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
