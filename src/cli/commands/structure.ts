/**
 * Structure command - report layer directories, naming conventions and
 * untested source files.
 */
import { Command } from 'commander';
import { scanStructure } from '../../core/structure/scanner.js';
import { toStructurePayload } from '../../core/structure/payload.js';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { projectRootFor } from '../options.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface StructureOptions {
  config: string;
}

/**
 * Create the structure command.
 */
export function createStructureCommand(): Command {
  return new Command('structure')
    .description('Report directory layers, naming patterns, test gaps and file counts')
    .option('-c, --config <path>', 'Invariant configuration file (settings only)', DEFAULT_CONFIG_PATH)
    .action(async (options: StructureOptions, command: Command) => {
      try {
        const log = logger.child('structure');
        const profile = await scanStructure(projectRootFor(command), { configPath: options.config, logger: log });
        if (profile.testGaps.length > 0) {
          log.info(`${profile.testGaps.length} source ${profile.testGaps.length === 1 ? 'file has' : 'files have'} no test`);
        }
        console.log(JSON.stringify(toStructurePayload(profile), null, 2));
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
