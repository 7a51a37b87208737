/**
 * Imports command - print the import specifiers of one file.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { extractImportsFromFile, languageForPath } from '../../extractors/index.js';
import { projectRootFor } from '../options.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface ImportsOptions {
  json?: boolean;
}

export function createImportsCommand(): Command {
  return new Command('imports')
    .description('Print the import specifiers extracted from a file')
    .argument('<file>', 'Source file')
    .option('--json', 'Output as a JSON array')
    .action(async (file: string, options: ImportsOptions, command: Command) => {
      try {
        const absolutePath = path.resolve(projectRootFor(command), file);
        if (languageForPath(absolutePath) === null) {
          logger.warn(`Unsupported file type: ${file}`);
        }
        const imports = await extractImportsFromFile(absolutePath, { logger });
        if (options.json) {
          console.log(JSON.stringify(imports));
        } else if (imports.length > 0) {
          console.log(imports.join('\n'));
        }
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
