/**
 * Scan command - check project files against the configured invariants.
 */
import { Command } from 'commander';
import { runScan } from '../../core/scan/scanner.js';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import { OUTPUT_FORMATS, type IFormatter, type OutputFormat } from '../formatters/types.js';
import { choiceParser, projectRootFor } from '../options.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface ScanCommandOptions {
  diff?: boolean;
  format: OutputFormat;
  config: string;
  failOnError?: boolean;
}

/**
 * Create the scan command.
 */
export function createScanCommand(): Command {
  return new Command('scan')
    .description('Check project files against the configured invariants')
    .argument('[scope]', 'Sub-path of the project to scan')
    .option('--diff', 'Only scan files changed relative to HEAD')
    .option('-f, --format <format>', 'Output format (json, human)', choiceParser(OUTPUT_FORMATS), 'json')
    .option('-c, --config <path>', 'Invariant configuration file', DEFAULT_CONFIG_PATH)
    .option('--fail-on-error', 'Exit with code 1 when error-severity violations are found')
    .action(async (scope: string | undefined, options: ScanCommandOptions, command: Command) => {
      try {
        await runScanCommand(projectRootFor(command), scope, options);
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

async function runScanCommand(
  projectRoot: string,
  scope: string | undefined,
  options: ScanCommandOptions
): Promise<void> {
  const result = await runScan(projectRoot, {
    scope,
    diff: options.diff,
    configPath: options.config,
    logger: logger.child('scan'),
  });

  const formatter: IFormatter = options.format === 'human' ? new HumanFormatter() : new JsonFormatter();
  console.log(formatter.formatScan(result));

  if (options.failOnError && result.stats.errors > 0) {
    process.exit(1);
  }
}
