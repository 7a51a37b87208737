/**
 * Graph command - build the module adjacency graph for the project.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { buildProjectGraph } from '../../core/graph/project.js';
import { buildViolationIndex } from '../../core/graph/builder.js';
import { formatGraph } from '../../core/graph/format.js';
import type { GraphFormat, ViolationIndex } from '../../core/graph/types.js';
import { ScanPayloadSchema } from '../../core/scan/payload.js';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { choiceParser, projectRootFor } from '../options.js';
import { readJsonFile } from '../../utils/file-system.js';
import { ErrorCodes, SystemError, getErrorMessage } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';

const GRAPH_FORMATS: readonly GraphFormat[] = ['json', 'mermaid', 'dot'];

interface GraphOptions {
  violations?: string;
  format: GraphFormat;
  config: string;
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Build the module dependency graph')
    .argument('[scope]', 'Sub-path of the project to include')
    .option('--violations <file>', 'Scan payload (JSON) whose violations mark graph edges')
    .option('-f, --format <format>', 'Output format (json, mermaid, dot)', choiceParser(GRAPH_FORMATS), 'json')
    .option('-c, --config <path>', 'Invariant configuration file (settings only)', DEFAULT_CONFIG_PATH)
    .action(async (scope: string | undefined, options: GraphOptions, command: Command) => {
      try {
        await runGraph(projectRootFor(command), scope, options);
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

async function runGraph(projectRoot: string, scope: string | undefined, options: GraphOptions): Promise<void> {
  const violationIndex = options.violations
    ? await loadViolationIndex(path.resolve(projectRoot, options.violations))
    : undefined;

  const graph = await buildProjectGraph(projectRoot, {
    scope,
    violationIndex,
    configPath: options.config,
    logger: logger.child('graph'),
  });

  if (graph.modules.length === 0) {
    logger.warn('No source files found');
  }
  console.log(formatGraph(graph, options.format));
}

/**
 * Read a scan payload and index the violations that name an import.
 */
export async function loadViolationIndex(filePath: string): Promise<ViolationIndex> {
  const result = ScanPayloadSchema.safeParse(await readJsonFile(filePath));
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_PAYLOAD,
      `Invalid scan payload in ${filePath}: ${formatZodError(result.error)}`,
      { path: filePath }
    );
  }
  return buildViolationIndex(result.data.violations);
}
