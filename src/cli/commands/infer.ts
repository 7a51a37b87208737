/**
 * Infer command - propose boundary invariants from the project's current
 * dependency structure.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { buildProjectGraph } from '../../core/graph/project.js';
import { parseGraphPayload } from '../../core/graph/payload.js';
import type { AdjacencyGraph } from '../../core/graph/types.js';
import { DEFAULT_MIN_CONFIDENCE, inferRules } from '../../core/infer/rules.js';
import { renderInferredRules, type InferFormat } from '../../core/infer/render.js';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { choiceParser, parseConfidence, projectRootFor } from '../options.js';
import { readJsonFile } from '../../utils/file-system.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const INFER_FORMATS: readonly InferFormat[] = ['yaml', 'json'];

interface InferCommandOptions {
  graph?: string;
  minConfidence: number;
  format: InferFormat;
  config: string;
}

/**
 * Create the infer command.
 */
export function createInferCommand(): Command {
  return new Command('infer')
    .description('Propose boundary invariants from the existing module structure')
    .option('--graph <file>', 'Graph payload (JSON) to analyse instead of building one')
    .option('--min-confidence <n>', 'Minimum confidence (0-100)', parseConfidence, DEFAULT_MIN_CONFIDENCE)
    .option('-f, --format <format>', 'Output format (yaml, json)', choiceParser(INFER_FORMATS), 'yaml')
    .option('-c, --config <path>', 'Invariant configuration file (settings only)', DEFAULT_CONFIG_PATH)
    .action(async (options: InferCommandOptions, command: Command) => {
      try {
        await runInfer(projectRootFor(command), options);
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

async function runInfer(projectRoot: string, options: InferCommandOptions): Promise<void> {
  const log = logger.child('infer');
  let graph: AdjacencyGraph;
  if (options.graph) {
    graph = parseGraphPayload(await readJsonFile(path.resolve(projectRoot, options.graph)));
  } else {
    graph = await buildProjectGraph(projectRoot, { configPath: options.config, logger: log });
  }

  const rules = inferRules(graph, { minConfidence: options.minConfidence, logger: log });
  log.info(`Inferred ${rules.length} ${rules.length === 1 ? 'rule' : 'rules'}`);
  console.log(renderInferredRules(rules, options.minConfidence, options.format).trimEnd());
}
