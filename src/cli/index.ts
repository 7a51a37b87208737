/**
 * CLI program: global options and sub-commands.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createScanCommand } from './commands/scan.js';
import { createImportsCommand } from './commands/imports.js';
import { createGraphCommand } from './commands/graph.js';
import { createInferCommand } from './commands/infer.js';
import { createDepsCommand } from './commands/deps.js';
import { createStructureCommand } from './commands/structure.js';
import { resolveLogLevel, type GlobalOptions } from './options.js';
import { logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('archwarden')
    .description('Check source trees against declared architectural invariants')
    .version(VERSION)
    .option('--verbose', 'Log debug output')
    .option('-q, --quiet', 'Only log errors')
    .option('--cwd <dir>', 'Project root (default: current directory)')
    .hook('preAction', (thisCommand) => {
      logger.setLevel(resolveLogLevel(thisCommand.opts<GlobalOptions>()));
    });

  [
    createScanCommand,
    createImportsCommand,
    createGraphCommand,
    createInferCommand,
    createDepsCommand,
    createStructureCommand,
  ].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
