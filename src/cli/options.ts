/**
 * Shared option handling for CLI commands.
 */
import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

export const LOG_LEVEL_ENV = 'ARCHWARDEN_LOG_LEVEL';

/** Options accepted before any sub-command. */
export type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
  cwd?: string;
};

/**
 * Flags win over the environment; the environment wins over the default.
 */
export function resolveLogLevel(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';
  const fromEnv = env[LOG_LEVEL_ENV];
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return 'info';
}

export function projectRootFor(command: Command): string {
  const { cwd } = command.optsWithGlobals<GlobalOptions>();
  return path.resolve(cwd ?? process.cwd());
}

/**
 * Option parser restricting a value to a fixed set.
 */
export function choiceParser<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value: string): T => {
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Expected one of: ${choices.join(', ')}`);
    }
    return match;
  };
}

export function parseConfidence(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError('Expected a number between 0 and 100');
  }
  return parsed;
}
