/**
 * Runs the CLI in-process, capturing stdout, log lines and the exit code.
 */
import { vi } from 'vitest';
import { createCli } from '../../../../src/cli/index.js';
import { MemorySink, logger, stderrSink } from '../../../../src/utils/logger.js';

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super(`process.exit(${code})`);
  }
}

export interface CliRun {
  stdout: string[];
  logs: string[];
  exitCode: number;
}

export async function runCli(args: string[]): Promise<CliRun> {
  const stdout: string[] = [];
  const sink = new MemorySink();
  logger.setSink(sink);
  const logSpy = vi.spyOn(console, 'log').mockImplementation((...values: unknown[]) => {
    stdout.push(values.map(String).join(' '));
  });
  const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
    throw new ExitSignal(Number(code ?? 0));
  });

  let exitCode = 0;
  try {
    await createCli().parseAsync(['node', 'archwarden', ...args]);
  } catch (error) {
    if (!(error instanceof ExitSignal)) throw error;
    exitCode = error.code;
  } finally {
    logSpy.mockRestore();
    exitSpy.mockRestore();
    logger.setSink(stderrSink);
  }
  return { stdout, logs: sink.lines, exitCode };
}
