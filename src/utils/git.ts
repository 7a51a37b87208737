/**
 * Git integration utilities for diff-mode scans.
 */

import { exec } from 'node:child_process';
import { promisify } from 'node:util';

const execAsync = promisify(exec);

function splitLines(stdout: string): string[] {
  const trimmed = stdout.trim();
  if (!trimmed) {
    return [];
  }
  return trimmed
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Get files changed relative to HEAD (staged and unstaged), including
 * deleted files. Returns relative paths from the project root.
 *
 * Returns an empty list outside a git repository.
 */
export async function getChangedFiles(projectRoot: string): Promise<string[]> {
  try {
    const { stdout } = await execAsync('git diff --name-only HEAD', {
      cwd: projectRoot,
      encoding: 'utf-8',
    });
    return splitLines(stdout);
  } catch { /* not a git repo or git command failed */
    return [];
  }
}
