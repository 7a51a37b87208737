/**
 * File system operations - reading, writing, and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';
import { ErrorCodes, SystemError, getErrorMessage } from './errors.js';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file, returning null when it is missing or unreadable.
 */
export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Read and parse a JSON file. The result is untyped; validate it with a
 * schema.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(ErrorCodes.FILE_READ_ERROR, `Failed to read ${filePath}: ${getErrorMessage(error)}`, {
      path: filePath,
    });
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new SystemError(ErrorCodes.PARSE_ERROR, `Invalid JSON in ${filePath}: ${getErrorMessage(error)}`, {
      path: filePath,
    });
  }
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Get file stats, or null when the path does not exist.
 */
export async function getStatsOrNull(filePath: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(filePath);
  } catch {
    return null;
  }
}

export interface GlobOptions {
  cwd?: string;
  ignore?: string[];
  absolute?: boolean;
  /** Maximum directory depth read below `cwd`; 1 lists `cwd` itself only */
  deep?: number;
  /** Which entries to return (default: files) */
  entries?: 'files' | 'directories' | 'all';
}

/**
 * Find entries matching glob patterns. Results are relative to `cwd`
 * unless `absolute` is set. A missing `cwd` yields no entries.
 */
export async function globFiles(
  patterns: string | string[],
  options: GlobOptions = {}
): Promise<string[]> {
  const entries = options.entries ?? 'files';
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? false,
    deep: options.deep ?? Infinity,
    onlyFiles: entries === 'files',
    onlyDirectories: entries === 'directories',
    dot: true,
  });
}

/**
 * Convert a path to forward-slash form.
 */
export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}
