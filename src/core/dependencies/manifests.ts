/**
 * Read access to a project's manifest files (package.json, go.mod, pom.xml,
 * ...). Every read is memoised; missing and unreadable files read as null.
 */
import * as path from 'node:path';
import type { z } from 'zod';
import { fileExists, globFiles, readFileOrNull, toPosixPath } from '../../utils/file-system.js';
import { IGNORED_DIRECTORIES } from '../scan/discovery.js';

export interface EntrySearch {
  /** Project-relative directory to search (default: the project root) */
  dir?: string;
  /** Directory levels below `dir` to descend into; 0 searches `dir` only */
  maxDepth: number;
}

export class ProjectManifests {
  private readonly contents = new Map<string, Promise<string | null>>();

  constructor(readonly projectRoot: string) {}

  read(relativePath: string): Promise<string | null> {
    let content = this.contents.get(relativePath);
    if (!content) {
      content = readFileOrNull(path.join(this.projectRoot, relativePath));
      this.contents.set(relativePath, content);
    }
    return content;
  }

  /** Content of a file, or `''` when it cannot be read. */
  async readText(relativePath: string): Promise<string> {
    return (await this.read(relativePath)) ?? '';
  }

  exists(relativePath: string): Promise<boolean> {
    return fileExists(path.join(this.projectRoot, relativePath));
  }

  async anyExists(relativePaths: readonly string[]): Promise<boolean> {
    for (const relativePath of relativePaths) {
      if (await this.exists(relativePath)) return true;
    }
    return false;
  }

  /** First of `relativePaths` that exists. */
  async firstExisting(relativePaths: readonly string[]): Promise<string | null> {
    for (const relativePath of relativePaths) {
      if (await this.exists(relativePath)) return relativePath;
    }
    return null;
  }

  /**
   * Parse a JSON manifest against `schema`. Missing files, invalid JSON and
   * schema mismatches all yield null.
   */
  async readJson<T>(relativePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const content = await this.read(relativePath);
    if (content === null) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      return null;
    }
    const result = schema.safeParse(parsed);
    return result.success ? result.data : null;
  }

  /**
   * Project-relative paths of files or directories whose name ends with
   * `suffix`, sorted.
   */
  async findEntries(suffix: string, search: EntrySearch): Promise<string[]> {
    const dir = search.dir ?? '';
    const found = await globFiles(`**/*${suffix}`, {
      cwd: dir ? path.join(this.projectRoot, dir) : this.projectRoot,
      ignore: IGNORED_DIRECTORIES.map((name) => `**/${name}/**`),
      deep: search.maxDepth + 1,
      entries: 'all',
    });
    return found.map((entry) => toPosixPath(dir ? path.join(dir, entry) : entry)).sort();
  }

  async hasEntry(suffix: string, search: EntrySearch): Promise<boolean> {
    return (await this.findEntries(suffix, search)).length > 0;
  }
}
