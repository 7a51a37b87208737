/**
 * Temporary project trees for command tests.
 */
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

export const ROUTES_NO_DB_CONFIG = [
  'invariants:',
  '  - id: routes-no-db',
  '    type: boundary',
  '    severity: error',
  '    description: Routes must not touch the database',
  '    source_glob: "src/routes/**"',
  '    forbidden_imports: ["src/db/**"]',
  '',
].join('\n');

export async function createProject(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'archwarden-cli-'));
  for (const [file, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, file)), { recursive: true });
    await writeFile(join(root, file), content);
  }
  return root;
}

export async function removeProject(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

export const LAYERED_SOURCES: Record<string, string> = {
  'src/routes/users.ts': "import { query } from '../db/client';\nexport const users = query;\n",
  'src/db/client.ts': 'export const query = 1;\n',
};
