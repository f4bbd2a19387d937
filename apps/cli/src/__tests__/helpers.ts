/**
 * Temporary workspaces for CLI tests
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export const PLACE_YAML = `
schema:
  name: Place
  description: A physical place
fields:
  - name: place_id
    type: string
    required: true
    primary_key: true
  - name: title
    type: string
    description: Display title
`;

export const CAFE_YAML = `
schema:
  name: Cafe
  description: A place serving coffee
  extends: Place
fields:
  - name: serves_espresso
    type: boolean
    description: Whether espresso is on the menu
`;

export interface Workspace {
  root: string;
  schemaDir: string;
  outputDir: string;
  remove: () => Promise<void>;
}

export async function createWorkspace(schemas: Record<string, string> = {}): Promise<Workspace> {
  const root = await mkdtemp(join(tmpdir(), 'polyschema-cli-'));
  const schemaDir = join(root, 'schemas');
  await mkdir(schemaDir, { recursive: true });

  for (const [file, content] of Object.entries(schemas)) {
    await writeFile(join(schemaDir, file), content, 'utf-8');
  }

  return {
    root,
    schemaDir,
    outputDir: join(root, 'generated'),
    remove: () => rm(root, { recursive: true, force: true }),
  };
}
