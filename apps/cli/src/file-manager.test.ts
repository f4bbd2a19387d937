/**
 * File Manager Tests
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { GeneratedFile } from '@polyschema/shared';
import { FileManager, outputPath } from './file-manager.js';
import type { ConfirmOverwrite } from './prompt.js';
import { createWorkspace, type Workspace } from './__tests__/helpers.js';

const RECORD_FILE: GeneratedFile = {
  path: 'place.ts',
  content: 'export const PLACE_FIELDS = [];\n',
  target: 'record',
  sources: ['schemas/place.yaml'],
};

describe('FileManager', () => {
  let workspace: Workspace | undefined;

  afterEach(async () => {
    await workspace?.remove();
    workspace = undefined;
  });

  async function setup(confirm: ConfirmOverwrite = async () => false): Promise<{ manager: FileManager; dir: string }> {
    workspace = await createWorkspace();
    return { manager: new FileManager(workspace.outputDir, confirm), dir: workspace.outputDir };
  }

  it('should place files in their target directory', () => {
    expect(outputPath(RECORD_FILE)).toBe(join('records', 'place.ts'));
    expect(outputPath({ path: 'schema.prisma', target: 'storage' })).toBe(join('storage', 'schema.prisma'));
    expect(outputPath({ path: 'place.types.ts', target: 'interface' })).toBe(join('interfaces', 'place.types.ts'));
  });

  it('should create missing directories when writing', async () => {
    const { manager, dir } = await setup();

    const result = await manager.writeFile(RECORD_FILE);

    expect(result).toEqual({ path: join(dir, 'records', 'place.ts'), status: 'written' });
    expect(await readFile(join(dir, 'records', 'place.ts'), 'utf-8')).toBe(RECORD_FILE.content);
  });

  it('should ask before overwriting and keep the file when declined', async () => {
    const confirm = vi.fn<ConfirmOverwrite>().mockResolvedValue(false);
    const { manager, dir } = await setup(confirm);
    await mkdir(join(dir, 'records'), { recursive: true });
    await writeFile(join(dir, 'records', 'place.ts'), 'hand edited\n', 'utf-8');

    const result = await manager.writeFile(RECORD_FILE);

    expect(confirm).toHaveBeenCalledWith(join(dir, 'records', 'place.ts'));
    expect(result.status).toBe('skipped');
    expect(await manager.readFile(join('records', 'place.ts'))).toBe('hand edited\n');
  });

  it('should overwrite when confirmed', async () => {
    const { manager } = await setup(async () => true);
    await manager.writeFile({ ...RECORD_FILE, content: 'old\n' });

    const result = await manager.writeFile(RECORD_FILE);

    expect(result.status).toBe('written');
    expect(await manager.readFile(join('records', 'place.ts'))).toBe(RECORD_FILE.content);
  });

  it('should overwrite without asking when forced', async () => {
    const confirm = vi.fn<ConfirmOverwrite>().mockResolvedValue(false);
    const { manager } = await setup(confirm);
    await manager.writeFile({ ...RECORD_FILE, content: 'old\n' });

    const result = await manager.writeFile(RECORD_FILE, { force: true });

    expect(confirm).not.toHaveBeenCalled();
    expect(result.status).toBe('written');
  });

  it('should touch nothing on a dry run', async () => {
    const { manager } = await setup();

    const result = await manager.writeFiles([RECORD_FILE], { dryRun: true });

    expect(result.planned).toHaveLength(1);
    expect(result.written).toEqual([]);
    expect(await manager.readFile(join('records', 'place.ts'))).toBeNull();
  });

  it('should report a failed write and carry on', async () => {
    const { manager, dir } = await setup();
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'records'), 'a file where a directory belongs', 'utf-8');

    const result = await manager.writeFiles([
      RECORD_FILE,
      { path: 'schema.prisma', content: 'model Place {}\n', target: 'storage', sources: [] },
    ]);

    expect(result.success).toBe(false);
    expect(result.failed.map((failure) => failure.path)).toEqual([join(dir, 'records', 'place.ts')]);
    expect(result.written).toEqual([join(dir, 'storage', 'schema.prisma')]);
    expect(result.totalFiles).toBe(2);
  });

  it('should read a missing file as null and rethrow other read errors', async () => {
    const { manager, dir } = await setup();
    await mkdir(join(dir, 'records', 'folder.ts'), { recursive: true });

    expect(await manager.readFile(join('records', 'absent.ts'))).toBeNull();
    await expect(manager.readFile(join('records', 'folder.ts'))).rejects.toThrow();
  });
});
