/**
 * validate Command Tests
 */
import { describe, it, expect, afterEach } from 'vitest';
import { appendFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { TARGET_NAMES } from '@polyschema/shared';
import { runGenerate } from './generate.js';
import { runValidate } from './validate.js';
import { CAFE_YAML, PLACE_YAML, createWorkspace, type Workspace } from '../__tests__/helpers.js';

describe('runValidate', () => {
  let workspace: Workspace | undefined;

  afterEach(async () => {
    await workspace?.remove();
    workspace = undefined;
  });

  async function generated(): Promise<Workspace> {
    const created = await createWorkspace({ 'place.yaml': PLACE_YAML, 'cafe.yaml': CAFE_YAML });
    workspace = created;
    await runGenerate({
      schemaDir: created.schemaDir,
      outputDir: created.outputDir,
      dialect: 'postgresql',
      target: [...TARGET_NAMES],
      validation: true,
      force: true,
      dryRun: false,
    });
    return created;
  }

  it('should accept freshly generated records', async () => {
    const { schemaDir, outputDir } = await generated();

    const report = await runValidate({ schemaDir, outputDir });

    expect(report.ok).toBe(true);
    expect(report.results.map((result) => result.status)).toEqual(['in-sync', 'in-sync']);
  });

  it('should flag edited and missing records', async () => {
    const { schemaDir, outputDir } = await generated();
    await appendFile(join(outputDir, 'records', 'cafe.ts'), '// edited by hand\n', 'utf-8');
    await rm(join(outputDir, 'records', 'place.ts'));

    const report = await runValidate({ schemaDir, outputDir });

    expect(report.ok).toBe(false);
    expect(report.results.map((result) => [result.artifactPath, result.status])).toEqual([
      [join(outputDir, 'records', 'cafe.ts'), 'drift'],
      [join(outputDir, 'records', 'place.ts'), 'missing'],
    ]);
  });

  it('should report a schema that no longer parses', async () => {
    const { schemaDir, outputDir } = await generated();
    await writeFile(join(schemaDir, 'zeta.yaml'), 'schema:\n  name: Zeta\n', 'utf-8');

    const report = await runValidate({ schemaDir, outputDir });

    expect(report.results.map((result) => result.status)).toEqual(['in-sync', 'in-sync', 'error']);
    expect(report.results[2]?.artifactPath).toBe(join(outputDir, 'records', 'zeta.ts'));
  });
});
