/**
 * File Manager
 * Writes generated files under an output directory, one subdirectory per target
 */

import { createChildLogger, type GeneratedFile, type TargetName } from '@polyschema/shared';
import { writeFile, mkdir, readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { isNotFound } from './fs-errors.js';
import { promptOverwrite, type ConfirmOverwrite } from './prompt.js';

export const TARGET_DIRECTORIES: Readonly<Record<TargetName, string>> = {
  record: 'records',
  storage: 'storage',
  interface: 'interfaces',
  extraction: 'extraction',
};

/** Output-relative path of a generated file */
export function outputPath(file: Pick<GeneratedFile, 'path' | 'target'>): string {
  return join(TARGET_DIRECTORIES[file.target], file.path);
}

export interface WriteOptions {
  /** Overwrite existing files without asking */
  force?: boolean;
  /** Report what would be written and touch nothing */
  dryRun?: boolean;
}

export type FileWriteStatus = 'written' | 'skipped' | 'planned' | 'failed';

export interface FileWriteResult {
  path: string;
  status: FileWriteStatus;
  error?: string;
}

export interface BatchFileWriteResult {
  success: boolean;
  written: string[];
  skipped: string[];
  planned: string[];
  failed: Array<{ path: string; error: string }>;
  totalFiles: number;
}

export class FileManager {
  private logger = createChildLogger({ component: 'FileManager' });
  private baseDir: string;
  private confirmOverwrite: ConfirmOverwrite;

  constructor(baseDir: string, confirmOverwrite: ConfirmOverwrite = promptOverwrite) {
    this.baseDir = baseDir;
    this.confirmOverwrite = confirmOverwrite;
  }

  /**
   * Write a single file, asking before replacing one that exists
   */
  async writeFile(file: GeneratedFile, options: WriteOptions = {}): Promise<FileWriteResult> {
    const relativePath = outputPath(file);
    const fullPath = this.getFullPath(relativePath);

    if (options.dryRun) {
      this.logger.info({ path: relativePath, target: file.target }, 'Would write file');
      return { path: fullPath, status: 'planned' };
    }

    try {
      const exists = (await this.readFile(relativePath)) !== null;
      if (exists && !options.force && !(await this.confirmOverwrite(fullPath))) {
        this.logger.info({ path: relativePath }, 'Kept existing file');
        return { path: fullPath, status: 'skipped' };
      }

      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, file.content, 'utf-8');

      this.logger.debug({ path: relativePath }, 'File written');

      return { path: fullPath, status: 'written' };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: errorMessage, path: relativePath }, 'Failed to write file');

      return { path: fullPath, status: 'failed', error: errorMessage };
    }
  }

  /**
   * Write files one at a time so overwrite prompts do not interleave
   */
  async writeFiles(files: readonly GeneratedFile[], options: WriteOptions = {}): Promise<BatchFileWriteResult> {
    this.logger.info({ fileCount: files.length, baseDir: this.baseDir, dryRun: options.dryRun ?? false }, 'Writing files to disk');

    const result: BatchFileWriteResult = {
      success: true,
      written: [],
      skipped: [],
      planned: [],
      failed: [],
      totalFiles: files.length,
    };

    for (const file of files) {
      const outcome = await this.writeFile(file, options);

      switch (outcome.status) {
        case 'written':
          result.written.push(outcome.path);
          break;
        case 'skipped':
          result.skipped.push(outcome.path);
          break;
        case 'planned':
          result.planned.push(outcome.path);
          break;
        case 'failed':
          result.failed.push({ path: outcome.path, error: outcome.error ?? 'Unknown error' });
          break;
      }
    }

    result.success = result.failed.length === 0;

    this.logger.info({
      written: result.written.length,
      skipped: result.skipped.length,
      planned: result.planned.length,
      failed: result.failed.length,
    }, 'File write operation complete');

    return result;
  }

  /**
   * Read a file under the base directory, or null when there is none
   */
  async readFile(relativePath: string): Promise<string | null> {
    try {
      return await readFile(this.getFullPath(relativePath), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  getFullPath(relativePath: string): string {
    return join(this.baseDir, relativePath);
  }
}
