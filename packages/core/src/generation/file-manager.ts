/**
 * File Manager
 * Writes generated artifacts under an output directory
 */

import { createChildLogger } from '@schemasmith/shared';
import { writeFile, mkdir } from 'node:fs/promises';
import { join, dirname, resolve, sep } from 'node:path';
import type { BatchFileWriteResult, FileWriteResult, GeneratedArtifact } from './types.js';

/** What a file write needs of an artifact */
export type ArtifactFile = Pick<GeneratedArtifact, 'name' | 'content'>;

export class FileManager {
  private logger = createChildLogger({ component: 'FileManager' });
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  /**
   * Write a single artifact to disk
   */
  async writeArtifact(artifact: ArtifactFile): Promise<FileWriteResult> {
    const fullPath = this.getFullPath(artifact.name);

    if (!fullPath.startsWith(this.baseDir + sep)) {
      return {
        success: false,
        path: fullPath,
        error: `artifact name ${artifact.name} leaves the output directory`,
      };
    }

    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, artifact.content, 'utf-8');

      this.logger.debug({ path: artifact.name }, 'File written');

      return {
        success: true,
        path: fullPath,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ error: errorMessage, path: artifact.name }, 'Failed to write file');

      return {
        success: false,
        path: fullPath,
        error: errorMessage,
      };
    }
  }

  /**
   * Write artifacts one after another, collecting failures
   */
  async writeArtifacts(artifacts: Iterable<ArtifactFile>): Promise<BatchFileWriteResult> {
    const written: string[] = [];
    const failed: Array<{ path: string; error: string }> = [];
    let totalFiles = 0;

    for (const artifact of artifacts) {
      totalFiles++;
      const result = await this.writeArtifact(artifact);

      if (result.success) {
        written.push(result.path);
      } else {
        failed.push({
          path: result.path,
          error: result.error ?? 'Unknown error',
        });
      }
    }

    this.logger.info({
      baseDir: this.baseDir,
      written: written.length,
      failed: failed.length,
    }, 'File write operation complete');

    return {
      success: failed.length === 0,
      written,
      failed,
      totalFiles,
    };
  }

  /**
   * Create the base directory
   */
  async initialize(): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    this.logger.debug({ baseDir: this.baseDir }, 'Initialized file manager');
  }

  getFullPath(relativePath: string): string {
    return resolve(join(this.baseDir, ...relativePath.split('/')));
  }

  getBaseDir(): string {
    return this.baseDir;
  }
}
