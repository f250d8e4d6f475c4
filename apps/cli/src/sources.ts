/**
 * Schema source loading
 * Files are read as given; directories are searched for `*.sql`
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { join, relative, resolve, sep } from 'node:path';
import { FileSystemError, type SchemaSource } from '@schemasmith/shared';

const SCHEMA_EXTENSION = '.sql';

async function findSchemaFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry) => {
      const path = join(directory, entry.name);
      if (entry.isDirectory()) return findSchemaFiles(path);
      return entry.isFile() && entry.name.toLowerCase().endsWith(SCHEMA_EXTENSION) ? [path] : [];
    })
  );
  return nested.flat();
}

async function expandPath(path: string): Promise<string[]> {
  const fullPath = resolve(path);
  try {
    const info = await stat(fullPath);
    return info.isDirectory() ? await findSchemaFiles(fullPath) : [fullPath];
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FileSystemError(`Cannot read schema path ${path}: ${reason}`, fullPath);
  }
}

/**
 * Load every schema file under the given paths, sorted by path. Source names
 * are relative to `baseDir` with forward slashes.
 */
export async function loadSchemaSources(
  paths: readonly string[],
  baseDir: string = process.cwd()
): Promise<SchemaSource[]> {
  const files = [...new Set((await Promise.all(paths.map(expandPath))).flat())].sort();

  return Promise.all(
    files.map(async (file) => {
      try {
        return {
          name: relative(baseDir, file).split(sep).join('/'),
          text: await readFile(file, 'utf-8'),
        };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new FileSystemError(`Cannot read schema file ${file}: ${reason}`, file);
      }
    })
  );
}
