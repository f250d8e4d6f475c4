/**
 * CLI Package Tests
 */
import { describe, it, expect } from 'vitest';
import { access, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

const packageDir = new URL('../', import.meta.url);

describe('cli package', () => {
  it('should point its bin at a launcher that exists', async () => {
    const manifest: unknown = JSON.parse(await readFile(new URL('package.json', packageDir), 'utf-8'));
    const bin =
      typeof manifest === 'object' && manifest !== null && 'bin' in manifest ? manifest.bin : undefined;

    expect(bin).toEqual({ schemasmith: './bin/schemasmith.js' });
    await expect(access(fileURLToPath(new URL('bin/schemasmith.js', packageDir)))).resolves.toBeUndefined();
  });

  it('should load the TypeScript entry point from the launcher', async () => {
    const launcher = await readFile(new URL('bin/schemasmith.js', packageDir), 'utf-8');

    expect(launcher.split('\n')[0]).toBe('#!/usr/bin/env node');
    expect(launcher).toContain("await import('../src/index.ts');");
    await expect(access(fileURLToPath(new URL('src/index.ts', packageDir)))).resolves.toBeUndefined();
  });
});
