/**
 * Workspace Packaging Tests
 *
 * Node loads the built JavaScript; the type-checker and Vitest load the
 * TypeScript sources. The manifests and build configs must agree on where
 * each lands.
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';

const ManifestSchema = z.object({
  name: z.string(),
  exports: z.record(z.object({ types: z.string(), default: z.string() })).optional(),
  bin: z.record(z.string()).optional(),
});

const BuildConfigSchema = z.object({
  compilerOptions: z.object({ composite: z.boolean(), rootDir: z.string(), outDir: z.string() }),
  references: z.array(z.object({ path: z.string() })).optional(),
});

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(new URL(`../../../../${path}`, import.meta.url), 'utf-8'));
}

describe('workspace packaging', () => {
  it.each(['packages/core', 'packages/forecasting'])('%s resolves to built JavaScript at run time', (dir) => {
    const manifest = ManifestSchema.parse(readJson(`${dir}/package.json`));
    const build = BuildConfigSchema.parse(readJson(`${dir}/tsconfig.build.json`));

    expect(manifest.exports?.['.']).toEqual({ types: './src/index.ts', default: './dist/index.js' });
    expect(build.compilerOptions).toEqual({ composite: true, rootDir: 'src', outDir: 'dist' });
  });

  it('ships the CLI as a built executable', () => {
    const manifest = ManifestSchema.parse(readJson('apps/cli/package.json'));
    const build = BuildConfigSchema.parse(readJson('apps/cli/tsconfig.build.json'));
    const entry = readFileSync(new URL('../index.ts', import.meta.url), 'utf-8');

    expect(manifest.bin).toEqual({ nowcast: './dist/index.js' });
    expect(build.compilerOptions.outDir).toBe('dist');
    expect(build.references?.map((r) => r.path)).toEqual([
      '../../packages/core/tsconfig.build.json',
      '../../packages/forecasting/tsconfig.build.json',
    ]);
    expect(entry.startsWith('#!/usr/bin/env node\n')).toBe(true);
  });

  it('builds every workspace from the root', () => {
    const root = z.object({ references: z.array(z.object({ path: z.string() })) }).parse(readJson('tsconfig.build.json'));
    expect(root.references.map((r) => r.path)).toEqual([
      './packages/core/tsconfig.build.json',
      './packages/forecasting/tsconfig.build.json',
      './apps/cli/tsconfig.build.json',
    ]);
  });
});
