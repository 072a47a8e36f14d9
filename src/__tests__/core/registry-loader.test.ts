// src/__tests__/core/registry-loader.test.ts

import { describe, it, expect, vi } from 'vitest';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { Command } from 'commander';

import { loadRegistry, resolveSpecifier, type ModuleImporter } from '../../core/registry-loader.js';
import { RegistryResolutionError } from '../../utils/errors.js';
import { group, leaf, option } from '../fixtures/command-registry.js';

function importerFor(modules: Record<string, unknown>): ModuleImporter {
  return vi.fn(async (specifier: string) => {
    if (!(specifier in modules)) {
      throw new Error(`Cannot find module '${specifier}'`);
    }
    return modules[specifier];
  });
}

describe('resolveSpecifier', () => {
  const baseDir = path.resolve('/projects/app');

  it('should turn relative paths into file URLs', () => {
    expect(resolveSpecifier('./dist/deploy.js', baseDir)).toBe(
      pathToFileURL(path.join(baseDir, 'dist/deploy.js')).href
    );
  });

  it('should turn absolute paths into file URLs', () => {
    const absolute = path.resolve('/opt/commands/sync.js');
    expect(resolveSpecifier(absolute, baseDir)).toBe(pathToFileURL(absolute).href);
  });

  it('should leave package specifiers alone', () => {
    expect(resolveSpecifier('@acme/cli/commands/deploy', baseDir)).toBe('@acme/cli/commands/deploy');
  });
});

describe('loadRegistry', () => {
  it('should load commander and descriptor packages in order', async () => {
    const deploy = new Command('deploy').description('Deploy').option('--region <region>', 'Region');
    const local = group({ invoke: leaf([option('event')]) });
    const importer = importerFor({
      'pkg-deploy': { cli: deploy },
      'pkg-local': { cli: local },
    });

    const registry = await loadRegistry(['pkg-deploy', 'pkg-local'], '/unused', importer);

    expect(registry.map((entry) => entry.id)).toEqual(['pkg-deploy', 'pkg-local']);
    expect(registry[0].cli).toMatchObject({ kind: 'leaf', help: 'Deploy' });
    expect(registry[0].cli.options.map((opt) => opt.name)).toEqual(['region']);
    expect(registry[1].cli).toBe(local);
  });

  it('should import relative specifiers from the base directory', async () => {
    const baseDir = path.resolve('/projects/app');
    const url = pathToFileURL(path.join(baseDir, 'commands/build.js')).href;
    const importer = importerFor({ [url]: { cli: leaf() } });

    const registry = await loadRegistry(['./commands/build.js'], baseDir, importer);

    expect(importer).toHaveBeenCalledWith(url);
    expect(registry[0].id).toBe('./commands/build.js');
  });

  it('should wrap import failures', async () => {
    const importer = importerFor({});

    const error = await loadRegistry(['missing-package'], '/unused', importer).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RegistryResolutionError);
    expect(error).toMatchObject({
      specifier: 'missing-package',
      message: "[missing-package] Failed to import command package: Cannot find module 'missing-package'",
    });
  });

  it('should reject modules without a cli export', async () => {
    const importer = importerFor({ 'pkg-empty': { run: () => undefined } });

    await expect(loadRegistry(['pkg-empty'], '/unused', importer)).rejects.toThrow(
      '[pkg-empty] Module does not export a "cli" command'
    );
  });

  it('should reject a cli export of the wrong shape', async () => {
    const importer = importerFor({ 'pkg-bad': { cli: { kind: 'group', options: [] } } });

    await expect(loadRegistry(['pkg-bad'], '/unused', importer)).rejects.toBeInstanceOf(RegistryResolutionError);
  });

  it('should stop at the first failing package', async () => {
    const importer = importerFor({ 'pkg-ok': { cli: leaf() } });

    await expect(loadRegistry(['missing', 'pkg-ok'], '/unused', importer)).rejects.toThrow('[missing]');
    expect(importer).toHaveBeenCalledTimes(1);
  });
});
