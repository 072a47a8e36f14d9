// src/core/registry-loader.ts - Resolves command package modules into a CommandRegistry

import * as path from 'path';
import { pathToFileURL } from 'url';

import { RegistryResolutionError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { describeCommand, isCommanderCommand } from './commander-adapter.js';
import type { CommandNode, CommandPackage, CommandRegistry } from './types/command-registry.js';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

function isCommandNode(value: unknown): value is CommandNode {
  if (typeof value !== 'object' || value === null || !('kind' in value) || !('options' in value)) {
    return false;
  }
  if (!Array.isArray(value.options)) {
    return false;
  }
  if (value.kind === 'leaf') {
    return true;
  }
  return value.kind === 'group' && 'subcommands' in value && value.subcommands instanceof Map;
}

/**
 * Relative and absolute paths become file URLs; bare specifiers
 * (package names) are left for Node's resolver.
 */
export function resolveSpecifier(specifier: string, baseDir: string): string {
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(baseDir, specifier)).href;
  }
  return specifier;
}

async function loadPackage(specifier: string, baseDir: string, importer: ModuleImporter): Promise<CommandPackage> {
  let mod: unknown;
  try {
    mod = await importer(resolveSpecifier(specifier, baseDir));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RegistryResolutionError(specifier, `Failed to import command package: ${message}`, { cause: error });
  }

  const cli = typeof mod === 'object' && mod !== null && 'cli' in mod ? mod.cli : undefined;
  if (isCommanderCommand(cli)) {
    return { id: specifier, cli: describeCommand(cli) };
  }
  if (isCommandNode(cli)) {
    return { id: specifier, cli };
  }
  throw new RegistryResolutionError(specifier, 'Module does not export a "cli" command');
}

/**
 * Imports every command package in order. Each module must export `cli`,
 * either a commander Command or a CommandNode tree.
 */
export async function loadRegistry(
  specifiers: readonly string[],
  baseDir: string,
  importer: ModuleImporter = defaultImporter
): Promise<CommandRegistry> {
  const registry: CommandPackage[] = [];
  for (const specifier of specifiers) {
    registry.push(await loadPackage(specifier, baseDir, importer));
    Logger.debug(`Loaded command package ${specifier}`);
  }
  return registry;
}
