// src/core/command-extractor.ts - Command package -> CommandSchema records

import * as path from 'path';

import { configKeyJoiner, type KeyJoiner } from '../config/config-keys.js';
import { cleanText } from '../utils/text.js';
import { RESERVED_OPTION_NAMES } from './constants.js';
import { CommandSchema, type ParameterSchema } from './command-schema.js';
import { normalizeParameter } from './parameter-normalizer.js';
import type { CommandNode, CommandPackage } from './types/command-registry.js';

const MODULE_EXTENSION = /\.(?:[cm]?[jt]s|tsx|jsx)$/;

/**
 * Short name a package is addressed by in the configuration file:
 * './dist/commands/deploy.js' -> 'deploy', './commands/local/index.js' -> 'local',
 * 'app.commands.remote' -> 'remote'.
 */
export function packageShortName(id: string): string {
  const normalized = id.replace(/\\/g, '/').replace(/\/+$/, '');
  let base = path.posix.basename(normalized).replace(MODULE_EXTENSION, '');
  if (base === 'index') {
    base = path.posix.basename(path.posix.dirname(normalized));
  }
  const dotted = base.split('.');
  return dotted[dotted.length - 1];
}

/**
 * Options a configuration file may set for this command, in declaration order.
 */
export function extractParameters(command: CommandNode): ParameterSchema[] {
  return command.options
    .filter((option) => option.name && option.kind === 'option' && !RESERVED_OPTION_NAMES.includes(option.name))
    .map((option) => normalizeParameter(option));
}

function describe(command: CommandNode): string {
  return cleanText(command.help || command.shortHelp || '');
}

function collectLeaves(
  segments: string[],
  command: CommandNode,
  joiner: KeyJoiner,
  into: CommandSchema[]
): void {
  if (command.kind === 'leaf') {
    into.push(new CommandSchema(joiner.join(segments), describe(command), extractParameters(command)));
    return;
  }
  for (const [subName, subcommand] of command.subcommands) {
    collectLeaves([...segments, subName], subcommand, joiner, into);
  }
}

/**
 * Produces one CommandSchema per leaf command reachable from the package.
 * A leaf package yields a single record named after the package; a group
 * yields one record per subcommand, named by joining the package name and the
 * subcommand path with the configuration key joiner.
 *
 * Nested groups are descended into, so a group yields one record per leaf
 * below it rather than one per direct subcommand; the counts agree only when
 * every subcommand is a leaf.
 */
export function extractCommands(pkg: CommandPackage, joiner: KeyJoiner = configKeyJoiner): CommandSchema[] {
  const commands: CommandSchema[] = [];
  collectLeaves([packageShortName(pkg.id)], pkg.cli, joiner, commands);
  return commands;
}
